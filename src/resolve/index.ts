export { formatLastChange, parseLastChange } from "./lastChange";
export { LAST_CHANGE_KEY, NAME_KEY, VERSION_KEY, resolveVersion } from "./versionResolver";
