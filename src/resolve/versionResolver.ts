import type { SchemeDetail, VersionInfo } from "../types";
import { parseLastChange } from "./lastChange";

export const NAME_KEY = "Name";
export const VERSION_KEY = "Version";
export const LAST_CHANGE_KEY = "Last Change";

/**
 * Picks name, version and last change out of a scheme detail mapping.
 * Never throws: missing or unparseable fields are simply left out.
 */
export function resolveVersion(detail: SchemeDetail): VersionInfo {
  const info: VersionInfo = {};

  const name = detail.get(NAME_KEY);
  if (name !== undefined) {
    info.name = name;
  }

  const version = detail.get(VERSION_KEY);
  if (version !== undefined) {
    info.version = version;
  }

  const lastChangeRaw = detail.get(LAST_CHANGE_KEY);
  if (lastChangeRaw !== undefined) {
    info.lastChangeRaw = lastChangeRaw;
    const parsed = parseLastChange(lastChangeRaw);
    if (parsed) {
      info.lastChangeParsed = parsed;
    }
  }

  return info;
}
