export { DEFAULT_CONFIG, loadConfig } from "./loadConfig";
export type { AppConfig, ConfigOverrides } from "./types";
