import type { LogLevel } from "../observability/types";

export interface AppConfig {
  registryUrl: string;
  schemeLinkPrefix: string;
  detailBaseUrl: string;
  archiveBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  outputDir: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;
