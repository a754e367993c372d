import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../core/errors";
import type { LogLevel } from "../observability/types";
import type { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  registryUrl: "https://www.cgmlst.org/ncs/scheme/",
  schemeLinkPrefix: "https://www.cgmlst.org/ncs/scheme/schema/",
  detailBaseUrl: "https://www.cgmlst.org/ncs/scheme/scheme/",
  archiveBaseUrl: "https://www.cgmlst.org/ncs/schema/",
  userAgent: "cgmlst-schemes/1.0 (+https://www.cgmlst.org)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 300_000,
  outputDir: ".",
  logLevel: "warn",
};

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const configFileSchema = z
  .object({
    registryUrl: z.string().url(),
    schemeLinkPrefix: z.string().min(1),
    detailBaseUrl: z.string().url(),
    archiveBaseUrl: z.string().url(),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    downloadTimeoutMs: z.number().int().positive(),
    outputDir: z.string().min(1),
    logLevel: logLevelSchema,
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const parsed = logLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  return {
    registryUrl: env.CGMLST_REGISTRY_URL ?? merged.registryUrl,
    schemeLinkPrefix: merged.schemeLinkPrefix,
    detailBaseUrl: env.CGMLST_DETAIL_BASE_URL ?? merged.detailBaseUrl,
    archiveBaseUrl: env.CGMLST_ARCHIVE_BASE_URL ?? merged.archiveBaseUrl,
    userAgent: env.CGMLST_USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.CGMLST_IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.CGMLST_REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.CGMLST_DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    outputDir: env.CGMLST_OUTPUT_DIR ?? merged.outputDir,
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
  };
}

export { DEFAULT_CONFIG };
