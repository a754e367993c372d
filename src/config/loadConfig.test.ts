import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../core/errors";
import { DEFAULT_CONFIG, loadConfig } from "./loadConfig";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cgmlst-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, typeof content === "string" ? content : JSON.stringify(content), "utf-8");
    return file;
  }

  it("uses the registry defaults when nothing is configured", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.registryUrl).toBe("https://www.cgmlst.org/ncs/scheme/");
  });

  it("layers file values, then environment values, over the defaults", () => {
    const file = writeConfig({ outputDir: "schemes", requestTimeoutMs: 5000, logLevel: "debug" });

    const config = loadConfig(file, { CGMLST_OUTPUT_DIR: "/srv/schemes", CGMLST_IGNORE_HTTPS_ERRORS: "yes" });

    expect(config.outputDir).toBe("/srv/schemes");
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.logLevel).toBe("debug");
    expect(config.ignoreHttpsErrors).toBe(true);
  });

  it("falls back on unusable environment values", () => {
    const config = loadConfig(undefined, { CGMLST_REQUEST_TIMEOUT_MS: "soon", LOG_LEVEL: "chatty" });

    expect(config.requestTimeoutMs).toBe(DEFAULT_CONFIG.requestTimeoutMs);
    expect(config.logLevel).toBe("warn");
  });

  it("rejects unknown keys and wrong types in the config file", () => {
    const file = writeConfig({ registryUrl: 42, retries: 3 });

    expect(() => loadConfig(file, {})).toThrow(ConfigError);
  });

  it("rejects a missing or malformed config file", () => {
    expect(() => loadConfig(path.join(dir, "absent.json"), {})).toThrow(/^Config file not found: /);
    expect(() => loadConfig(writeConfig("{ not json"), {})).toThrow(/^Config file is not valid JSON: /);
  });
});
