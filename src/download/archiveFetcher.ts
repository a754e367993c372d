import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import AdmZip from "adm-zip";
import type { AppConfig } from "../config";
import { DownloadError, ExtractError, MissingVersionInfoError } from "../core/errors";
import { httpGet, type FetchFn } from "../core/fetch";
import type { Logger, MetricsRegistry } from "../observability";
import { formatLastChange } from "../resolve";
import type { ArchiveDestination, ExtractResult, VersionInfo } from "../types";

export interface ArchiveFetcherDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

export function buildArchiveUrl(config: AppConfig, schemeId: string): string {
  return `${config.archiveBaseUrl}${encodeURIComponent(schemeId)}/alleles/`;
}

/**
 * Computes `<id>_v<version>_LastChange_<YYYY-MM-DD-HH-MM>` and checks what already
 * exists under that name in `outputDir`, whether file or directory.
 */
export function buildArchiveDestination(schemeId: string, info: VersionInfo, outputDir: string): ArchiveDestination {
  const { version, lastChangeParsed } = info;
  if (version === undefined || lastChangeParsed === undefined) {
    const missing: Array<"Version" | "Last Change"> = [];
    if (version === undefined) {
      missing.push("Version");
    }
    if (lastChangeParsed === undefined) {
      missing.push("Last Change");
    }
    throw new MissingVersionInfoError(schemeId, missing);
  }

  const safeVersion = version.replace(/[\\/]/g, "-");
  const baseName = `${schemeId}_v${safeVersion}_LastChange_${formatLastChange(lastChangeParsed)}`;
  const zipPath = path.resolve(outputDir, `${baseName}.zip`);
  const dirPath = path.resolve(outputDir, baseName);

  return {
    baseName,
    zipPath,
    dirPath,
    zipExists: fs.existsSync(zipPath),
    dirExists: fs.existsSync(dirPath),
  };
}

async function downloadArchive(
  url: string,
  zipPath: string,
  deps: ArchiveFetcherDeps,
): Promise<{ bytes: number; sha256: string }> {
  const { config } = deps;
  const tempPath = `${zipPath}.part`;

  try {
    const response = await httpGet(
      url,
      config,
      { accept: "application/zip,application/octet-stream,*/*", timeoutMs: config.downloadTimeoutMs },
      deps.fetchFn,
    );
    if (!response.body) {
      throw new Error("response has no body");
    }

    await fs.promises.mkdir(path.dirname(zipPath), { recursive: true });
    const hash = crypto.createHash("sha256");
    let bytes = 0;

    const readable = Readable.fromWeb(response.body);
    readable.on("data", (chunk: Buffer) => {
      hash.update(chunk);
      bytes += chunk.length;
    });
    await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));

    // Content-Length counts encoded bytes when the body is compressed.
    const declared = response.headers.get("content-encoding")
      ? Number.NaN
      : Number.parseInt(response.headers.get("content-length") ?? "", 10);
    if (Number.isFinite(declared) && declared !== bytes) {
      throw new Error(`received ${bytes} of ${declared} bytes`);
    }

    await fs.promises.rename(tempPath, zipPath);
    return { bytes, sha256: hash.digest("hex") };
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw new DownloadError(url, error);
  }
}

async function extractArchive(zipPath: string, dirPath: string): Promise<number> {
  let created = false;
  try {
    const zip = new AdmZip(zipPath);
    await fs.promises.mkdir(dirPath);
    created = true;
    zip.extractAllTo(dirPath, false);
    return zip.getEntries().filter((entry) => !entry.isDirectory).length;
  } catch (error) {
    if (created) {
      await fs.promises.rm(dirPath, { recursive: true, force: true });
    }
    throw new ExtractError(zipPath, error);
  }
}

/**
 * Downloads a scheme's allele archive and unpacks it next to the zip. Existing
 * output under the computed name is left untouched and no request is made.
 */
export async function fetchAndExtract(
  schemeId: string,
  info: VersionInfo,
  deps: ArchiveFetcherDeps,
): Promise<ExtractResult> {
  const { config, logger, metrics } = deps;
  const destination = buildArchiveDestination(schemeId, info, config.outputDir);

  if (destination.zipExists || destination.dirExists) {
    const existing = destination.zipExists ? "zip" : "dir";
    logger.info("archive_exists_skipped", {
      schemeId,
      path: existing === "zip" ? destination.zipPath : destination.dirPath,
    });
    metrics.incrementCounter("archives_skipped");
    return { status: "exists", destination, existing };
  }

  const url = buildArchiveUrl(config, schemeId);
  logger.info("archive_download_start", { schemeId, url, path: destination.zipPath });
  const stopDownloadTimer = metrics.startTimer("download_ms");
  let download: { bytes: number; sha256: string };
  try {
    download = await downloadArchive(url, destination.zipPath, deps);
  } catch (error) {
    metrics.incrementCounter("archives_failed");
    throw error;
  } finally {
    stopDownloadTimer();
  }
  metrics.incrementCounter("archives_downloaded");
  logger.info("archive_download_complete", { schemeId, url, ...download });

  const stopExtractTimer = metrics.startTimer("extract_ms");
  let entryCount: number;
  try {
    entryCount = await extractArchive(destination.zipPath, destination.dirPath);
  } finally {
    stopExtractTimer();
  }
  logger.info("archive_extract_complete", { schemeId, path: destination.dirPath, entryCount });

  return {
    status: "extracted",
    destination: { ...destination, zipExists: true, dirExists: true },
    url,
    bytes: download.bytes,
    sha256: download.sha256,
    entryCount,
  };
}
