import type { AppConfig } from "../config";
import { fetchSchemeDetail, listSchemes } from "../crawl";
import { fetchAndExtract } from "../download";
import type { Logger, MetricsRegistry } from "../observability";
import { resolveVersion } from "../resolve";
import type { ExtractResult, SchemeSummary, VersionInfo } from "../types";
import { UnknownSchemeIdError } from "./errors";
import type { FetchFn } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

export async function runList(ctx: CommandContext): Promise<SchemeSummary[]> {
  ctx.logger.info("list_start");
  const schemes = await listSchemes(ctx);
  ctx.logger.info("list_complete", { schemeCount: schemes.length });
  return schemes;
}

/**
 * Checks `schemeId` against the live listing. Nothing else is requested when
 * the id is unknown.
 */
export async function requireKnownScheme(ctx: CommandContext, schemeId: string): Promise<SchemeSummary> {
  const schemes = await listSchemes(ctx);
  const scheme = schemes.find((candidate) => candidate.id === schemeId);
  if (!scheme) {
    ctx.logger.warn("scheme_id_unknown", { schemeId });
    throw new UnknownSchemeIdError(schemeId, schemes);
  }
  return scheme;
}

export async function runLastChange(ctx: CommandContext, schemeId: string): Promise<VersionInfo> {
  ctx.logger.info("last_change_start", { schemeId });
  await requireKnownScheme(ctx, schemeId);
  const detail = await fetchSchemeDetail(schemeId, ctx);
  const info = resolveVersion(detail);
  if (info.lastChangeRaw !== undefined && info.lastChangeParsed === undefined) {
    ctx.logger.warn("last_change_unparseable", { schemeId, raw: info.lastChangeRaw });
  }
  ctx.logger.info("last_change_complete", { schemeId, version: info.version, lastChange: info.lastChangeRaw });
  return info;
}

export async function runDownload(ctx: CommandContext, schemeId: string): Promise<ExtractResult> {
  ctx.logger.info("download_start", { schemeId, outputDir: ctx.config.outputDir });
  await requireKnownScheme(ctx, schemeId);
  const detail = await fetchSchemeDetail(schemeId, ctx);
  const info = resolveVersion(detail);
  const result = await fetchAndExtract(schemeId, info, ctx);
  ctx.logger.info("download_complete", { schemeId, status: result.status, path: result.destination.dirPath });
  return result;
}
