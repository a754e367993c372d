import type { AppConfig } from "../config";
import { RegistryFetchError, RegistryLayoutError } from "../core/errors";
import { fetchHtml, type FetchFn } from "../core/fetch";
import type { Logger, MetricsRegistry } from "../observability";
import type { SchemeSummary } from "../types";
import { extractFirstTable } from "./htmlTable";

export interface RegistryDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

/**
 * Turns a scheme hyperlink into the id used by every other command.
 *
 * Registry links sometimes carry a numeric scheme-version suffix
 * (`.../schema/Abaumannii1469/`) which is dropped, so the id is `Abaumannii`.
 * Applying the function to its own output returns the same value.
 */
export function deriveSchemeId(href: string, prefix: string): string {
  const withoutPrefix = href.startsWith(prefix) ? href.slice(prefix.length) : href;
  return withoutPrefix.replace(/\d+\/$/, "/").replace(/\/$/, "");
}

function normalizeHeader(value: string): string {
  return value.replace(/ /g, "_");
}

function normalizeUrl(baseUrl: string, href: string): string {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    // Not resolvable against the index URL; keep it as written.
    return href;
  }
}

function parseCount(raw: string | undefined, column: string, logger: Logger, schemeId: string): number {
  const digits = (raw ?? "").replace(/[,\s]/g, "");
  if (/^\d+$/.test(digits)) {
    return Number.parseInt(digits, 10);
  }
  logger.warn("registry_count_unparseable", { schemeId, column, raw });
  return 0;
}

/**
 * Builds the scheme listing from the registry index page. Rows are paired with
 * the table's anchors by position, so the two counts must match.
 */
export function parseRegistryPage(html: string, config: AppConfig, logger: Logger): SchemeSummary[] {
  const { rows, anchors } = extractFirstTable(html, config.registryUrl);
  const [header, ...dataRows] = rows.filter((row) => row.length > 0);
  if (!header) {
    throw new RegistryLayoutError(`Registry table at ${config.registryUrl} has no rows`);
  }

  const columns = header.map(normalizeHeader);
  if (!columns.includes("Scheme")) {
    throw new RegistryLayoutError(
      `Registry table at ${config.registryUrl} has no Scheme column (found: ${columns.join(", ")})`,
    );
  }
  if (anchors.length !== dataRows.length) {
    throw new RegistryLayoutError(
      `Registry table at ${config.registryUrl} has ${dataRows.length} rows but ${anchors.length} links`,
    );
  }

  const schemes: SchemeSummary[] = [];
  const seenIds = new Set<string>();

  dataRows.forEach((cells, index) => {
    const sourceUrl = normalizeUrl(config.registryUrl, anchors[index]);
    const id = deriveSchemeId(sourceUrl, config.schemeLinkPrefix);
    if (!id) {
      logger.warn("registry_row_without_id", { url: sourceUrl, row: index + 1 });
      return;
    }
    if (seenIds.has(id)) {
      logger.warn("registry_duplicate_id_skipped", { schemeId: id, url: sourceUrl, row: index + 1 });
      return;
    }
    seenIds.add(id);

    const fields: Record<string, string> = {};
    columns.forEach((column, columnIndex) => {
      fields[column] = cells[columnIndex] ?? "";
    });

    schemes.push({
      id,
      name: fields.Scheme,
      targetCount: parseCount(fields.Target_Count, "Target_Count", logger, id),
      ctCount: parseCount(fields.CT_Count, "CT_Count", logger, id),
      sourceUrl,
      fields,
    });
  });

  return schemes;
}

export async function listSchemes(deps: RegistryDeps): Promise<SchemeSummary[]> {
  const { config, logger, metrics } = deps;
  logger.info("registry_fetch_start", { url: config.registryUrl });
  const stopTimer = metrics.startTimer("page_fetch_ms");

  let html: string;
  try {
    html = await fetchHtml(config.registryUrl, config, deps.fetchFn);
  } catch (error) {
    throw new RegistryFetchError(config.registryUrl, error);
  } finally {
    stopTimer();
  }
  metrics.incrementCounter("pages_fetched");

  const schemes = parseRegistryPage(html, config, logger);
  metrics.incrementCounter("schemes_listed", schemes.length);
  logger.info("registry_fetch_complete", { url: config.registryUrl, schemeCount: schemes.length });
  return schemes;
}
