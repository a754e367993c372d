import type { AppConfig } from "../config";
import { DetailFetchError } from "../core/errors";
import { fetchHtml, type FetchFn } from "../core/fetch";
import type { Logger, MetricsRegistry } from "../observability";
import type { SchemeDetail } from "../types";
import { extractFirstTable } from "./htmlTable";

export interface SchemeDetailDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

export function buildDetailUrl(config: AppConfig, schemeId: string): string {
  return `${config.detailBaseUrl}${encodeURIComponent(schemeId)}/`;
}

/**
 * Folds two-column label/value rows into a mapping. A blank label continues
 * the previous one; a repeated label appends its value with "; ".
 */
export function foldDetailRows(rows: readonly string[][]): Map<string, string> {
  const grouped = new Map<string, string[]>();
  let currentKey: string | undefined;

  for (const row of rows) {
    if (row.length < 2) {
      continue;
    }
    const [label, value] = row;
    if (label !== "") {
      currentKey = label;
    }
    if (currentKey === undefined) {
      continue;
    }

    const values = grouped.get(currentKey) ?? [];
    values.push(value);
    grouped.set(currentKey, values);
  }

  const detail = new Map<string, string>();
  for (const [key, values] of grouped) {
    detail.set(key, values.join("; "));
  }
  return detail;
}

export async function fetchSchemeDetail(schemeId: string, deps: SchemeDetailDeps): Promise<SchemeDetail> {
  const { config, logger, metrics } = deps;
  const url = buildDetailUrl(config, schemeId);
  logger.info("detail_fetch_start", { schemeId, url });
  const stopTimer = metrics.startTimer("page_fetch_ms");

  let html: string;
  try {
    html = await fetchHtml(url, config, deps.fetchFn);
  } catch (error) {
    throw new DetailFetchError(schemeId, url, error);
  } finally {
    stopTimer();
  }
  metrics.incrementCounter("pages_fetched");

  const { rows } = extractFirstTable(html, url);
  const detail = foldDetailRows(rows);
  logger.info("detail_fetch_complete", { schemeId, url, keys: [...detail.keys()] });
  return detail;
}
