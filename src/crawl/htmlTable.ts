import { load } from "cheerio";
import { NoTableFoundError } from "../core/errors";

export interface ExtractedTable {
  /** Cell text per row, header row included. */
  rows: string[][];
  /** Every anchor href inside the table, in document order. */
  anchors: string[];
}

function sanitizeCellText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function extractFirstTable(html: string, source?: string): ExtractedTable {
  const $ = load(html);
  const table = $("table").first();
  if (table.length === 0) {
    throw new NoTableFoundError(source);
  }

  table.find("br").replaceWith(" ");

  const rows: string[][] = [];
  table
    .find("tr")
    .filter((_, row) => $(row).closest("table").get(0) === table.get(0))
    .each((_, row) => {
      const cells = $(row)
        .children("th, td")
        .map((_, cell) => sanitizeCellText($(cell).text()))
        .get();
      rows.push(cells);
    });

  const anchors = table
    .find("a[href]")
    .map((_, anchor) => $(anchor).attr("href") ?? "")
    .get();

  return { rows, anchors };
}
