import { LAST_CHANGE_KEY, NAME_KEY, VERSION_KEY } from "../resolve";
import type { ExtractResult, SchemeSummary, VersionInfo } from "../types";
import { formatTable, type TableColumn } from "./table";

const LISTING_COLUMNS: TableColumn[] = [
  { header: "scheme_ID", align: "left" },
  { header: "Scheme", align: "left" },
  { header: "Target_Count", align: "right" },
  { header: "CT_Count", align: "right" },
];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLocalTimestamp(now: Date): string {
  const date = [now.getFullYear(), pad(now.getMonth() + 1), pad(now.getDate())].join("-");
  const time = [pad(now.getHours()), pad(now.getMinutes()), pad(now.getSeconds())].join(":");
  return `${date} ${time}`;
}

/** Counts are shown as the registry prints them; parsed values fill in when a column is absent. */
export function formatSchemeListing(schemes: readonly SchemeSummary[]): string[] {
  return formatTable(
    LISTING_COLUMNS,
    schemes.map((scheme) => [
      scheme.id,
      scheme.name,
      scheme.fields.Target_Count ?? String(scheme.targetCount),
      scheme.fields.CT_Count ?? String(scheme.ctCount),
    ]),
  );
}

/** Shows whichever of Name, Version and Last Change the scheme page provides. */
export function formatVersionReport(info: VersionInfo): string[] {
  const present: Array<[string, string]> = [];
  if (info.name !== undefined) {
    present.push([NAME_KEY, info.name]);
  }
  if (info.version !== undefined) {
    present.push([VERSION_KEY, info.version]);
  }
  if (info.lastChangeRaw !== undefined) {
    present.push([LAST_CHANGE_KEY, info.lastChangeRaw]);
  }

  if (present.length === 0) {
    return [`No ${NAME_KEY}, ${VERSION_KEY} or ${LAST_CHANGE_KEY} information available.`];
  }

  return formatTable(
    present.map(([header]): TableColumn => ({ header, align: "left" })),
    [present.map(([, value]) => value)],
  );
}

export function formatExtractResult(result: ExtractResult): string[] {
  const { baseName } = result.destination;
  if (result.status === "exists") {
    const existingName = result.existing === "zip" ? `${baseName}.zip` : baseName;
    return [`${existingName} exists. Downloading aborted.`];
  }

  return [
    `Downloaded: ${baseName}.zip (${result.bytes} bytes, sha256 ${result.sha256})`,
    `Unzipped ${result.entryCount} files into scheme dir: ${baseName}`,
  ];
}
