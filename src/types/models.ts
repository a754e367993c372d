export interface SchemeSummary {
  id: string;
  name: string;
  targetCount: number;
  ctCount: number;
  sourceUrl: string;
  /** Every column of the registry row, keyed by its underscore-normalised header. */
  fields: Readonly<Record<string, string>>;
}

/** Label/value pairs of a scheme detail page, in first-appearance order. */
export type SchemeDetail = ReadonlyMap<string, string>;

export interface VersionInfo {
  name?: string;
  version?: string;
  lastChangeRaw?: string;
  lastChangeParsed?: Date;
}

export interface ArchiveDestination {
  baseName: string;
  zipPath: string;
  dirPath: string;
  zipExists: boolean;
  dirExists: boolean;
}

export type ExtractResult =
  | {
      status: "exists";
      destination: ArchiveDestination;
      existing: "zip" | "dir";
    }
  | {
      status: "extracted";
      destination: ArchiveDestination;
      url: string;
      bytes: number;
      sha256: string;
      entryCount: number;
    };
