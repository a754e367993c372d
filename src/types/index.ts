export type { ArchiveDestination, ExtractResult, SchemeDetail, SchemeSummary, VersionInfo } from "./models";
