export { buildArchiveDestination, buildArchiveUrl, fetchAndExtract } from "./archiveFetcher";
export type { ArchiveFetcherDeps } from "./archiveFetcher";
