export { extractFirstTable } from "./htmlTable";
export type { ExtractedTable } from "./htmlTable";
export { deriveSchemeId, listSchemes, parseRegistryPage } from "./registry";
export type { RegistryDeps } from "./registry";
export { buildDetailUrl, fetchSchemeDetail, foldDetailRows } from "./schemeDetail";
export type { SchemeDetailDeps } from "./schemeDetail";
