import type { SchemeSummary } from "../types";

export type SchemeToolErrorKind =
  | "RegistryFetchError"
  | "RegistryLayoutError"
  | "NoTableFound"
  | "DetailFetchError"
  | "MissingVersionInfo"
  | "DownloadError"
  | "ExtractError"
  | "UnknownSchemeId"
  | "InvalidFunctionArgument"
  | "ConfigError";

/**
 * Base class for every failure the tool reports to the user.
 * `kind` lets callers branch without `instanceof` chains.
 */
export abstract class SchemeToolError extends Error {
  abstract readonly kind: SchemeToolErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RegistryFetchError extends SchemeToolError {
  readonly kind = "RegistryFetchError";

  constructor(
    readonly url: string,
    cause: unknown,
  ) {
    super(`Failed to fetch scheme registry ${url}: ${describeError(cause)}`, { cause });
  }
}

export class RegistryLayoutError extends SchemeToolError {
  readonly kind = "RegistryLayoutError";
}

export class NoTableFoundError extends SchemeToolError {
  readonly kind = "NoTableFound";

  constructor(source?: string) {
    super(source ? `No <table> element found in ${source}` : "No <table> element found in page");
  }
}

export class DetailFetchError extends SchemeToolError {
  readonly kind = "DetailFetchError";

  constructor(
    readonly schemeId: string,
    readonly url: string,
    cause: unknown,
  ) {
    super(`Failed to fetch details of scheme ${schemeId} from ${url}: ${describeError(cause)}`, { cause });
  }
}

export class MissingVersionInfoError extends SchemeToolError {
  readonly kind = "MissingVersionInfo";

  constructor(
    readonly schemeId: string,
    readonly missing: ReadonlyArray<"Version" | "Last Change">,
  ) {
    super(`Cannot build archive name for ${schemeId}: missing ${missing.join(" and ")}`);
  }
}

export class DownloadError extends SchemeToolError {
  readonly kind = "DownloadError";

  constructor(
    readonly url: string,
    cause: unknown,
  ) {
    super(`Failed to download ${url}: ${describeError(cause)}`, { cause });
  }
}

export class ExtractError extends SchemeToolError {
  readonly kind = "ExtractError";

  constructor(
    readonly archivePath: string,
    cause: unknown,
  ) {
    super(`Failed to extract ${archivePath}: ${describeError(cause)}`, { cause });
  }
}

export class UnknownSchemeIdError extends SchemeToolError {
  readonly kind = "UnknownSchemeId";

  constructor(
    readonly schemeId: string,
    readonly available: readonly SchemeSummary[],
  ) {
    super(`Unknown scheme_ID: ${schemeId}`);
  }
}

export class InvalidFunctionArgumentError extends SchemeToolError {
  readonly kind = "InvalidFunctionArgument";

  constructor(readonly value: string) {
    super(`Invalid function: ${value}`);
  }
}

export class ConfigError extends SchemeToolError {
  readonly kind = "ConfigError";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
