/** Raised before any work is dispatched when the run cannot start at all. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The remote source answered definitively that the item cannot be served. */
export class PermanentRemoteError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = "PermanentRemoteError";
    this.statusCode = statusCode;
  }
}

function hasStringField<K extends string>(error: unknown, key: K): error is Record<K, string> {
  return typeof error === "object" && error !== null && key in error && typeof Reflect.get(error, key) === "string";
}

/** fs errors raised inside a Jest sandbox fail `instanceof Error`, so fields are read structurally. */
export function errorMessage(error: unknown): string {
  return hasStringField(error, "message") ? error.message : String(error);
}

/** ENOENT, or ENOTDIR when a parent path component is a regular file. */
export function isMissingFileError(error: unknown): boolean {
  return hasStringField(error, "code") && (error.code === "ENOENT" || error.code === "ENOTDIR");
}
