/** Failure inside one of the composite operations, with the original error as `cause`. */
export class SkyframeError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "SkyframeError";
    this.operation = operation;
  }
}

/** Errors already raised by an inner operation keep that operation's name. */
export function wrapSkyframeError(operation: string, error: unknown): SkyframeError {
  return error instanceof SkyframeError ? error : new SkyframeError(operation, error);
}
