/** Configuration problem in the entity catalog. Fatal at startup. */
export class CatalogConfigError extends Error {
  constructor(
    message: string,
    readonly conflicts: Array<{ name: string; entityIds: string[] }> = []
  ) {
    super(message);
    this.name = "CatalogConfigError";
  }
}

export type ScoringFailure = "timeout" | "malformed" | "quota" | "unavailable";

/**
 * Failure of a scoring backend. Transient failures are retried by the
 * enrichment engine; anything else defers the comment immediately.
 */
export class ScoringError extends Error {
  constructor(
    message: string,
    readonly reason: ScoringFailure,
    readonly transient: boolean = true,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "ScoringError";
  }
}

/**
 * A uniqueness violation that escaped the upsert path. Means a batch was
 * written out of order; aborts that batch only.
 */
export class SignalConflictError extends Error {
  constructor(message: string, readonly commentIds: string[]) {
    super(message);
    this.name = "SignalConflictError";
  }
}

export class ReviewStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReviewStateError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
