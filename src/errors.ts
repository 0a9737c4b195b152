/**
 * Raised when bundled data (country catalog, source config) breaks an
 * invariant the pipeline relies on. Aborts the run; never recovered from.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

/** The controller rejected a region blocking write. Fatal to the configure run. */
export class ApplyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ApplyError";
  }
}

export interface ErrorRecord {
  message: string;
  stack?: string;
}

export function toErrorRecord(error: unknown): ErrorRecord {
  return {
    message: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
