// src/lib/errors.ts

export type PipelineErrorCode =
  | "NOT_FOUND"
  | "VALIDATION_ERROR"
  | "UPSTREAM_UNAVAILABLE"
  | "INTERNAL_ERROR"
  | "CANCELLED";

export type UpstreamService =
  | "embedding"
  | "vector-search"
  | "llm"
  | "persistence";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed RFP or configuration. Never retried. */
export class ValidationError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("VALIDATION_ERROR", message);
    this.issues = issues;
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

/**
 * Timeout or transport failure of an external collaborator.
 * `status` is the HTTP status when the service answered at all.
 */
export class UpstreamError extends PipelineError {
  readonly service: UpstreamService;
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(
    service: UpstreamService,
    message: string,
    opts: { status?: number; timedOut?: boolean; cause?: unknown } = {}
  ) {
    super("UPSTREAM_UNAVAILABLE", message, { cause: opts.cause });
    this.service = service;
    this.status = opts.status;
    this.timedOut = opts.timedOut ?? false;
  }
}

export class AllocationInvariantError extends PipelineError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      "INTERNAL_ERROR",
      `Allocated test cost ${actual} does not reconcile with pool ${expected}`
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class RunCancelledError extends PipelineError {
  constructor(message = "Run cancelled") {
    super("CANCELLED", message);
  }
}

export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof UpstreamError)) return false;
  if (err.timedOut || err.status === undefined) return true;
  return err.status === 408 || err.status === 429 || err.status >= 500;
}

export function throwIfCancelled(signal?: AbortSignal) {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
