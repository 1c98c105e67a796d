export type ErrorKind =
  | "InvalidInput"
  | "NotFound"
  | "Unauthorized"
  | "PayloadTooLarge"
  | "Transient"
  | "EngineUnavailable"
  | "InferenceFailure"
  | "Timeout"
  | "CapacityExceeded";

export type PipelineStage = "fetch" | "decode" | "inference" | "normalize" | "summarize";

export type ErrorCategory = "retrieval" | "processing";

/** Kinds a caller may retry as-is. */
const RETRYABLE: ReadonlySet<ErrorKind> = new Set(["Transient", "EngineUnavailable"]);

/**
 * Kinds the orchestrator itself attempts once more. `InferenceFailure` is
 * included to rule out transient resource exhaustion on the model server, but
 * is still reported to callers as not retryable.
 */
const RETRIED_INTERNALLY: ReadonlySet<ErrorKind> = new Set([...RETRYABLE, "InferenceFailure"]);

/**
 * Classified failure raised anywhere in the pipeline. `details` carries
 * identifiers only (bucket, key, status codes); never payload contents.
 */
export class PipelineError extends Error {
  readonly retryable: boolean;
  readonly category: ErrorCategory;

  constructor(
    readonly kind: ErrorKind,
    readonly stage: PipelineStage,
    message: string,
    readonly details: Readonly<Record<string, string | number | boolean>> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PipelineError";
    this.retryable = RETRYABLE.has(kind);
    this.category = stage === "fetch" ? "retrieval" : "processing";
  }
}

/** Wraps anything that is not already classified, keeping the original as `cause`. */
export function toPipelineError(error: unknown, stage: PipelineStage, fallback: ErrorKind): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError(fallback, stage, `${stage} failed: ${message}`, {}, { cause: error });
}

export function isRetriedInternally(error: unknown): boolean {
  return error instanceof PipelineError && RETRIED_INTERNALLY.has(error.kind);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
