/**
 * Failure taxonomy for task evaluation.
 *
 * Evaluators throw EvaluationError subclasses. The execution coordinator
 * turns whatever was thrown into a FailureReason and decides between
 * retry and dead-letter from its `retryable` flag; nothing downstream of
 * the coordinator ever sees a raw error.
 */

export type FailureCode =
  | "SCHEMA_ERROR"
  | "UPSTREAM_TIMEOUT"
  | "UPSTREAM_FAILURE"
  | "UNSUPPORTED_KIND"
  | "RETRY_BUDGET_EXHAUSTED";

export interface FailureReason {
  code: FailureCode;
  message: string;
  retryable: boolean;
  // Set on RETRY_BUDGET_EXHAUSTED: the failure of the last attempt.
  cause?: FailureReason;
}

export class EvaluationError extends Error {
  readonly code: Exclude<FailureCode, "RETRY_BUDGET_EXHAUSTED">;
  readonly retryable: boolean;

  constructor(code: Exclude<FailureCode, "RETRY_BUDGET_EXHAUSTED">, message: string, retryable: boolean) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
  }
}

/** Malformed task payload or rubric. Never retried. */
export class SchemaError extends EvaluationError {
  constructor(message: string) {
    super("SCHEMA_ERROR", message, false);
  }
}

/** The evaluator ran past its configured duration. */
export class UpstreamTimeout extends EvaluationError {
  constructor(message: string) {
    super("UPSTREAM_TIMEOUT", message, true);
  }
}

/**
 * A model or service call failed. Retryable unless the upstream rejected
 * the request in a way another attempt cannot fix (bad credentials, a
 * request it will never accept).
 */
export class UpstreamFailure extends EvaluationError {
  constructor(message: string, retryable = true) {
    super("UPSTREAM_FAILURE", message, retryable);
  }
}

export class UnsupportedKindError extends EvaluationError {
  readonly kind: string;

  constructor(kind: string) {
    super("UNSUPPORTED_KIND", `No evaluator registered for task kind "${kind}"`, false);
    this.kind = kind;
  }
}

export function toFailureReason(error: unknown): FailureReason {
  if (error instanceof EvaluationError) {
    return { code: error.code, message: error.message, retryable: error.retryable };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: "UPSTREAM_FAILURE", message: message || "Unknown evaluator error", retryable: true };
}

export function retryBudgetExhausted(last: FailureReason, attempts: number): FailureReason {
  return {
    code: "RETRY_BUDGET_EXHAUSTED",
    message: `Gave up after ${attempts} attempt(s): ${last.message}`,
    retryable: false,
    cause: last,
  };
}
