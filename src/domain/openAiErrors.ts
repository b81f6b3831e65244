import { EvaluationError, SchemaError, UpstreamFailure, UpstreamTimeout } from "./errors";

const RETRYABLE_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504]);

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

/**
 * Map an error thrown by the OpenAI SDK to the evaluation taxonomy.
 * `badRequestMeansCorruptInput` is set for uploads, where a 400 means
 * the file itself was rejected.
 */
export function classifyOpenAiError(
  error: unknown,
  signal: AbortSignal,
  operation: string,
  badRequestMeansCorruptInput = false
): EvaluationError {
  if (error instanceof EvaluationError) {
    return error;
  }
  if (signal.aborted) {
    return new UpstreamTimeout(`${operation} aborted after timeout`);
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);

  if (status === undefined) {
    // No HTTP response: the request never reached the API
    return new UpstreamFailure(`${operation} failed: ${message}`);
  }
  if (RETRYABLE_STATUSES.has(status)) {
    return new UpstreamFailure(`${operation} failed with HTTP ${status}: ${message}`);
  }
  if (status === 400 && badRequestMeansCorruptInput) {
    return new SchemaError(`${operation} rejected the input: ${message}`);
  }
  return new UpstreamFailure(`${operation} failed with HTTP ${status}: ${message}`, false);
}
