import { FailureReason } from "./errors";
import { ScoreVector } from "./scoreVector";
import { TaskRef } from "./task";

// ============================================
// Task lifecycle
// ============================================

/**
 * pending → evaluating → succeeded
 *                      → failed → (backoff) → evaluating
 *                      → dead_lettered
 */
export type TaskState = "pending" | "evaluating" | "succeeded" | "failed" | "dead_lettered";

interface OutcomeBase extends TaskRef {
  attemptCount: number;
  recordedAt: string; // ISO date string
}

export interface SucceededOutcome extends OutcomeBase {
  status: "succeeded";
  scoreVector: ScoreVector;
}

export interface FailedOutcome extends OutcomeBase {
  status: "failed";
  reason: FailureReason;
  retryAt: string; // ISO date string
}

export interface DeadLetteredOutcome extends OutcomeBase {
  status: "dead_lettered";
  reason: FailureReason;
}

export type TaskOutcome = SucceededOutcome | FailedOutcome | DeadLetteredOutcome;

export type TerminalOutcome = SucceededOutcome | DeadLetteredOutcome;

export function isTerminal(outcome: TaskOutcome): outcome is TerminalOutcome {
  return outcome.status === "succeeded" || outcome.status === "dead_lettered";
}
