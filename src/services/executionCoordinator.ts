import { FailureReason, SchemaError, UpstreamTimeout, retryBudgetExhausted, toFailureReason } from "../domain/errors";
import { EvaluatorRouter } from "../domain/router";
import { RetryPolicy, backoffDelayMs, hasAttemptsLeft } from "../domain/retryPolicy";
import { RubricWeightTable } from "../domain/rubric";
import { ScoreVector } from "../domain/scoreVector";
import { Task, TaskKind, toTaskRef } from "../domain/task";
import { FailedOutcome, TaskOutcome, TerminalOutcome } from "../domain/taskOutcome";
import { FaultLedger } from "../stores/faultLedger";
import { OutcomeStore } from "../stores/outcomeStore";
import { PipelineEventSink, silentEventSink } from "./pipelineEvents";

export interface CoordinatorSettings extends RetryPolicy {
  timeouts: Partial<Record<TaskKind, number>>;
  defaultTimeoutMs: number;
}

export interface CoordinatorDeps {
  router: EvaluatorRouter;
  rubric: RubricWeightTable;
  outcomes: OutcomeStore;
  ledger: FaultLedger;
  settings: CoordinatorSettings;
  events?: PipelineEventSink;
  clock?: () => Date;
  random?: () => number;
}

export type ExecutionResult =
  // This call ran an attempt and recorded its outcome
  | { type: "completed"; outcome: TaskOutcome }
  // Redelivery of a task that already reached a terminal state
  | { type: "duplicate"; outcome: TerminalOutcome }
  // Another worker holds the claim
  | { type: "in_flight" }
  // Delivered before its retry backoff elapsed
  | { type: "not_due"; outcome: FailedOutcome };

export type OutcomeListener = (outcome: TaskOutcome) => void;

/**
 * ExecutionCoordinator drives one delivery of a task through
 * claim → route → evaluate (with timeout) → record.
 *
 * Redelivery is safe: a terminal task short-circuits to its stored outcome
 * without touching the evaluator. Retry scheduling is left to the caller,
 * which re-enqueues failed outcomes at `retryAt`.
 */
export class ExecutionCoordinator {
  private readonly events: PipelineEventSink;
  private readonly clock: () => Date;
  private readonly random: () => number;
  private readonly listeners: OutcomeListener[] = [];

  constructor(private readonly deps: CoordinatorDeps) {
    this.events = deps.events ?? silentEventSink;
    this.clock = deps.clock ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  onOutcome(listener: OutcomeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  timeoutFor(kind: TaskKind): number {
    return this.deps.settings.timeouts[kind] ?? this.deps.settings.defaultTimeoutMs;
  }

  async execute(task: Task): Promise<ExecutionResult> {
    const previous = this.deps.outcomes.get(task.taskId);
    const claim = this.deps.outcomes.claim(task.taskId, this.clock());

    if (claim.type === "terminal") {
      this.emitDuplicate(task.taskId, claim.outcome.status);
      return { type: "duplicate", outcome: claim.outcome };
    }
    if (claim.type === "in_flight") {
      this.emitDuplicate(task.taskId, "in_flight");
      return { type: "in_flight" };
    }
    if (claim.type === "not_due") {
      return { type: "not_due", outcome: claim.outcome };
    }

    const attempt = claim.attempt;
    this.events({
      type: "task_transition",
      taskId: task.taskId,
      kind: task.kind,
      from: previous?.state ?? "pending",
      to: "evaluating",
      attempt,
      at: this.clock().toISOString(),
    });

    let outcome: TaskOutcome;
    try {
      try {
        const scoreVector = await this.evaluateOnce(task);
        outcome = this.succeeded(task, attempt, scoreVector);
      } catch (error) {
        outcome = this.failed(task, attempt, toFailureReason(error));
      }
      this.deps.outcomes.record(outcome);
    } catch (error) {
      this.deps.outcomes.release(task.taskId, this.clock());
      throw error;
    }

    this.publish(outcome);
    return { type: "completed", outcome };
  }

  private async evaluateOnce(task: Task): Promise<ScoreVector> {
    const evaluator = this.deps.router.route(task);
    const rubric = this.deps.rubric.resolve(task.assignmentId, task.rubricRef);
    if (!rubric) {
      throw new SchemaError(`Unknown rubric "${task.rubricRef}" for assignment ${task.assignmentId}`);
    }

    const timeoutMs = this.timeoutFor(task.kind);
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new UpstreamTimeout(`${task.kind} evaluation exceeded ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        evaluator.evaluate(task, { rubric, signal: controller.signal, now: this.clock }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private succeeded(task: Task, attempt: number, scoreVector: ScoreVector): TaskOutcome {
    return {
      ...toTaskRef(task),
      status: "succeeded",
      scoreVector,
      attemptCount: attempt,
      recordedAt: this.clock().toISOString(),
    };
  }

  private failed(task: Task, attempt: number, reason: FailureReason): TaskOutcome {
    const now = this.clock();
    if (reason.retryable && hasAttemptsLeft(this.deps.settings, attempt)) {
      const delayMs = backoffDelayMs(this.deps.settings, attempt, this.random);
      return {
        ...toTaskRef(task),
        status: "failed",
        reason,
        attemptCount: attempt,
        retryAt: new Date(now.getTime() + delayMs).toISOString(),
        recordedAt: now.toISOString(),
      };
    }

    return {
      ...toTaskRef(task),
      status: "dead_lettered",
      reason: reason.retryable ? retryBudgetExhausted(reason, attempt) : reason,
      attemptCount: attempt,
      recordedAt: now.toISOString(),
    };
  }

  private publish(outcome: TaskOutcome): void {
    this.events({
      type: "task_transition",
      taskId: outcome.taskId,
      kind: outcome.kind,
      from: "evaluating",
      to: outcome.status,
      attempt: outcome.attemptCount,
      at: outcome.recordedAt,
    });

    if (outcome.status === "failed") {
      this.deps.ledger.append({
        taskId: outcome.taskId,
        learnerId: outcome.learnerId,
        assignmentId: outcome.assignmentId,
        kind: outcome.kind,
        rubricRef: outcome.rubricRef,
        status: "failed",
        attemptCount: outcome.attemptCount,
        reason: outcome.reason,
        timestamp: outcome.recordedAt,
      });
      this.events({
        type: "task_retry_scheduled",
        taskId: outcome.taskId,
        attempt: outcome.attemptCount,
        delayMs: Date.parse(outcome.retryAt) - Date.parse(outcome.recordedAt),
        reason: outcome.reason,
        at: outcome.recordedAt,
      });
    } else if (outcome.status === "dead_lettered") {
      this.deps.ledger.append({
        taskId: outcome.taskId,
        learnerId: outcome.learnerId,
        assignmentId: outcome.assignmentId,
        kind: outcome.kind,
        rubricRef: outcome.rubricRef,
        status: "dead_lettered",
        attemptCount: outcome.attemptCount,
        reason: outcome.reason,
        timestamp: outcome.recordedAt,
      });
      console.warn(`[Coordinator] Dead-lettered ${outcome.taskId}: ${outcome.reason.code} ${outcome.reason.message}`);
      this.events({
        type: "task_dead_lettered",
        taskId: outcome.taskId,
        assignmentId: outcome.assignmentId,
        attempts: outcome.attemptCount,
        reason: outcome.reason,
        at: outcome.recordedAt,
      });
    }

    for (const listener of [...this.listeners]) {
      try {
        listener(outcome);
      } catch (error) {
        console.error(`[Coordinator] Outcome listener failed for ${outcome.taskId}:`, error);
      }
    }
  }

  private emitDuplicate(taskId: string, status: "succeeded" | "dead_lettered" | "in_flight"): void {
    this.events({ type: "task_duplicate_delivery", taskId, status, at: this.clock().toISOString() });
  }
}
