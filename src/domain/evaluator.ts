import { RubricEntry } from "./rubric";
import { ScoreVector } from "./scoreVector";
import { Task, TaskKind } from "./task";

export interface EvaluationContext {
  rubric: RubricEntry;
  // Aborted when the coordinator's per-kind timeout fires.
  signal: AbortSignal;
  now(): Date;
}

export interface Evaluator {
  readonly kind: TaskKind;

  /**
   * Score one task against its rubric.
   * Reads only the task payload and the rubric; writes nothing but the
   * returned ScoreVector. Failures are thrown as EvaluationError.
   */
  evaluate(task: Task, context: EvaluationContext): Promise<ScoreVector>;
}
