import { AceDimension, ACE_DIMENSIONS, TaskKind } from "./task";

export const SCORE_MIN = 0;
export const SCORE_MAX = 1;

export type DimensionScores = Partial<Record<AceDimension, number>>;

/**
 * Result of evaluating one task.
 *
 * Only dimensions the task's rubric declares are present. An absent
 * dimension means "not applicable", never zero. Instances are frozen.
 */
export interface ScoreVector {
  readonly taskId: string;
  readonly evaluatorKind: TaskKind;
  readonly evaluatedAt: string; // ISO date string
  readonly scores: Readonly<DimensionScores>;
  readonly confidence?: number; // model-derived scores only
  readonly feedback?: string;
}

export interface ScoreVectorInput {
  taskId: string;
  evaluatorKind: TaskKind;
  evaluatedAt: Date;
  scores: DimensionScores;
  confidence?: number;
  feedback?: string;
}

function inBounds(value: number): boolean {
  return Number.isFinite(value) && value >= SCORE_MIN && value <= SCORE_MAX;
}

export function createScoreVector(input: ScoreVectorInput): ScoreVector {
  const scores: DimensionScores = {};
  // Fixed dimension order keeps serialized vectors identical.
  for (const dimension of ACE_DIMENSIONS) {
    const value = input.scores[dimension];
    if (value === undefined) continue;
    if (!inBounds(value)) {
      throw new RangeError(`Score for ${dimension} out of bounds [${SCORE_MIN}, ${SCORE_MAX}]: ${value}`);
    }
    scores[dimension] = value;
  }

  if (input.confidence !== undefined && !inBounds(input.confidence)) {
    throw new RangeError(`Confidence out of bounds [0, 1]: ${input.confidence}`);
  }

  const vector: ScoreVector = {
    taskId: input.taskId,
    evaluatorKind: input.evaluatorKind,
    evaluatedAt: input.evaluatedAt.toISOString(),
    scores: Object.freeze(scores),
    ...(input.confidence !== undefined ? { confidence: input.confidence } : {}),
    ...(input.feedback ? { feedback: input.feedback } : {}),
  };
  return Object.freeze(vector);
}

/**
 * Clamp a 0..100 model score into the vector range.
 */
export function fromPercent(value: number): number {
  const clamped = Math.max(0, Math.min(100, value));
  return Math.round(clamped * 100) / 10000;
}
