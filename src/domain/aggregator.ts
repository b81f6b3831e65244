/**
 * Report aggregation
 *
 * Folds task outcomes for one (learner, assignment) pair into a Report.
 *
 * - aggregate() is a pure function of its inputs: same outcomes (in any
 *   order, with any duplicates) give a bit-identical Report
 * - Only outcomes for tasks in the expected manifest count
 * - Dimensions nobody scored are omitted and listed as gaps, never 0
 * - Reports come back deep-frozen
 */

import { RubricWeightTable } from "./rubric";
import { SucceededOutcome, TaskOutcome } from "./taskOutcome";
import { AceDimension, ACE_DIMENSIONS } from "./task";

// ============================================
// Types
// ============================================

export interface DimensionAggregate {
  score: number; // weighted mean, 0..1
  totalWeight: number;
  contributingTaskIds: string[];
  // Mean confidence of contributing model-scored tasks. Informational only.
  meanConfidence?: number;
}

export type ReportStatus = "final" | "partial";

export interface Report {
  learnerId: string;
  assignmentId: string;
  status: ReportStatus;
  completeness: number; // succeeded / expected
  expectedTaskCount: number;
  succeededTaskCount: number;
  dimensions: Partial<Record<AceDimension, DimensionAggregate>>;
  missingDimensions: AceDimension[];
  overallScore?: number;
  passed?: boolean;
  excellence?: boolean;
  incompleteTaskIds: string[];
  deadLetteredTaskIds: string[];
  withdrawn: boolean;
}

export interface ReportPolicy {
  aceWeights: Record<AceDimension, number>;
  passingScore: number;
  excellenceThreshold: number;
}

export const DEFAULT_REPORT_POLICY: ReportPolicy = {
  aceWeights: { analysis: 0.4, communication: 0.3, evaluation: 0.3 },
  passingScore: 0.7,
  excellenceThreshold: 0.9,
};

export interface AggregateOptions {
  expectedTaskIds: Iterable<string>;
  rubric: RubricWeightTable;
  policy?: ReportPolicy;
  // Outcomes recorded after this instant are ignored
  withdrawnAt?: string;
  isDeadLettered?: (taskId: string) => boolean;
}

// ============================================
// Aggregation
// ============================================

export function aggregate(
  learnerId: string,
  assignmentId: string,
  outcomes: Iterable<TaskOutcome>,
  options: AggregateOptions
): Report {
  const policy = options.policy ?? DEFAULT_REPORT_POLICY;
  const expected = [...new Set(options.expectedTaskIds)].sort();
  const expectedSet = new Set(expected);
  const cutoff = options.withdrawnAt === undefined ? undefined : Date.parse(options.withdrawnAt);

  const relevant: TaskOutcome[] = [];
  for (const outcome of outcomes) {
    if (outcome.learnerId !== learnerId || outcome.assignmentId !== assignmentId) continue;
    if (!expectedSet.has(outcome.taskId)) continue;
    if (cutoff !== undefined && Date.parse(outcome.recordedAt) > cutoff) continue;
    relevant.push(outcome);
  }

  const byTask = collapseByTask(relevant);
  const succeeded = expected
    .map((taskId) => byTask.get(taskId))
    .filter((o): o is SucceededOutcome => o?.status === "succeeded");

  const dimensions: Partial<Record<AceDimension, DimensionAggregate>> = {};
  const missingDimensions: AceDimension[] = [];
  for (const dimension of ACE_DIMENSIONS) {
    const aggregateForDimension = aggregateDimension(dimension, succeeded, options.rubric);
    if (aggregateForDimension) {
      dimensions[dimension] = aggregateForDimension;
    } else {
      missingDimensions.push(dimension);
    }
  }

  const incompleteTaskIds = expected.filter((taskId) => byTask.get(taskId)?.status !== "succeeded");
  const deadLetteredTaskIds = incompleteTaskIds.filter(
    (taskId) => byTask.get(taskId)?.status === "dead_lettered" || options.isDeadLettered?.(taskId) === true
  );

  const completeness = expected.length === 0 ? 1 : succeeded.length / expected.length;
  const overallScore = computeOverall(dimensions, policy);

  return freezeReport({
    learnerId,
    assignmentId,
    status: completeness === 1 ? "final" : "partial",
    completeness,
    expectedTaskCount: expected.length,
    succeededTaskCount: succeeded.length,
    dimensions,
    missingDimensions,
    ...(overallScore !== undefined
      ? {
          overallScore,
          passed: overallScore >= policy.passingScore,
          excellence: overallScore >= policy.excellenceThreshold,
        }
      : {}),
    incompleteTaskIds,
    deadLetteredTaskIds,
    withdrawn: options.withdrawnAt !== undefined,
  });
}

function freezeReport(report: Report): Report {
  for (const dimension of ACE_DIMENSIONS) {
    const agg = report.dimensions[dimension];
    if (agg) {
      Object.freeze(agg.contributingTaskIds);
      Object.freeze(agg);
    }
  }
  Object.freeze(report.dimensions);
  Object.freeze(report.missingDimensions);
  Object.freeze(report.incompleteTaskIds);
  Object.freeze(report.deadLetteredTaskIds);
  return Object.freeze(report);
}

const STATUS_RANK: Record<TaskOutcome["status"], number> = {
  succeeded: 0,
  dead_lettered: 1,
  failed: 2,
};

/**
 * One outcome per task. Redelivery can leave several; pick one by a rule
 * that does not depend on input order.
 */
function collapseByTask(outcomes: TaskOutcome[]): Map<string, TaskOutcome> {
  const byTask = new Map<string, TaskOutcome>();
  for (const outcome of outcomes) {
    const current = byTask.get(outcome.taskId);
    if (!current || compareOutcomes(outcome, current) < 0) {
      byTask.set(outcome.taskId, outcome);
    }
  }
  return byTask;
}

function compareOutcomes(a: TaskOutcome, b: TaskOutcome): number {
  const rank = STATUS_RANK[a.status] - STATUS_RANK[b.status];
  if (rank !== 0) return rank;
  const time = Date.parse(a.recordedAt) - Date.parse(b.recordedAt);
  if (time !== 0) return time;
  const sa = JSON.stringify(a);
  const sb = JSON.stringify(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

// `succeeded` is sorted by task id, so floating-point sums run in one order
function aggregateDimension(
  dimension: AceDimension,
  succeeded: SucceededOutcome[],
  rubric: RubricWeightTable
): DimensionAggregate | null {
  let weightedSum = 0;
  let totalWeight = 0;
  let confidenceSum = 0;
  let confidenceCount = 0;
  const contributingTaskIds: string[] = [];

  for (const outcome of succeeded) {
    const score = outcome.scoreVector.scores[dimension];
    if (score === undefined) continue;
    const weight = rubric.weightFor(outcome.assignmentId, outcome.rubricRef, dimension);
    if (weight === undefined) {
      console.warn(`[Aggregator] No rubric weight for ${outcome.rubricRef}/${dimension}; skipping ${outcome.taskId}`);
      continue;
    }

    weightedSum += score * weight;
    totalWeight += weight;
    contributingTaskIds.push(outcome.taskId);
    if (outcome.scoreVector.confidence !== undefined) {
      confidenceSum += outcome.scoreVector.confidence;
      confidenceCount++;
    }
  }

  if (contributingTaskIds.length === 0) {
    return null;
  }

  return {
    score: weightedSum / totalWeight,
    totalWeight,
    contributingTaskIds,
    ...(confidenceCount > 0 ? { meanConfidence: confidenceSum / confidenceCount } : {}),
  };
}

function computeOverall(
  dimensions: Partial<Record<AceDimension, DimensionAggregate>>,
  policy: ReportPolicy
): number | undefined {
  let weightedSum = 0;
  let totalWeight = 0;
  for (const dimension of ACE_DIMENSIONS) {
    const agg = dimensions[dimension];
    const weight = policy.aceWeights[dimension];
    if (!agg || weight <= 0) continue;
    weightedSum += agg.score * weight;
    totalWeight += weight;
  }
  return totalWeight > 0 ? weightedSum / totalWeight : undefined;
}
