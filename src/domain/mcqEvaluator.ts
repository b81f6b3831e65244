import { Evaluator, EvaluationContext } from "./evaluator";
import { SchemaError } from "./errors";
import { DimensionScores, ScoreVector, createScoreVector } from "./scoreVector";
import { McqPayload, Task, describeIssues, mcqPayloadSchema } from "./task";

interface McqTally {
  total: number;
  correct: number;
  accuracy: number; // 0..1
}

/**
 * McqEvaluator scores multiple-choice answers by comparing the selected
 * option against the key. Deterministic, so it never reports confidence.
 *
 * MCQ can only evidence analysis and evaluation; communication is never
 * scored here even when the rubric declares it.
 */
export class McqEvaluator implements Evaluator {
  readonly kind = "MCQ";

  async evaluate(task: Task, context: EvaluationContext): Promise<ScoreVector> {
    const parsed = mcqPayloadSchema.safeParse(task.payload);
    if (!parsed.success) {
      throw new SchemaError(`Invalid MCQ payload for ${task.taskId}: ${describeIssues(parsed.error)}`);
    }

    const { weights } = context.rubric;
    if (weights.analysis === undefined && weights.evaluation === undefined) {
      throw new SchemaError(
        `Rubric ${context.rubric.rubricRef} declares no dimension an MCQ can score (analysis or evaluation)`
      );
    }

    const tally = tallyAnswers(parsed.data);
    const scores: DimensionScores = {};
    if (weights.analysis !== undefined) scores.analysis = tally.accuracy;
    if (weights.evaluation !== undefined) scores.evaluation = tally.accuracy;

    return createScoreVector({
      taskId: task.taskId,
      evaluatorKind: this.kind,
      evaluatedAt: context.now(),
      scores,
      feedback: describeTally(tally),
    });
  }
}

function normalizeOption(value: string): string {
  return value.trim().toLowerCase();
}

export function tallyAnswers(payload: McqPayload): McqTally {
  const answers = "answers" in payload ? payload.answers : [payload];
  const correct = answers.filter((a) => normalizeOption(a.selected) === normalizeOption(a.key)).length;
  return { total: answers.length, correct, accuracy: correct / answers.length };
}

function describeTally(tally: McqTally): string {
  const pct = tally.accuracy * 100;
  let level: string;
  if (pct >= 90) level = "Excellent";
  else if (pct >= 80) level = "Good";
  else if (pct >= 70) level = "Satisfactory";
  else level = "Needs improvement";

  return `${level}: ${tally.correct}/${tally.total} correct (${pct.toFixed(1)}%).`;
}
