import { AceScorer } from "./aceScorer";
import { Evaluator, EvaluationContext } from "./evaluator";
import { SchemaError, UpstreamFailure } from "./errors";
import { declaredDimensions } from "./rubric";
import { DimensionScores, ScoreVector, createScoreVector } from "./scoreVector";
import { Task, TaskKind, describeIssues, textPayloadSchema } from "./task";

export interface AceScoringInput {
  text: string;
  prompt?: string;
  medium: "written" | "spoken";
  // Upper bound on the reported confidence (e.g. from transcription)
  confidenceCap?: number;
}

/**
 * Run the ACE scorer over a piece of text and turn its answer into a
 * ScoreVector. Shared by the text and audio evaluators.
 */
export async function scoreText(
  scorer: AceScorer,
  task: Task,
  evaluatorKind: TaskKind,
  context: EvaluationContext,
  input: AceScoringInput
): Promise<ScoreVector> {
  const dimensions = declaredDimensions(context.rubric);
  const result = await scorer.score({
    text: input.text,
    prompt: input.prompt,
    dimensions,
    medium: input.medium,
    signal: context.signal,
  });

  // Keep only declared dimensions even if the scorer returned more
  const scores: DimensionScores = {};
  const missing: string[] = [];
  for (const dimension of dimensions) {
    const value = result.scores[dimension];
    if (value === undefined) missing.push(dimension);
    else scores[dimension] = value;
  }
  if (missing.length > 0) {
    throw new UpstreamFailure(`Scorer ${scorer.model} did not score: ${missing.join(", ")}`);
  }

  const confidence =
    input.confidenceCap === undefined ? result.confidence : Math.min(result.confidence, input.confidenceCap);

  try {
    return createScoreVector({
      taskId: task.taskId,
      evaluatorKind,
      evaluatedAt: context.now(),
      scores,
      confidence,
      feedback: result.feedback,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UpstreamFailure(`Scorer ${scorer.model} returned an invalid score: ${message}`);
  }
}

/**
 * TextEvaluator scores free-text answers with an AceScorer.
 */
export class TextEvaluator implements Evaluator {
  readonly kind = "TEXT";

  constructor(private readonly scorer: AceScorer) {}

  async evaluate(task: Task, context: EvaluationContext): Promise<ScoreVector> {
    const parsed = textPayloadSchema.safeParse(task.payload);
    if (!parsed.success) {
      throw new SchemaError(`Invalid TEXT payload for ${task.taskId}: ${describeIssues(parsed.error)}`);
    }

    return scoreText(this.scorer, task, this.kind, context, {
      text: parsed.data.text,
      prompt: parsed.data.prompt,
      medium: "written",
    });
  }
}
