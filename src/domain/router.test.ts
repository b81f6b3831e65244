import { AceScorer } from "./aceScorer";
import { UnsupportedKindError } from "./errors";
import { Evaluator } from "./evaluator";
import { HeuristicAceScorer } from "./heuristicAceScorer";
import { McqEvaluator } from "./mcqEvaluator";
import { EvaluatorRouter, createDefaultRouter } from "./router";
import { createScoreVector } from "./scoreVector";
import { UnavailableTranscriber } from "./transcriber";

describe("EvaluatorRouter", () => {
  const scorer: AceScorer = new HeuristicAceScorer();

  it("should route built-in kinds to their evaluators", () => {
    const router = createDefaultRouter({ scorer, transcriber: new UnavailableTranscriber() });

    expect(router.route({ kind: "MCQ" })).toBeInstanceOf(McqEvaluator);
    expect(router.route({ kind: "TEXT" }).kind).toBe("TEXT");
    expect(router.route({ kind: "AUDIO" }).kind).toBe("AUDIO");
    expect(router.supportedKinds()).toEqual(["AUDIO", "MCQ", "TEXT"]);
  });

  it("should throw UnsupportedKindError for unknown kinds", () => {
    const router = createDefaultRouter({ scorer, transcriber: new UnavailableTranscriber() });

    expect(() => router.route({ kind: "ESSAY_RUBRIC_V2" })).toThrow(UnsupportedKindError);
    expect(() => router.route({ kind: "ESSAY_RUBRIC_V2" })).toThrow(
      'No evaluator registered for task kind "ESSAY_RUBRIC_V2"'
    );
    expect(router.supports("ESSAY_RUBRIC_V2")).toBe(false);
  });

  it("should accept new kinds without touching existing evaluators", () => {
    const router = createDefaultRouter({ scorer, transcriber: new UnavailableTranscriber() });
    const mcq = router.route({ kind: "MCQ" });
    const essay: Evaluator = {
      kind: "ESSAY_RUBRIC_V2",
      evaluate: async (task, context) =>
        createScoreVector({
          taskId: task.taskId,
          evaluatorKind: "ESSAY_RUBRIC_V2",
          evaluatedAt: context.now(),
          scores: { communication: 1 },
        }),
    };

    router.register(essay);

    expect(router.route({ kind: "ESSAY_RUBRIC_V2" })).toBe(essay);
    expect(router.route({ kind: "MCQ" })).toBe(mcq);
  });

  it("should be empty until evaluators are registered", () => {
    expect(new EvaluatorRouter().supportedKinds()).toEqual([]);
  });
});
