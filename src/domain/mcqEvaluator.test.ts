import { McqEvaluator, tallyAnswers } from "./mcqEvaluator";
import { EvaluationContext } from "./evaluator";
import { SchemaError } from "./errors";
import { RubricEntry } from "./rubric";
import { Task } from "./task";

function makeTask(payload: unknown): Task {
  return {
    taskId: "q1",
    learnerId: "learner-1",
    assignmentId: "quiz-1",
    kind: "MCQ",
    payload,
    rubricRef: "mcq-basic",
  };
}

function makeContext(weights: RubricEntry["weights"]): EvaluationContext {
  return {
    rubric: { rubricRef: "mcq-basic", weights },
    signal: new AbortController().signal,
    now: () => new Date("2026-03-01T10:00:00.000Z"),
  };
}

describe("McqEvaluator", () => {
  let evaluator: McqEvaluator;

  beforeEach(() => {
    evaluator = new McqEvaluator();
  });

  it("should score a correct single answer as full analysis", async () => {
    const result = await evaluator.evaluate(makeTask({ selected: "B", key: "B" }), makeContext({ analysis: 1 }));

    expect(result.scores).toEqual({ analysis: 1 });
    expect(result.confidence).toBeUndefined();
    expect(result.evaluatorKind).toBe("MCQ");
    expect(result.feedback).toBe("Excellent: 1/1 correct (100.0%).");
  });

  it("should score a wrong answer as zero", async () => {
    const result = await evaluator.evaluate(makeTask({ selected: "A", key: "B" }), makeContext({ analysis: 1 }));

    expect(result.scores).toEqual({ analysis: 0 });
    expect(result.feedback).toBe("Needs improvement: 0/1 correct (0.0%).");
  });

  it("should never score communication even when the rubric declares it", async () => {
    const payload = {
      answers: [
        { questionId: "a", selected: "A", key: "A" },
        { questionId: "b", selected: "c", key: "C" },
        { questionId: "c", selected: "D", key: "B" },
        { questionId: "d", selected: 2, key: "2" },
      ],
    };

    const result = await evaluator.evaluate(
      makeTask(payload),
      makeContext({ analysis: 1, communication: 1, evaluation: 2 })
    );

    expect(result.scores).toEqual({ analysis: 0.75, evaluation: 0.75 });
    expect(result.feedback).toBe("Satisfactory: 3/4 correct (75.0%).");
  });

  it("should reject a malformed payload with SchemaError", async () => {
    await expect(evaluator.evaluate(makeTask({ answer: "B" }), makeContext({ analysis: 1 }))).rejects.toThrow(
      SchemaError
    );
  });

  it("should reject a rubric that only declares communication", async () => {
    await expect(
      evaluator.evaluate(makeTask({ selected: "B", key: "B" }), makeContext({ communication: 1 }))
    ).rejects.toThrow("declares no dimension an MCQ can score");
  });
});

describe("tallyAnswers", () => {
  it("should compare options ignoring case and surrounding spaces", () => {
    expect(tallyAnswers({ selected: " b ", key: "B" })).toEqual({ total: 1, correct: 1, accuracy: 1 });
  });
});
