import { AggregateOptions, aggregate } from "./aggregator";
import { RubricWeightTable } from "./rubric";
import { DimensionScores, createScoreVector } from "./scoreVector";
import { DeadLetteredOutcome, FailedOutcome, SucceededOutcome, TaskOutcome } from "./taskOutcome";

const rubric = new RubricWeightTable({
  shared: {
    "r-analysis": { analysis: 1 },
    "r-text": { analysis: 2, evaluation: 1 },
  },
});

function ref(taskId: string, rubricRef = "r-analysis", learnerId = "learner-1") {
  return { taskId, learnerId, assignmentId: "a1", kind: "TEXT", rubricRef };
}

function succeeded(
  taskId: string,
  scores: DimensionScores,
  options: { rubricRef?: string; recordedAt?: string; learnerId?: string; confidence?: number } = {}
): SucceededOutcome {
  const recordedAt = options.recordedAt ?? "2026-03-01T10:00:00.000Z";
  return {
    ...ref(taskId, options.rubricRef, options.learnerId),
    status: "succeeded",
    attemptCount: 1,
    recordedAt,
    scoreVector: createScoreVector({
      taskId,
      evaluatorKind: "TEXT",
      evaluatedAt: new Date(recordedAt),
      scores,
      confidence: options.confidence,
    }),
  };
}

function deadLettered(taskId: string): DeadLetteredOutcome {
  return {
    ...ref(taskId),
    status: "dead_lettered",
    attemptCount: 1,
    recordedAt: "2026-03-01T10:00:00.000Z",
    reason: { code: "SCHEMA_ERROR", message: "bad payload", retryable: false },
  };
}

function failed(taskId: string): FailedOutcome {
  return {
    ...ref(taskId),
    status: "failed",
    attemptCount: 1,
    recordedAt: "2026-03-01T09:59:00.000Z",
    reason: { code: "UPSTREAM_TIMEOUT", message: "slow", retryable: true },
    retryAt: "2026-03-01T10:00:01.000Z",
  };
}

function options(expectedTaskIds: string[], extra: Partial<AggregateOptions> = {}): AggregateOptions {
  return { expectedTaskIds, rubric, ...extra };
}

describe("aggregate", () => {
  it("should report a mixed partial assignment", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [succeeded("t1", { analysis: 0.8 }), deadLettered("t2")],
      options(["t1", "t2", "t3"])
    );

    expect(report.status).toBe("partial");
    expect(report.completeness).toBe(1 / 3);
    expect(report.expectedTaskCount).toBe(3);
    expect(report.succeededTaskCount).toBe(1);
    expect(report.incompleteTaskIds).toEqual(["t2", "t3"]);
    expect(report.deadLetteredTaskIds).toEqual(["t2"]);
    expect(report.dimensions.analysis).toEqual({ score: 0.8, totalWeight: 1, contributingTaskIds: ["t1"] });
    expect(report.missingDimensions).toEqual(["communication", "evaluation"]);
    expect(report.withdrawn).toBe(false);
  });

  it("should be final once every expected task succeeded", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [succeeded("t1", { analysis: 0.6 }), succeeded("t2", { analysis: 1 })],
      options(["t1", "t2"])
    );

    expect(report.status).toBe("final");
    expect(report.completeness).toBe(1);
    expect(report.incompleteTaskIds).toEqual([]);
    expect(report.dimensions.analysis?.score).toBeCloseTo(0.8, 10);
  });

  it("should return a deep-frozen report", () => {
    const report = aggregate("learner-1", "a1", [succeeded("t1", { analysis: 0.6 })], options(["t1", "t2"]));

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.dimensions)).toBe(true);
    expect(Object.isFrozen(report.dimensions.analysis)).toBe(true);
    expect(Object.isFrozen(report.dimensions.analysis?.contributingTaskIds)).toBe(true);
    expect(Object.isFrozen(report.incompleteTaskIds)).toBe(true);
    expect(() => report.incompleteTaskIds.push("t3")).toThrow(TypeError);
  });

  it("should weight each task by its rubric weight", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [succeeded("t1", { analysis: 0.5, evaluation: 0.9 }, { rubricRef: "r-text" }), succeeded("t2", { analysis: 1 })],
      options(["t1", "t2"])
    );

    expect(report.dimensions.analysis?.totalWeight).toBe(3);
    expect(report.dimensions.analysis?.score).toBeCloseTo(2 / 3, 10);
    expect(report.dimensions.evaluation).toEqual({ score: 0.9, totalWeight: 1, contributingTaskIds: ["t1"] });
  });

  it("should omit communication when no task declares it", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [succeeded("t1", { analysis: 0.5, evaluation: 0.9 }, { rubricRef: "r-text" })],
      options(["t1"])
    );

    expect("communication" in report.dimensions).toBe(false);
    expect(report.missingDimensions).toEqual(["communication"]);
  });

  it("should give the same report for any order of outcomes", () => {
    const outcomes: TaskOutcome[] = [
      succeeded("t1", { analysis: 0.1 }),
      succeeded("t2", { analysis: 0.2 }, { rubricRef: "r-text" }),
      succeeded("t3", { analysis: 0.7 }),
      failed("t4"),
      deadLettered("t5"),
      succeeded("t3", { analysis: 0.3 }, { recordedAt: "2026-03-01T11:00:00.000Z" }),
    ];
    const expected = ["t1", "t2", "t3", "t4", "t5"];

    const forward = aggregate("learner-1", "a1", outcomes, options(expected));
    const backward = aggregate("learner-1", "a1", [...outcomes].reverse(), options([...expected].reverse()));
    const shuffled = aggregate(
      "learner-1",
      "a1",
      [outcomes[3], outcomes[5], outcomes[0], outcomes[4], outcomes[2], outcomes[1]],
      options(expected)
    );

    expect(JSON.stringify(backward)).toBe(JSON.stringify(forward));
    expect(JSON.stringify(shuffled)).toBe(JSON.stringify(forward));
  });

  it("should count a redelivered task once and prefer its earliest success", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [
        succeeded("t1", { analysis: 0.3 }, { recordedAt: "2026-03-01T11:00:00.000Z" }),
        failed("t1"),
        succeeded("t1", { analysis: 0.7 }, { recordedAt: "2026-03-01T10:00:00.000Z" }),
      ],
      options(["t1"])
    );

    expect(report.succeededTaskCount).toBe(1);
    expect(report.dimensions.analysis?.score).toBe(0.7);
    expect(report.dimensions.analysis?.contributingTaskIds).toEqual(["t1"]);
  });

  it("should never lower completeness when a success is added", () => {
    const base: TaskOutcome[] = [succeeded("t1", { analysis: 0.5 }), failed("t2")];
    const expected = ["t1", "t2", "t3"];

    const before = aggregate("learner-1", "a1", base, options(expected));
    const after = aggregate("learner-1", "a1", [...base, succeeded("t3", { analysis: 0.9 })], options(expected));

    expect(after.completeness).toBeGreaterThan(before.completeness);
    expect(after.completeness).toBe(2 / 3);
  });

  it("should ignore outcomes outside the manifest or for another learner", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [
        succeeded("t1", { analysis: 0.5 }),
        succeeded("extra", { analysis: 0 }),
        succeeded("t2", { analysis: 0 }, { learnerId: "learner-2" }),
      ],
      options(["t1", "t2"])
    );

    expect(report.dimensions.analysis?.contributingTaskIds).toEqual(["t1"]);
    expect(report.incompleteTaskIds).toEqual(["t2"]);
  });

  it("should ignore outcomes recorded after withdrawal", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [
        succeeded("t1", { analysis: 0.5 }, { recordedAt: "2026-03-01T09:00:00.000Z" }),
        succeeded("t2", { analysis: 1 }, { recordedAt: "2026-03-01T10:05:00.000Z" }),
      ],
      options(["t1", "t2"], { withdrawnAt: "2026-03-01T10:00:00.000Z" })
    );

    expect(report.withdrawn).toBe(true);
    expect(report.status).toBe("partial");
    expect(report.incompleteTaskIds).toEqual(["t2"]);
    expect(report.dimensions.analysis?.score).toBe(0.5);
  });

  it("should list tasks the fault ledger dead-lettered", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [succeeded("t1", { analysis: 0.5 })],
      options(["t1", "t2"], { isDeadLettered: (taskId) => taskId === "t2" })
    );

    expect(report.deadLetteredTaskIds).toEqual(["t2"]);
  });

  it("should expose mean confidence without applying it", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [succeeded("t1", { analysis: 0.4 }, { confidence: 0.2 }), succeeded("t2", { analysis: 0.8 }, { confidence: 0.6 })],
      options(["t1", "t2"])
    );

    expect(report.dimensions.analysis?.score).toBeCloseTo(0.6, 10);
    expect(report.dimensions.analysis?.meanConfidence).toBeCloseTo(0.4, 10);
  });

  it("should compute the overall score over present dimensions only", () => {
    const report = aggregate(
      "learner-1",
      "a1",
      [succeeded("t1", { analysis: 1, evaluation: 0.5 }, { rubricRef: "r-text" })],
      options(["t1"])
    );

    // (1 * 0.4 + 0.5 * 0.3) / 0.7
    expect(report.overallScore).toBeCloseTo(0.55 / 0.7, 10);
    expect(report.passed).toBe(true);
    expect(report.excellence).toBe(false);
  });

  it("should treat an empty manifest as complete with no scores", () => {
    const report = aggregate("learner-1", "a1", [], options([]));

    expect(report.status).toBe("final");
    expect(report.completeness).toBe(1);
    expect(report.dimensions).toEqual({});
    expect(report.overallScore).toBeUndefined();
    expect("passed" in report).toBe(false);
  });
});
