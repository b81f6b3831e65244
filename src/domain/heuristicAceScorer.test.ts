import { HeuristicAceScorer } from "./heuristicAceScorer";

describe("HeuristicAceScorer", () => {
  const signal = new AbortController().signal;
  const text = "Plants grow toward light because they need energy. I think this is the better explanation.";

  it("should score requested dimensions from reasoning and judgement markers", async () => {
    const scorer = new HeuristicAceScorer();

    const result = await scorer.score({
      text,
      dimensions: ["analysis", "communication", "evaluation"],
      medium: "written",
      signal,
    });

    // 15 words, 2 sentences, 1 reasoning marker, 2 judgement markers
    expect(result.scores).toEqual({ analysis: 0.54, communication: 0.5, evaluation: 0.65 });
    expect(result.confidence).toBe(0.3);
    expect(result.feedback).toBe("Scored without a language model. Review with an instructor.");
  });

  it("should only return the dimensions asked for", async () => {
    const scorer = new HeuristicAceScorer();

    const result = await scorer.score({ text, dimensions: ["communication"], medium: "spoken", signal });

    expect(result.scores).toEqual({ communication: 0.5 });
  });
});
