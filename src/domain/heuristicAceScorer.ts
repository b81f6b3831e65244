import { AceScorer, AceScoringRequest, AceScoringResult } from "./aceScorer";
import { DimensionScores } from "./scoreVector";

const REASONING_MARKERS = /\b(because|therefore|since|so that|as a result|which means|due to)\b/gi;
const JUDGEMENT_MARKERS = /\b(however|although|on the other hand|i think|i believe|better|worse|stronger|weaker|should)\b/gi;

/**
 * HeuristicAceScorer provides simple rule-based ACE scoring for running
 * without a model. Use OpenAiAceScorer for real assessment.
 */
export class HeuristicAceScorer implements AceScorer {
  readonly model = "heuristic";

  async score(request: AceScoringRequest): Promise<AceScoringResult> {
    const text = request.text.trim();
    const words = text.split(/\s+/).filter(Boolean);
    const sentences = text.split(/[.!?]+/).filter((s) => s.trim().length > 0);

    const reasoning = countMatches(text, REASONING_MARKERS);
    const judgement = countMatches(text, JUDGEMENT_MARKERS);

    // Each dimension starts at 0.4 and earns credit from observable signals
    const candidates: Required<DimensionScores> = {
      analysis: clamp01(0.4 + Math.min(words.length, 120) / 400 + reasoning * 0.1),
      communication: clamp01(0.4 + Math.min(sentences.length, 6) * 0.05 + (words.length >= 20 ? 0.1 : 0)),
      evaluation: clamp01(0.4 + judgement * 0.1 + reasoning * 0.05),
    };

    const scores: DimensionScores = {};
    for (const dimension of request.dimensions) {
      scores[dimension] = candidates[dimension];
    }

    return {
      scores,
      confidence: 0.3,
      feedback: "Scored without a language model. Review with an instructor.",
    };
  }
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function clamp01(value: number): number {
  return Math.round(Math.max(0, Math.min(1, value)) * 100) / 100;
}
