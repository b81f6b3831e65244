import { AceDimension } from "./task";
import { DimensionScores } from "./scoreVector";

export interface AceScoringRequest {
  text: string;
  prompt?: string;
  dimensions: AceDimension[];
  // "written" or "spoken" changes how communication is judged
  medium: "written" | "spoken";
  signal: AbortSignal;
}

export interface AceScoringResult {
  scores: DimensionScores; // 0..1 per requested dimension
  confidence: number; // 0..1
  feedback?: string;
}

/**
 * Scores free text on the ACE dimensions. Implemented by the OpenAI
 * scorer, and by a heuristic one when no API key is configured.
 */
export interface AceScorer {
  readonly model: string;
  score(request: AceScoringRequest): Promise<AceScoringResult>;
}
