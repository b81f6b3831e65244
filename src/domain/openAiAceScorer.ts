import OpenAI from "openai";
import { z } from "zod";
import { AceScorer, AceScoringRequest, AceScoringResult } from "./aceScorer";
import { UpstreamFailure } from "./errors";
import { classifyOpenAiError } from "./openAiErrors";
import { DimensionScores, fromPercent } from "./scoreVector";
import { AceDimension } from "./task";

const DIMENSION_GUIDE: Record<AceDimension, string> = {
  analysis: "analysis (0-100): depth of thinking, use of evidence, logical structure",
  communication: "communication (0-100): clarity, organisation and coherence of expression",
  evaluation: "evaluation (0-100): soundness of judgement, weighing of alternatives, justified conclusions",
};

const modelScore = z.coerce.number().finite();

const modelOutputSchema = z.object({
  analysis: modelScore.optional(),
  communication: modelScore.optional(),
  evaluation: modelScore.optional(),
  confidence: modelScore.optional(),
  feedback: z.string().optional(),
});

/**
 * OpenAiAceScorer asks a chat model to score a response on the ACE
 * dimensions the rubric declares.
 *
 * Scoring criteria are fixed per dimension (see DIMENSION_GUIDE); the
 * model answers 0-100, which is clamped and normalised to 0..1.
 */
export class OpenAiAceScorer implements AceScorer {
  private client: OpenAI;
  readonly model: string;

  constructor(apiKey?: string, model: string = "gpt-4o-mini") {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY,
    });
    this.model = model;
  }

  async score(request: AceScoringRequest): Promise<AceScoringResult> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: buildSystemPrompt(request) },
            { role: "user", content: buildUserPrompt(request) },
          ],
          temperature: 0,
          response_format: { type: "json_object" },
        },
        { signal: request.signal }
      );
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw classifyOpenAiError(error, request.signal, "ACE scoring");
    }

    if (!content) {
      throw new UpstreamFailure("ACE scoring returned an empty response");
    }
    return parseModelOutput(content, request.dimensions);
  }
}

function buildSystemPrompt(request: AceScoringRequest): string {
  const criteria = request.dimensions.map((d) => `- ${DIMENSION_GUIDE[d]}`).join("\n");
  const keys = request.dimensions.map((d) => `  "${d}": <0-100>,`).join("\n");

  return `You are an academic evaluator applying the ACE framework (Analysis, Communication, Evaluation).
Score the learner's ${request.medium} response only on these dimensions:
${criteria}

Also report how confident you are in your scores (0-100). Lower it when the response is very short,
off-topic, or, for spoken responses, when the transcript looks garbled.

Return JSON only:
{
${keys}
  "confidence": <0-100>,
  "feedback": "<one or two sentences of actionable feedback>"
}`;
}

function buildUserPrompt(request: AceScoringRequest): string {
  const question = request.prompt ? `QUESTION:\n${request.prompt}\n\n` : "";
  const label = request.medium === "spoken" ? "TRANSCRIPT OF THE LEARNER'S SPOKEN RESPONSE" : "LEARNER'S RESPONSE";
  return `${question}${label}:\n${request.text}\n\nEvaluate and return JSON:`;
}

export function parseModelOutput(content: string, dimensions: AceDimension[]): AceScoringResult {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new UpstreamFailure(`ACE scoring returned invalid JSON: ${content.slice(0, 200)}`);
  }

  const parsed = modelOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamFailure(`ACE scoring returned an unexpected shape: ${content.slice(0, 200)}`);
  }

  const scores: DimensionScores = {};
  for (const dimension of dimensions) {
    const value = parsed.data[dimension];
    if (value === undefined) {
      throw new UpstreamFailure(`ACE scoring omitted the ${dimension} dimension`);
    }
    scores[dimension] = fromPercent(value);
  }

  if (parsed.data.confidence === undefined) {
    throw new UpstreamFailure("ACE scoring omitted its confidence");
  }

  return {
    scores,
    confidence: fromPercent(parsed.data.confidence),
    ...(parsed.data.feedback ? { feedback: parsed.data.feedback.trim() } : {}),
  };
}
