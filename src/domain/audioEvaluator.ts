import { AceScorer } from "./aceScorer";
import { Evaluator, EvaluationContext } from "./evaluator";
import { SchemaError, UpstreamFailure, UpstreamTimeout } from "./errors";
import { ScoreVector } from "./scoreVector";
import { AudioPayload, Task, audioPayloadSchema, describeIssues } from "./task";
import { scoreText } from "./textEvaluator";
import { AudioClip, Transcriber } from "./transcriber";

export type FetchAudio = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * AudioEvaluator transcribes a spoken response and scores the transcript
 * the same way TextEvaluator scores written answers.
 *
 * Corrupt or missing audio is a SchemaError; network and model failures
 * are retryable.
 */
export class AudioEvaluator implements Evaluator {
  readonly kind = "AUDIO";

  constructor(
    private readonly scorer: AceScorer,
    private readonly transcriber: Transcriber,
    private readonly fetchAudio: FetchAudio = fetch
  ) {}

  async evaluate(task: Task, context: EvaluationContext): Promise<ScoreVector> {
    const parsed = audioPayloadSchema.safeParse(task.payload);
    if (!parsed.success) {
      throw new SchemaError(`Invalid AUDIO payload for ${task.taskId}: ${describeIssues(parsed.error)}`);
    }

    const clip = await this.loadClip(parsed.data, context.signal);
    const transcript = await this.transcriber.transcribe(clip, context.signal);
    if (!transcript.text) {
      throw new SchemaError(`Transcription of ${task.taskId} produced no speech`);
    }

    return scoreText(this.scorer, task, this.kind, context, {
      text: transcript.text,
      prompt: parsed.data.prompt,
      medium: "spoken",
      confidenceCap: transcript.confidence,
    });
  }

  private async loadClip(payload: AudioPayload, signal: AbortSignal): Promise<AudioClip> {
    if (payload.audioBase64 !== undefined) {
      return { bytes: decodeBase64Audio(payload.audioBase64), format: payload.format };
    }
    if (payload.audioUrl === undefined) {
      throw new SchemaError("Audio payload has no audio reference");
    }
    return { bytes: await this.download(payload.audioUrl, signal), format: payload.format };
  }

  private async download(url: string, signal: AbortSignal): Promise<Buffer> {
    let res: Response;
    try {
      res = await this.fetchAudio(url, { signal });
    } catch (error) {
      if (signal.aborted) {
        throw new UpstreamTimeout(`Audio download aborted after timeout: ${url}`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamFailure(`Audio download failed for ${url}: ${message}`);
    }

    if (res.status === 404 || res.status === 410) {
      throw new SchemaError(`Audio not found at ${url} (HTTP ${res.status})`);
    }
    if (!res.ok) {
      throw new UpstreamFailure(`Audio download failed for ${url}: HTTP ${res.status}`);
    }
    return Buffer.from(await res.arrayBuffer());
  }
}

export function decodeBase64Audio(data: string): Buffer {
  // Accept data URLs as sent by browser recorders
  const body = data.replace(/^data:[^;]+;base64,/, "").replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(body) || body.length % 4 === 1) {
    throw new SchemaError("Audio payload is not valid base64");
  }
  const bytes = Buffer.from(body, "base64");
  if (bytes.length === 0) {
    throw new SchemaError("Audio payload decodes to an empty clip");
  }
  return bytes;
}
