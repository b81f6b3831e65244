import OpenAI, { toFile } from "openai";
import { SchemaError, UpstreamFailure } from "./errors";
import { classifyOpenAiError } from "./openAiErrors";

export interface AudioClip {
  bytes: Buffer;
  format: string; // file extension, e.g. "wav", "webm"
}

export interface Transcript {
  text: string;
  // 0..1 when the engine reports one
  confidence?: number;
}

export interface Transcriber {
  readonly model: string;
  transcribe(clip: AudioClip, signal: AbortSignal): Promise<Transcript>;
}

/**
 * Speech-to-text through OpenAI's transcription endpoint.
 */
export class WhisperTranscriber implements Transcriber {
  private client: OpenAI;
  readonly model: string;

  constructor(apiKey?: string, model: string = "whisper-1") {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY,
    });
    this.model = model;
  }

  async transcribe(clip: AudioClip, signal: AbortSignal): Promise<Transcript> {
    if (clip.bytes.length === 0) {
      throw new SchemaError("Audio clip is empty");
    }

    try {
      const file = await toFile(clip.bytes, `response.${clip.format}`);
      const transcription = await this.client.audio.transcriptions.create(
        { file, model: this.model },
        { signal }
      );
      return { text: transcription.text.trim() };
    } catch (error) {
      // A 400 from the upload endpoint means the audio itself was refused
      throw classifyOpenAiError(error, signal, "Transcription", true);
    }
  }
}

/**
 * Used when no speech-to-text backend is configured: every audio task
 * dead-letters on its first attempt.
 */
export class UnavailableTranscriber implements Transcriber {
  readonly model = "unavailable";

  async transcribe(): Promise<Transcript> {
    throw new UpstreamFailure("Audio transcription requires OPENAI_API_KEY", false);
  }
}
