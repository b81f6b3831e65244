import path from "path";
import { DEFAULT_REPORT_POLICY, ReportPolicy } from "../domain/aggregator";
import { TaskKind } from "../domain/task";

const PROJECT_ROOT = path.join(__dirname, "../..");

export interface PipelineConfig {
  timeouts: Partial<Record<TaskKind, number>>;
  defaultTimeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  standardLaneConcurrency: number;
  audioLaneConcurrency: number;
  // Optional: without a key the heuristic scorer is used and audio cannot be transcribed
  openaiApiKey?: string;
  openaiModel: string;
  transcriptionModel: string;
  rubricPath: string;
  dataDir: string;
  persist: boolean;
  report: ReportPolicy;
  apiPort: number;
}

export type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): PipelineConfig {
  const textTimeout = positiveInt(env, "TEXT_TIMEOUT_MS", 30_000);
  const backoffBaseMs = positiveInt(env, "BACKOFF_BASE_MS", 500);
  const backoffCapMs = positiveInt(env, "BACKOFF_CAP_MS", 60_000);
  if (backoffCapMs < backoffBaseMs) {
    throw new Error(`BACKOFF_CAP_MS (${backoffCapMs}) must be >= BACKOFF_BASE_MS (${backoffBaseMs})`);
  }

  const cfg: PipelineConfig = {
    timeouts: {
      MCQ: positiveInt(env, "MCQ_TIMEOUT_MS", 5_000),
      TEXT: textTimeout,
      AUDIO: positiveInt(env, "AUDIO_TIMEOUT_MS", 180_000),
    },
    defaultTimeoutMs: textTimeout,
    maxAttempts: positiveInt(env, "MAX_ATTEMPTS", 5),
    backoffBaseMs,
    backoffCapMs,
    standardLaneConcurrency: positiveInt(env, "STANDARD_LANE_CONCURRENCY", 8),
    audioLaneConcurrency: positiveInt(env, "AUDIO_LANE_CONCURRENCY", 2),
    openaiModel: env.OPENAI_MODEL?.trim() || "gpt-4o-mini",
    transcriptionModel: env.TRANSCRIPTION_MODEL?.trim() || "whisper-1",
    rubricPath: path.resolve(PROJECT_ROOT, env.RUBRIC_PATH?.trim() || "config/rubrics.json"),
    dataDir: path.resolve(PROJECT_ROOT, env.DATA_DIR?.trim() || "data"),
    persist: bool(env, "PERSIST_OUTCOMES", true),
    report: {
      aceWeights: {
        analysis: nonNegative(env, "ACE_ANALYSIS_WEIGHT", DEFAULT_REPORT_POLICY.aceWeights.analysis),
        communication: nonNegative(env, "ACE_COMMUNICATION_WEIGHT", DEFAULT_REPORT_POLICY.aceWeights.communication),
        evaluation: nonNegative(env, "ACE_EVALUATION_WEIGHT", DEFAULT_REPORT_POLICY.aceWeights.evaluation),
      },
      passingScore: unitInterval(env, "PASSING_SCORE", DEFAULT_REPORT_POLICY.passingScore),
      excellenceThreshold: unitInterval(env, "EXCELLENCE_THRESHOLD", DEFAULT_REPORT_POLICY.excellenceThreshold),
    },
    apiPort: positiveInt(env, "API_PORT", 3001),
  };

  // Only set when present
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (apiKey) cfg.openaiApiKey = apiKey;

  return cfg;
}

function raw(env: Env, key: string): string | undefined {
  const v = env[key]?.trim();
  return v === undefined || v === "" ? undefined : v;
}

function positiveInt(env: Env, key: string, def: number): number {
  const v = raw(env, key);
  if (v === undefined) return def;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${key} must be a positive integer, got "${v}"`);
  }
  return n;
}

function nonNegative(env: Env, key: string, def: number): number {
  const v = raw(env, key);
  if (v === undefined) return def;
  const n = Number(v);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`${key} must be a non-negative number, got "${v}"`);
  }
  return n;
}

function unitInterval(env: Env, key: string, def: number): number {
  const n = nonNegative(env, key, def);
  if (n > 1) {
    throw new Error(`${key} must be between 0 and 1, got "${n}"`);
  }
  return n;
}

function bool(env: Env, key: string, def: boolean): boolean {
  const v = raw(env, key);
  if (v === undefined) return def;
  if (/^(1|true|yes|on)$/i.test(v)) return true;
  if (/^(0|false|no|off)$/i.test(v)) return false;
  throw new Error(`${key} must be a boolean, got "${v}"`);
}
