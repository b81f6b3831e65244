import { PipelineConfig } from "../config";
import { AceScorer } from "../domain/aceScorer";
import { HeuristicAceScorer } from "../domain/heuristicAceScorer";
import { OpenAiAceScorer } from "../domain/openAiAceScorer";
import { EvaluatorRouter, createDefaultRouter } from "../domain/router";
import { RubricWeightTable } from "../domain/rubric";
import { Transcriber, UnavailableTranscriber, WhisperTranscriber } from "../domain/transcriber";
import { loadRubricTable } from "../loaders/rubricLoader";
import { FaultLedger } from "../stores/faultLedger";
import { OutcomeStore } from "../stores/outcomeStore";
import { ExecutionCoordinator } from "./executionCoordinator";
import { PipelineEventSink, consoleEventSink } from "./pipelineEvents";
import { ReportService } from "./reportService";
import { WorkerPool } from "./workerPool";

export interface Pipeline {
  router: EvaluatorRouter;
  rubric: RubricWeightTable;
  outcomes: OutcomeStore;
  ledger: FaultLedger;
  coordinator: ExecutionCoordinator;
  pool: WorkerPool;
  reports: ReportService;
}

export interface PipelineOverrides {
  rubric?: RubricWeightTable;
  scorer?: AceScorer;
  transcriber?: Transcriber;
  router?: EvaluatorRouter;
  events?: PipelineEventSink;
  clock?: () => Date;
  random?: () => number;
}

// Get the scorer based on API key availability
function getScorer(config: PipelineConfig): AceScorer {
  if (config.openaiApiKey) {
    return new OpenAiAceScorer(config.openaiApiKey, config.openaiModel);
  }
  console.log("No OPENAI_API_KEY found, using HeuristicAceScorer");
  return new HeuristicAceScorer();
}

function getTranscriber(config: PipelineConfig): Transcriber {
  if (config.openaiApiKey) {
    return new WhisperTranscriber(config.openaiApiKey, config.transcriptionModel);
  }
  console.log("No OPENAI_API_KEY found, audio tasks will be dead-lettered");
  return new UnavailableTranscriber();
}

/**
 * Wire stores, router, coordinator, worker pool and report service from
 * configuration. Overrides replace individual collaborators (tests, CLI).
 */
export function createPipeline(config: PipelineConfig, overrides: PipelineOverrides = {}): Pipeline {
  const events = overrides.events ?? consoleEventSink;
  const rubric = overrides.rubric ?? loadRubricTable(config.rubricPath);
  const router =
    overrides.router ??
    createDefaultRouter({
      scorer: overrides.scorer ?? getScorer(config),
      transcriber: overrides.transcriber ?? getTranscriber(config),
    });

  const outcomes = new OutcomeStore({ dataDir: config.dataDir, persist: config.persist });
  const ledger = new FaultLedger({ dataDir: config.dataDir, persist: config.persist });

  const coordinator = new ExecutionCoordinator({
    router,
    rubric,
    outcomes,
    ledger,
    settings: {
      timeouts: config.timeouts,
      defaultTimeoutMs: config.defaultTimeoutMs,
      maxAttempts: config.maxAttempts,
      backoffBaseMs: config.backoffBaseMs,
      backoffCapMs: config.backoffCapMs,
    },
    events,
    clock: overrides.clock,
    random: overrides.random,
  });

  const pool = new WorkerPool(coordinator, {
    lanes: [
      { name: "standard", concurrency: config.standardLaneConcurrency, kinds: ["MCQ", "TEXT"] },
      { name: "audio", concurrency: config.audioLaneConcurrency, kinds: ["AUDIO"] },
    ],
    defaultLane: "standard",
    clock: overrides.clock,
  });

  const reports = new ReportService({
    outcomes,
    ledger,
    rubric,
    policy: config.report,
    events,
    clock: overrides.clock,
  });
  coordinator.onOutcome(reports.handleOutcome);

  return { router, rubric, outcomes, ledger, coordinator, pool, reports };
}
