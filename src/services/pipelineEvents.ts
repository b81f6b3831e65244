import { FailureReason } from "../domain/errors";
import { ReportStatus } from "../domain/aggregator";
import { TaskState } from "../domain/taskOutcome";
import { TaskKind } from "../domain/task";

/**
 * Structured monitoring events. The pipeline only emits them; shipping and
 * storing them is somebody else's job.
 */
export type PipelineEvent =
  | {
      type: "task_transition";
      taskId: string;
      kind: TaskKind;
      from: TaskState;
      to: TaskState;
      attempt: number;
      at: string;
    }
  | {
      type: "task_retry_scheduled";
      taskId: string;
      attempt: number;
      delayMs: number;
      reason: FailureReason;
      at: string;
    }
  | {
      type: "task_dead_lettered";
      taskId: string;
      assignmentId: string;
      attempts: number;
      reason: FailureReason;
      at: string;
    }
  | {
      type: "task_duplicate_delivery";
      taskId: string;
      status: "succeeded" | "dead_lettered" | "in_flight";
      at: string;
    }
  | {
      type: "report_aggregated";
      assignmentId: string;
      learnerId: string;
      status: ReportStatus;
      completeness: number;
      at: string;
    };

export type PipelineEventSink = (event: PipelineEvent) => void;

export const consoleEventSink: PipelineEventSink = (event) => {
  console.log("[pipeline]", JSON.stringify(event));
};

export const silentEventSink: PipelineEventSink = () => {};
