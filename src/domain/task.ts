import { z } from "zod";

/**
 * Task model for the grading pipeline.
 *
 * A Task is one gradable unit extracted from a learner submission
 * (one question, one written answer, one spoken segment). Tasks arrive
 * already normalized by ingestion; the pipeline never edits them.
 */

// ============================================
// Kinds and dimensions
// ============================================

export const BUILT_IN_KINDS = ["MCQ", "TEXT", "AUDIO"] as const;

export type BuiltInKind = (typeof BUILT_IN_KINDS)[number];

// Any string may arrive from ingestion; the router decides what is supported.
export type TaskKind = BuiltInKind | (string & {});

export const ACE_DIMENSIONS = ["analysis", "communication", "evaluation"] as const;

export type AceDimension = (typeof ACE_DIMENSIONS)[number];

// ============================================
// Task envelope
// ============================================

export interface Task {
  taskId: string;
  learnerId: string;
  assignmentId: string;
  kind: TaskKind;
  payload: unknown;
  rubricRef: string;
}

/**
 * Identity and grouping keys of a task, copied onto every outcome so
 * that the aggregator never needs the payload.
 */
export type TaskRef = Pick<Task, "taskId" | "learnerId" | "assignmentId" | "kind" | "rubricRef">;

export function toTaskRef(task: Task): TaskRef {
  return {
    taskId: task.taskId,
    learnerId: task.learnerId,
    assignmentId: task.assignmentId,
    kind: task.kind,
    rubricRef: task.rubricRef,
  };
}

const nonEmpty = z.string().trim().min(1);

export const taskSchema = z
  .object({
    taskId: nonEmpty,
    learnerId: nonEmpty,
    assignmentId: nonEmpty,
    kind: nonEmpty,
    payload: z.unknown(),
    rubricRef: nonEmpty,
  })
  // zod marks an unknown key optional; a task always carries its payload slot
  .transform((t): Task => ({ ...t, payload: t.payload }));

// ============================================
// Payloads (parsed by each evaluator)
// ============================================

const option = z.union([z.string(), z.number()]).transform((v) => String(v));

export const mcqAnswerSchema = z.object({
  questionId: nonEmpty,
  selected: option,
  key: option,
});

export const mcqPayloadSchema = z.union([
  z.object({ selected: option, key: option }),
  z.object({ answers: z.array(mcqAnswerSchema).min(1) }),
]);

export type McqPayload = z.infer<typeof mcqPayloadSchema>;

export const textPayloadSchema = z.object({
  text: nonEmpty,
  prompt: z.string().optional(),
});

export const audioPayloadSchema = z
  .object({
    audioUrl: z.string().url().optional(),
    audioBase64: z.string().min(1).optional(),
    format: z.string().regex(/^[a-z0-9]+$/i).default("wav"),
    durationSec: z.number().positive().optional(),
    prompt: z.string().optional(),
  })
  .refine((p) => Boolean(p.audioUrl) !== Boolean(p.audioBase64), {
    message: "exactly one of audioUrl or audioBase64 is required",
  });

export type AudioPayload = z.infer<typeof audioPayloadSchema>;

/**
 * Flatten a zod error into one line for logs and failure reasons.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
