import { z } from "zod";

const id = z.string().trim().min(1);

export const manifestSchema = z.object({
  assignmentId: id,
  tasks: z.array(z.object({ taskId: id, learnerId: id })),
});

/**
 * Expected task set for an assignment, as published by ingestion.
 * Completeness is measured against it.
 */
export type AssignmentManifest = z.infer<typeof manifestSchema>;
