import fs from "fs";
import { z } from "zod";
import { AssignmentManifest, manifestSchema } from "../domain/manifest";
import { Task, describeIssues, taskSchema } from "../domain/task";

const taskBatchSchema = z.union([z.array(taskSchema), z.object({ tasks: z.array(taskSchema) })]);

function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }
  const rawData = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(rawData);
  } catch (error) {
    throw new Error(`${filePath} is not valid JSON: ${error instanceof Error ? error.message : error}`);
  }
}

/**
 * Load normalized tasks from a JSON file: either an array of tasks or
 * `{ "tasks": [...] }`.
 */
export function loadTaskBatch(filePath: string): Task[] {
  const parsed = taskBatchSchema.safeParse(readJson(filePath));
  if (!parsed.success) {
    throw new Error(`Invalid task batch ${filePath}: ${describeIssues(parsed.error)}`);
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.tasks;
}

/**
 * Load an assignment manifest (expected task ids per learner).
 */
export function loadManifest(filePath: string): AssignmentManifest {
  const parsed = manifestSchema.safeParse(readJson(filePath));
  if (!parsed.success) {
    throw new Error(`Invalid manifest ${filePath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
