import fs from "fs";
import { z } from "zod";
import { RubricWeightTable } from "../domain/rubric";
import { describeIssues } from "../domain/task";

const weightsSchema = z
  .object({
    analysis: z.number().positive().finite().optional(),
    communication: z.number().positive().finite().optional(),
    evaluation: z.number().positive().finite().optional(),
  })
  .strict();

const rubricFileSchema = z
  .object({
    shared: z.record(weightsSchema).optional(),
    assignments: z.record(z.record(weightsSchema)).optional(),
  })
  .strict();

/**
 * Build a weight table from parsed JSON. Throws with every problem
 * listed when the document does not match the rubric file format.
 */
export function parseRubricTable(data: unknown, source = "rubric table"): RubricWeightTable {
  const parsed = rubricFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid ${source}: ${describeIssues(parsed.error)}`);
  }
  return new RubricWeightTable(parsed.data);
}

/**
 * Load the rubric weight table from a JSON file.
 */
export function loadRubricTable(filePath: string): RubricWeightTable {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Rubric file not found: ${filePath}`);
  }
  const rawData = fs.readFileSync(filePath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(rawData);
  } catch (error) {
    throw new Error(`Rubric file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : error}`);
  }
  return parseRubricTable(data, `rubric file ${filePath}`);
}
