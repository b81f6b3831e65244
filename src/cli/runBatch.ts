#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config";
import { Report } from "../domain/aggregator";
import { ACE_DIMENSIONS } from "../domain/task";
import { loadManifest, loadTaskBatch } from "../loaders/batchLoader";
import { createPipeline } from "../services/pipeline";
import { consoleEventSink, silentEventSink } from "../services/pipelineEvents";

const USAGE = "Usage: run-batch <tasks.json> <manifest.json> [--verbose]";

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Print one learner's report as a short block
 */
export function formatReport(report: Report): string {
  const lines: string[] = [];
  lines.push(`${report.learnerId} [${report.status}] completeness ${percent(report.completeness)} (${report.succeededTaskCount}/${report.expectedTaskCount})`);

  for (const dimension of ACE_DIMENSIONS) {
    const agg = report.dimensions[dimension];
    lines.push(agg ? `  ${dimension}: ${percent(agg.score)} from ${agg.contributingTaskIds.length} task(s)` : `  ${dimension}: not assessed`);
  }

  if (report.overallScore !== undefined) {
    const verdict = report.excellence ? "excellent" : report.passed ? "passed" : "below passing";
    lines.push(`  overall: ${percent(report.overallScore)} (${verdict})`);
  }
  if (report.incompleteTaskIds.length > 0) {
    lines.push(`  incomplete: ${report.incompleteTaskIds.join(", ")}`);
  }
  if (report.withdrawn) {
    lines.push("  withdrawn");
  }
  return lines.join("\n");
}

async function main(argv: string[]): Promise<number> {
  const args = argv.filter((a) => !a.startsWith("--"));
  if (args.length !== 2) {
    console.error(USAGE);
    return 2;
  }
  const [tasksPath, manifestPath] = args;

  const config = loadConfig();
  const tasks = loadTaskBatch(tasksPath);
  const manifest = loadManifest(manifestPath);
  const pipeline = createPipeline(config, {
    events: argv.includes("--verbose") ? consoleEventSink : silentEventSink,
  });

  pipeline.reports.setManifest(manifest);
  console.log(`\nRunning ${tasks.length} task(s) for assignment ${manifest.assignmentId}...\n`);
  for (const task of tasks) {
    pipeline.pool.submit(task);
  }
  await pipeline.pool.drain();

  for (const report of pipeline.reports.getReports(manifest.assignmentId)) {
    console.log(formatReport(report));
    console.log();
  }

  const deadLetters = pipeline.ledger.listDeadLettered(manifest.assignmentId);
  if (deadLetters.length > 0) {
    console.log("Dead-lettered tasks:");
    for (const entry of deadLetters) {
      console.log(`  ${entry.taskId} (${entry.kind}) after ${entry.attemptCount} attempt(s): ${entry.reason.code} ${entry.reason.message}`);
    }
  }

  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error("Error:", error instanceof Error ? error.message : error);
      process.exit(1);
    }
  );
}
