import fs from "fs";
import path from "path";
import { FailedOutcome, TaskOutcome, TaskState, TerminalOutcome, isTerminal } from "../domain/taskOutcome";

const DEFAULT_DATA_DIR = path.join(__dirname, "../../data");

export interface TaskRecord {
  taskId: string;
  state: TaskState;
  attemptCount: number;
  outcome?: TaskOutcome; // latest recorded outcome
  updatedAt: string;
}

export type ClaimResult =
  | { type: "claimed"; attempt: number }
  | { type: "terminal"; outcome: TerminalOutcome }
  | { type: "in_flight" }
  | { type: "not_due"; outcome: FailedOutcome };

export interface OutcomeStoreOptions {
  dataDir?: string;
  persist?: boolean;
}

/**
 * OutcomeStore owns per-task lifecycle state and the outcome log.
 *
 * claim() is the idempotency guard: check-and-set happens synchronously,
 * so two workers in this process can never both claim one task id.
 * When persistence is on, each record is also written to
 * {dataDir}/outcomes/{taskId}.json.
 */
export class OutcomeStore {
  private readonly records = new Map<string, TaskRecord>();
  private readonly dir: string;
  private readonly persist: boolean;

  constructor(options: OutcomeStoreOptions = {}) {
    this.dir = path.join(options.dataDir ?? DEFAULT_DATA_DIR, "outcomes");
    this.persist = options.persist ?? false;

    if (this.persist) {
      if (!fs.existsSync(this.dir)) {
        fs.mkdirSync(this.dir, { recursive: true });
      }
      this.loadAll();
    }
  }

  /**
   * Move a task to "evaluating" unless it is terminal, already being
   * evaluated, or still waiting out its retry backoff.
   */
  claim(taskId: string, now: Date): ClaimResult {
    const record = this.records.get(taskId);

    if (record?.outcome && isTerminal(record.outcome)) {
      return { type: "terminal", outcome: record.outcome };
    }
    if (record?.state === "evaluating") {
      return { type: "in_flight" };
    }
    if (record?.outcome?.status === "failed" && Date.parse(record.outcome.retryAt) > now.getTime()) {
      return { type: "not_due", outcome: record.outcome };
    }

    const attempt = (record?.attemptCount ?? 0) + 1;
    this.write({
      taskId,
      state: "evaluating",
      attemptCount: attempt,
      ...(record?.outcome ? { outcome: record.outcome } : {}),
      updatedAt: now.toISOString(),
    });
    return { type: "claimed", attempt };
  }

  /**
   * Record the outcome of the attempt that currently holds the claim.
   */
  record(outcome: TaskOutcome): void {
    const record = this.records.get(outcome.taskId);
    if (record?.outcome && isTerminal(record.outcome)) {
      throw new Error(`Task ${outcome.taskId} already has a terminal outcome (${record.outcome.status})`);
    }
    this.write({
      taskId: outcome.taskId,
      state: outcome.status,
      attemptCount: outcome.attemptCount,
      outcome,
      updatedAt: outcome.recordedAt,
    });
  }

  /**
   * Drop an in-flight claim without recording an outcome, so the task
   * can be claimed again. The attempt still counts.
   */
  release(taskId: string, now: Date): void {
    const record = this.records.get(taskId);
    if (!record || record.state !== "evaluating") {
      return;
    }
    this.write({ ...record, state: record.outcome?.status ?? "pending", updatedAt: now.toISOString() });
  }

  get(taskId: string): TaskRecord | null {
    return this.records.get(taskId) ?? null;
  }

  /**
   * Latest outcome per task, optionally filtered by grouping keys.
   */
  list(filter: { assignmentId?: string; learnerId?: string } = {}): TaskOutcome[] {
    const outcomes: TaskOutcome[] = [];
    for (const record of this.records.values()) {
      const outcome = record.outcome;
      if (!outcome) continue;
      if (filter.assignmentId !== undefined && outcome.assignmentId !== filter.assignmentId) continue;
      if (filter.learnerId !== undefined && outcome.learnerId !== filter.learnerId) continue;
      outcomes.push(outcome);
    }
    return outcomes.sort((a, b) => (a.taskId < b.taskId ? -1 : a.taskId > b.taskId ? 1 : 0));
  }

  private write(record: TaskRecord): void {
    this.records.set(record.taskId, record);
    if (this.persist) {
      fs.writeFileSync(this.filePath(record.taskId), JSON.stringify(record, null, 2));
    }
  }

  private filePath(taskId: string): string {
    return path.join(this.dir, `${encodeURIComponent(taskId)}.json`);
  }

  private loadAll(): void {
    const files = fs.readdirSync(this.dir).filter((f) => f.endsWith(".json"));
    for (const file of files) {
      try {
        const data = fs.readFileSync(path.join(this.dir, file), "utf-8");
        const record = JSON.parse(data) as TaskRecord;
        // A claim left behind by a crashed process is released on load
        if (record.state === "evaluating") {
          record.state = record.outcome?.status ?? "pending";
        }
        this.records.set(record.taskId, record);
      } catch (error) {
        console.error(`[OutcomeStore] Skipping unreadable record ${file}:`, error);
      }
    }
  }
}
