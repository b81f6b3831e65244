import fs from "fs";
import path from "path";
import { FailureReason } from "../domain/errors";
import { TaskRef } from "../domain/task";

const DEFAULT_DATA_DIR = path.join(__dirname, "../../data");
const LEDGER_FILE = "fault-ledger.jsonl";

export interface FaultEntry extends TaskRef {
  status: "failed" | "dead_lettered";
  attemptCount: number;
  reason: FailureReason;
  timestamp: string; // ISO date string
}

export interface FaultLedgerOptions {
  dataDir?: string;
  persist?: boolean;
}

/**
 * Append-only record of every failed and dead-lettered transition.
 *
 * Entries are never removed here; pruning belongs to an external
 * retention job. With persistence on, entries are appended as JSON lines
 * to {dataDir}/fault-ledger.jsonl and reloaded on start.
 */
export class FaultLedger {
  private readonly entries: FaultEntry[] = [];
  private readonly deadLettered = new Map<string, FaultEntry>();
  private readonly filePath: string;
  private readonly persist: boolean;

  constructor(options: FaultLedgerOptions = {}) {
    const dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
    this.filePath = path.join(dataDir, LEDGER_FILE);
    this.persist = options.persist ?? false;

    if (this.persist) {
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
      this.load();
    }
  }

  append(entry: FaultEntry): void {
    const frozen = Object.freeze({ ...entry });
    this.index(frozen);
    if (this.persist) {
      fs.appendFileSync(this.filePath, JSON.stringify(frozen) + "\n");
    }
  }

  isDeadLettered(taskId: string): boolean {
    return this.deadLettered.has(taskId);
  }

  /**
   * Dead-lettered tasks of one assignment, for operator review.
   */
  listDeadLettered(assignmentId: string): FaultEntry[] {
    return [...this.deadLettered.values()]
      .filter((e) => e.assignmentId === assignmentId)
      .sort((a, b) => (a.taskId < b.taskId ? -1 : a.taskId > b.taskId ? 1 : 0));
  }

  entriesFor(taskId: string): FaultEntry[] {
    return this.entries.filter((e) => e.taskId === taskId);
  }

  all(): readonly FaultEntry[] {
    return this.entries;
  }

  private index(entry: FaultEntry): void {
    this.entries.push(entry);
    if (entry.status === "dead_lettered" && !this.deadLettered.has(entry.taskId)) {
      this.deadLettered.set(entry.taskId, entry);
    }
  }

  private load(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }
    const lines = fs.readFileSync(this.filePath, "utf-8").split("\n");
    for (const line of lines) {
      if (!line.trim()) continue;
      try {
        this.index(JSON.parse(line) as FaultEntry);
      } catch (error) {
        console.error("[FaultLedger] Skipping unreadable ledger line:", error);
      }
    }
  }
}
