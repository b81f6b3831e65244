import { Report, ReportPolicy, aggregate } from "../domain/aggregator";
import { AssignmentManifest } from "../domain/manifest";
import { RubricWeightTable } from "../domain/rubric";
import { TaskOutcome } from "../domain/taskOutcome";
import { FaultLedger } from "../stores/faultLedger";
import { OutcomeStore } from "../stores/outcomeStore";
import { PipelineEventSink, silentEventSink } from "./pipelineEvents";

export interface ReportServiceDeps {
  outcomes: OutcomeStore;
  ledger: FaultLedger;
  rubric: RubricWeightTable;
  policy?: ReportPolicy;
  events?: PipelineEventSink;
  clock?: () => Date;
}

/**
 * ReportService keeps "live" reports: cached results of aggregate(),
 * dropped whenever an outcome for that learner/assignment arrives and
 * recomputed on the next read. Cached reports are never edited.
 */
export class ReportService {
  private readonly manifests = new Map<string, AssignmentManifest>();
  private readonly withdrawals = new Map<string, string>();
  private readonly cache = new Map<string, Report>();
  private readonly events: PipelineEventSink;
  private readonly clock: () => Date;

  constructor(private readonly deps: ReportServiceDeps) {
    this.events = deps.events ?? silentEventSink;
    this.clock = deps.clock ?? (() => new Date());
  }

  setManifest(manifest: AssignmentManifest): void {
    this.manifests.set(manifest.assignmentId, manifest);
    this.invalidateAssignment(manifest.assignmentId);
  }

  getManifest(assignmentId: string): AssignmentManifest | null {
    return this.manifests.get(assignmentId) ?? null;
  }

  /**
   * Mark an assignment withdrawn. In-flight tasks may still finish, but
   * outcomes recorded after this moment never reach a report.
   */
  withdraw(assignmentId: string, at: Date = this.clock()): void {
    if (!this.withdrawals.has(assignmentId)) {
      this.withdrawals.set(assignmentId, at.toISOString());
    }
    this.invalidateAssignment(assignmentId);
  }

  isWithdrawn(assignmentId: string): boolean {
    return this.withdrawals.has(assignmentId);
  }

  // Registered as a coordinator outcome listener
  handleOutcome = (outcome: TaskOutcome): void => {
    this.cache.delete(cacheKey(outcome.assignmentId, outcome.learnerId));
  };

  /**
   * Null when the assignment has no manifest or the manifest names no task
   * for this learner: such a learner has nothing to be complete against.
   */
  getReport(assignmentId: string, learnerId: string): Report | null {
    const manifest = this.manifests.get(assignmentId);
    if (!manifest) {
      return null;
    }
    const expectedTaskIds = manifest.tasks.filter((t) => t.learnerId === learnerId).map((t) => t.taskId);
    if (expectedTaskIds.length === 0) {
      return null;
    }

    const key = cacheKey(assignmentId, learnerId);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const withdrawnAt = this.withdrawals.get(assignmentId);
    const report = aggregate(learnerId, assignmentId, this.deps.outcomes.list({ assignmentId, learnerId }), {
      expectedTaskIds,
      rubric: this.deps.rubric,
      policy: this.deps.policy,
      ...(withdrawnAt !== undefined ? { withdrawnAt } : {}),
      isDeadLettered: (taskId) => this.deps.ledger.isDeadLettered(taskId),
    });

    this.cache.set(key, report);
    this.events({
      type: "report_aggregated",
      assignmentId,
      learnerId,
      status: report.status,
      completeness: report.completeness,
      at: this.clock().toISOString(),
    });
    return report;
  }

  /**
   * One report per learner named in the assignment's manifest.
   */
  getReports(assignmentId: string): Report[] {
    const manifest = this.manifests.get(assignmentId);
    if (!manifest) {
      return [];
    }
    const learners = [...new Set(manifest.tasks.map((t) => t.learnerId))].sort();
    const reports: Report[] = [];
    for (const learnerId of learners) {
      const report = this.getReport(assignmentId, learnerId);
      if (report) reports.push(report);
    }
    return reports;
  }

  private invalidateAssignment(assignmentId: string): void {
    const prefix = cacheKey(assignmentId, "");
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(prefix)) this.cache.delete(key);
    }
  }
}

function cacheKey(assignmentId: string, learnerId: string): string {
  return `${assignmentId}\u0000${learnerId}`;
}
