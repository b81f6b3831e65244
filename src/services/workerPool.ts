import { Task, TaskKind } from "../domain/task";
import { ExecutionCoordinator, ExecutionResult } from "./executionCoordinator";

export interface LaneSettings {
  name: string;
  concurrency: number;
  kinds: TaskKind[];
}

export interface WorkerPoolOptions {
  lanes: LaneSettings[];
  // Lane for kinds no lane claims (including unsupported kinds)
  defaultLane: string;
  clock?: () => Date;
}

interface Lane {
  name: string;
  concurrency: number;
  active: number;
  queue: Task[];
}

export interface LaneStats {
  name: string;
  queued: number;
  active: number;
}

/**
 * WorkerPool runs tasks through the coordinator in isolated lanes, each
 * with its own queue and concurrency limit. Audio work never occupies a
 * standard-lane slot.
 *
 * A failed attempt frees its slot at once; the task comes back on its
 * lane's queue when its retry time arrives.
 */
export class WorkerPool {
  private readonly lanes = new Map<string, Lane>();
  private readonly laneByKind = new Map<TaskKind, Lane>();
  private readonly defaultLane: Lane;
  private readonly delayed = new Set<NodeJS.Timeout>();
  private readonly idleWaiters: Array<() => void> = [];
  private readonly clock: () => Date;
  private stopped = false;

  constructor(
    private readonly coordinator: ExecutionCoordinator,
    options: WorkerPoolOptions
  ) {
    this.clock = options.clock ?? (() => new Date());

    for (const settings of options.lanes) {
      if (!Number.isInteger(settings.concurrency) || settings.concurrency < 1) {
        throw new Error(`Lane ${settings.name}: concurrency must be a positive integer`);
      }
      const lane: Lane = { name: settings.name, concurrency: settings.concurrency, active: 0, queue: [] };
      this.lanes.set(settings.name, lane);
      for (const kind of settings.kinds) {
        this.laneByKind.set(kind, lane);
      }
    }

    const fallback = this.lanes.get(options.defaultLane);
    if (!fallback) {
      throw new Error(`Default lane "${options.defaultLane}" is not configured`);
    }
    this.defaultLane = fallback;
  }

  /**
   * Enqueue a delivered task. Duplicates are fine: the coordinator's
   * idempotency guard drops them.
   */
  submit(task: Task): void {
    if (this.stopped) {
      throw new Error("WorkerPool is stopped");
    }
    const lane = this.laneFor(task.kind);
    lane.queue.push(task);
    this.pump(lane);
  }

  /**
   * Resolves once every lane is empty and idle and no retry is pending.
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stop accepting work, drop queued tasks and pending retries, and wait
   * for in-flight attempts to finish.
   */
  stop(): Promise<void> {
    this.stopped = true;
    for (const timer of this.delayed) {
      clearTimeout(timer);
    }
    this.delayed.clear();
    for (const lane of this.lanes.values()) {
      lane.queue.length = 0;
    }
    return this.drain();
  }

  stats(): { lanes: LaneStats[]; delayed: number } {
    return {
      lanes: [...this.lanes.values()].map((l) => ({ name: l.name, queued: l.queue.length, active: l.active })),
      delayed: this.delayed.size,
    };
  }

  laneNameFor(kind: TaskKind): string {
    return this.laneFor(kind).name;
  }

  private laneFor(kind: TaskKind): Lane {
    return this.laneByKind.get(kind) ?? this.defaultLane;
  }

  private pump(lane: Lane): void {
    while (!this.stopped && lane.active < lane.concurrency && lane.queue.length > 0) {
      const task = lane.queue.shift();
      if (!task) break;
      lane.active++;
      void this.run(lane, task);
    }
  }

  private async run(lane: Lane, task: Task): Promise<void> {
    try {
      const result = await this.coordinator.execute(task);
      this.afterExecution(task, result);
    } catch (error) {
      console.error(`[WorkerPool] ${lane.name} lane failed to execute ${task.taskId}:`, error);
    } finally {
      lane.active--;
      this.pump(lane);
      this.notifyIfIdle();
    }
  }

  private afterExecution(task: Task, result: ExecutionResult): void {
    if (result.type === "completed" && result.outcome.status === "failed") {
      this.scheduleRetry(task, result.outcome.retryAt);
    } else if (result.type === "not_due") {
      this.scheduleRetry(task, result.outcome.retryAt);
    }
  }

  // Re-enqueue with a visibility delay instead of holding a worker slot
  private scheduleRetry(task: Task, retryAt: string): void {
    if (this.stopped) return;
    const delayMs = Math.max(0, Date.parse(retryAt) - this.clock().getTime());
    const timer = setTimeout(() => {
      this.delayed.delete(timer);
      if (this.stopped) return;
      const lane = this.laneFor(task.kind);
      lane.queue.push(task);
      this.pump(lane);
    }, delayMs);
    this.delayed.add(timer);
  }

  private isIdle(): boolean {
    if (this.delayed.size > 0) return false;
    for (const lane of this.lanes.values()) {
      if (lane.active > 0 || lane.queue.length > 0) return false;
    }
    return true;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
    for (const resolve of waiters) {
      resolve();
    }
  }
}
