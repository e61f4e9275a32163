import type { Logger } from 'pino';
import { createScheduledTask, isDue, scheduleNext } from '../domain/index.js';
import type { ScheduledTask, TaskFn } from '../domain/index.js';

export interface TaskSnapshot {
  enabled: boolean;
  interval_seconds: number;
  runs: number;
  errors: number;
  last_run: string | null;
  next_run: string | null;
}

/**
 * Lightweight interval scheduler driven by the heartbeat tick.
 *
 * Due tasks run one after another; each failure is logged and counted
 * on its task only. A failed task keeps its normal interval.
 */
export class TaskScheduler {
  private readonly log: Logger;
  private readonly tasks: Map<string, ScheduledTask> = new Map();
  private readonly nowFn: () => number;
  private executed = 0;

  constructor(log: Logger, nowFn: () => number = Date.now) {
    this.log = log;
    this.nowFn = nowFn;
  }

  /** Successful task executions across all tasks. */
  get tasksExecuted(): number {
    return this.executed;
  }

  get size(): number {
    return this.tasks.size;
  }

  schedule(name: string, run: TaskFn, intervalSeconds: number): void {
    if (this.tasks.has(name)) {
      throw new Error(`Task "${name}" is already scheduled`);
    }
    const task = createScheduledTask(name, run, intervalSeconds, this.nowFn());
    this.tasks.set(name, task);
    this.log.info({ task: name, interval_seconds: intervalSeconds }, 'Task scheduled');
  }

  unschedule(name: string): boolean {
    if (!this.tasks.delete(name)) return false;
    this.log.info({ task: name }, 'Task unscheduled');
    return true;
  }

  setEnabled(name: string, enabled: boolean): boolean {
    const task = this.tasks.get(name);
    if (task === undefined) return false;
    task.enabled = enabled;
    this.log.info({ task: name, enabled }, 'Task toggled');
    return true;
  }

  /** Runs every task due at the current time. Never throws. */
  async runDue(): Promise<number> {
    let ran = 0;

    for (const task of [...this.tasks.values()]) {
      const now = this.nowFn();
      if (!isDue(task, now)) continue;

      ran++;
      try {
        this.log.debug({ task: task.name }, 'Running scheduled task');
        await task.run();
        task.runs++;
        task.last_run = new Date(this.nowFn()).toISOString();
        this.executed++;
        this.log.debug({ task: task.name, runs: task.runs }, 'Task completed');
      } catch (err: unknown) {
        task.errors++;
        this.log.error({ err, task: task.name, errors: task.errors }, 'Scheduled task failed');
      } finally {
        scheduleNext(task, now);
      }
    }

    return ran;
  }

  snapshot(): Record<string, TaskSnapshot> {
    const out: Record<string, TaskSnapshot> = {};
    for (const [name, task] of this.tasks) {
      out[name] = {
        enabled: task.enabled,
        interval_seconds: task.interval_seconds,
        runs: task.runs,
        errors: task.errors,
        last_run: task.last_run,
        next_run: task.next_run,
      };
    }
    return out;
  }

  get(name: string): TaskSnapshot | undefined {
    return this.snapshot()[name];
  }
}
