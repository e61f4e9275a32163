export type TaskFn = () => Promise<void>;

/**
 * A named recurring job owned by the daemon.
 *
 * Failures never disable a task: each due tick runs it once and pushes
 * `next_run` one interval forward, whatever the outcome.
 */
export interface ScheduledTask {
  readonly name: string;
  readonly run: TaskFn;
  readonly interval_seconds: number;
  last_run: string | null; // ISO-8601, last successful run
  next_run: string | null; // ISO-8601
  runs: number;
  errors: number;
  enabled: boolean;
}

export function createScheduledTask(
  name: string,
  run: TaskFn,
  intervalSeconds: number,
  nowMs: number,
): ScheduledTask {
  if (!Number.isFinite(intervalSeconds) || intervalSeconds < 0) {
    throw new RangeError(`interval_seconds must be a non-negative number, got ${intervalSeconds}`);
  }

  const task: ScheduledTask = {
    name,
    run,
    interval_seconds: intervalSeconds,
    last_run: null,
    next_run: null,
    runs: 0,
    errors: 0,
    enabled: true,
  };
  scheduleNext(task, nowMs);
  return task;
}

export function isDue(task: ScheduledTask, nowMs: number): boolean {
  if (!task.enabled) return false;
  if (task.next_run === null) return true;
  return nowMs >= Date.parse(task.next_run);
}

export function scheduleNext(task: ScheduledTask, fromMs: number): void {
  task.next_run = new Date(fromMs + task.interval_seconds * 1000).toISOString();
}
