/** Aggregated health of the daemon. */
export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/** Lifecycle state of a supervised component. */
export type ComponentStatus =
  | 'stopped'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'failed'
  | 'restarting';

/** Resolves `true` when the component came up. */
export type StartFn = () => Promise<boolean>;
export type StopFn = () => Promise<void>;
export type HealthCheckFn = () => Promise<boolean>;

/** What an adapter exposes to be supervised. */
export interface SupervisedComponent {
  start(): Promise<boolean>;
  stop(): Promise<void>;
  healthCheck?(): Promise<boolean>;
}

/**
 * A long-running sub-service under supervision (stream listener,
 * webhook server, ...).
 *
 * Created `stopped` at registration. Only the supervisor moves it
 * between states; callers read it through status snapshots.
 */
export interface ComponentInfo {
  readonly name: string;
  status: ComponentStatus;
  readonly start: StartFn;
  readonly stop: StopFn;
  readonly healthCheck: HealthCheckFn | null;

  started_at: string | null; // ISO-8601
  stopped_at: string | null; // ISO-8601
  restarts: number;
  last_error: string;
  consecutive_failures: number;
}

export function createComponentInfo(
  name: string,
  start: StartFn,
  stop: StopFn,
  healthCheck: HealthCheckFn | null = null,
): ComponentInfo {
  return {
    name,
    status: 'stopped',
    start,
    stop,
    healthCheck,
    started_at: null,
    stopped_at: null,
    restarts: 0,
    last_error: '',
    consecutive_failures: 0,
  };
}

/** Seconds since the component last started, 0 unless it is running. */
export function componentUptimeSeconds(component: ComponentInfo, nowMs: number): number {
  if (component.status !== 'running' || component.started_at === null) return 0;
  return Math.max(0, (nowMs - Date.parse(component.started_at)) / 1000);
}
