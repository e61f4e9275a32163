import type { Logger } from 'pino';
import { componentUptimeSeconds, createComponentInfo } from '../domain/index.js';
import type {
  ComponentInfo,
  ComponentStatus,
  HealthCheckFn,
  StartFn,
  StopFn,
} from '../domain/index.js';
import { ShutdownError, TimeoutError, errorMessage, raceShutdown, sleep, withTimeout } from './async-utils.js';

export interface ComponentSupervisorOptions {
  log: Logger;
  /** Automatic restarts allowed over a component's lifetime. */
  maxRestarts?: number;
  /** Pause between stopping and starting again during a restart. */
  restartCooldownMs?: number;
  healthCheckTimeoutMs?: number;
  /** Ceiling on a component's start function. */
  startTimeoutMs?: number;
  /** Ceiling on a component's stop function. */
  stopTimeoutMs?: number;
  nowFn?: () => number;
  /** Called when a start fails or a component is given up on. */
  onFailure?: (name: string, reason: string) => void;
}

export interface ComponentSnapshot {
  status: ComponentStatus;
  uptime_seconds: number;
  started_at: string | null;
  stopped_at: string | null;
  restarts: number;
  consecutive_failures: number;
  last_error: string;
  has_health_check: boolean;
}

/**
 * Owns the component registry and every status transition in it.
 *
 * Restart policy: at most `maxRestarts` automatic restarts per component,
 * each separated by a cooldown. Past the cap the component is marked
 * `failed` and left alone until restarted by hand.
 */
export class ComponentSupervisor {
  private readonly log: Logger;
  private readonly components: Map<string, ComponentInfo> = new Map();
  private readonly maxRestarts: number;
  private readonly restartCooldownMs: number;
  private readonly healthCheckTimeoutMs: number;
  private readonly startTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly nowFn: () => number;
  private readonly onFailure: (name: string, reason: string) => void;

  private restartCount = 0;

  constructor(options: ComponentSupervisorOptions) {
    this.log = options.log;
    this.maxRestarts = options.maxRestarts ?? 5;
    this.restartCooldownMs = options.restartCooldownMs ?? 60_000;
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? 10_000;
    this.startTimeoutMs = options.startTimeoutMs ?? 30_000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 10_000;
    this.nowFn = options.nowFn ?? Date.now;
    this.onFailure = options.onFailure ?? (() => undefined);
  }

  /** Restarts performed across all components. */
  get totalRestarts(): number {
    return this.restartCount;
  }

  get size(): number {
    return this.components.size;
  }

  register(name: string, start: StartFn, stop: StopFn, healthCheck?: HealthCheckFn): void {
    if (this.components.has(name)) {
      throw new Error(`Component "${name}" is already registered`);
    }
    this.components.set(name, createComponentInfo(name, start, stop, healthCheck ?? null));
    this.log.info({ component: name }, 'Component registered');
  }

  /** Stops the component if needed, then forgets it. */
  async unregister(name: string): Promise<boolean> {
    const component = this.components.get(name);
    if (component === undefined) return false;

    await this.stopComponent(component);
    this.components.delete(name);
    this.log.info({ component: name }, 'Component unregistered');
    return true;
  }

  statuses(): ComponentStatus[] {
    return [...this.components.values()].map((c) => c.status);
  }

  /** Starts every component in registration order; failures do not abort the rest. */
  async startAll(): Promise<void> {
    for (const component of this.components.values()) {
      this.log.info({ component: component.name }, 'Starting component');
      await this.startComponent(component);
    }
  }

  /** Best-effort stop of every component; errors are recorded, never thrown. */
  async stopAll(): Promise<void> {
    for (const component of this.components.values()) {
      await this.stopComponent(component);
    }
  }

  /**
   * Health-checks every running component and restarts the unhealthy ones.
   * Once `signal` aborts, a restart stops waiting on the component's stop,
   * cooldown or start.
   */
  async checkAll(signal?: AbortSignal): Promise<void> {
    for (const component of [...this.components.values()]) {
      if (component.status !== 'running') continue;
      if (signal?.aborted) return;

      const healthy = await this.checkHealth(component);
      if (healthy) continue;

      this.log.warn({ component: component.name }, 'Component unhealthy');
      await this.restartComponent(component, signal);
    }
  }

  /**
   * Manual restart: clears the restart budget and brings the component
   * back up. Returns false for unknown names or a failed start.
   */
  async restart(name: string): Promise<boolean> {
    const component = this.components.get(name);
    if (component === undefined) return false;

    this.log.info({ component: name }, 'Manual component restart');
    component.restarts = 0;
    await this.stopComponent(component);
    return this.startComponent(component);
  }

  snapshot(): Record<string, ComponentSnapshot> {
    const now = this.nowFn();
    const out: Record<string, ComponentSnapshot> = {};
    for (const [name, c] of this.components) {
      out[name] = {
        status: c.status,
        uptime_seconds: componentUptimeSeconds(c, now),
        started_at: c.started_at,
        stopped_at: c.stopped_at,
        restarts: c.restarts,
        consecutive_failures: c.consecutive_failures,
        last_error: c.last_error,
        has_health_check: c.healthCheck !== null,
      };
    }
    return out;
  }

  get(name: string): ComponentSnapshot | undefined {
    return this.snapshot()[name];
  }

  private async startComponent(component: ComponentInfo, signal?: AbortSignal): Promise<boolean> {
    if (component.status === 'running') return true;

    component.status = 'starting';

    let reason: string;
    try {
      const started = await raceShutdown(
        withTimeout(() => component.start(), this.startTimeoutMs),
        signal,
      );
      if (started) {
        component.status = 'running';
        component.started_at = this.isoNow();
        component.consecutive_failures = 0;
        this.log.info({ component: component.name }, 'Component started');
        return true;
      }
      reason = 'start function returned false';
      this.log.error({ component: component.name }, 'Component failed to start');
    } catch (err: unknown) {
      if (err instanceof ShutdownError) {
        component.status = 'stopped';
        this.log.info({ component: component.name }, 'Shutdown during component start, abandoning it');
        return false;
      }
      reason = err instanceof TimeoutError
        ? `start timed out after ${this.startTimeoutMs}ms`
        : errorMessage(err);
      this.log.error({ err, component: component.name }, 'Error starting component');
    }

    component.status = 'failed';
    component.last_error = reason;
    component.consecutive_failures++;
    this.onFailure(component.name, reason);
    return false;
  }

  private async stopComponent(component: ComponentInfo, signal?: AbortSignal): Promise<void> {
    if (component.status === 'stopped') return;

    component.status = 'stopping';
    try {
      await raceShutdown(withTimeout(() => component.stop(), this.stopTimeoutMs), signal);
      this.log.info({ component: component.name }, 'Component stopped');
    } catch (err: unknown) {
      component.last_error = err instanceof TimeoutError
        ? `stop timed out after ${this.stopTimeoutMs}ms`
        : errorMessage(err);
      this.log.error({ err, component: component.name }, 'Error stopping component');
    }
    component.status = 'stopped';
    component.stopped_at = this.isoNow();
  }

  private async restartComponent(component: ComponentInfo, signal?: AbortSignal): Promise<boolean> {
    if (component.restarts >= this.maxRestarts) {
      const reason = `health check failed after ${component.restarts} restarts, giving up`;
      component.status = 'failed';
      component.last_error = reason;
      component.consecutive_failures++;
      this.log.error(
        { component: component.name, restarts: component.restarts },
        'Max restarts reached, not restarting',
      );
      this.onFailure(component.name, reason);
      return false;
    }

    component.status = 'restarting';
    component.restarts++;
    this.restartCount++;
    this.log.info(
      { component: component.name, restart: component.restarts },
      'Restarting component',
    );

    await this.stopComponent(component, signal);
    component.status = 'restarting';
    await sleep(this.restartCooldownMs, signal);

    if (signal?.aborted) {
      component.status = 'stopped';
      this.log.info({ component: component.name }, 'Shutdown during restart, not starting');
      return false;
    }

    return this.startComponent(component, signal);
  }

  private async checkHealth(component: ComponentInfo): Promise<boolean> {
    const check = component.healthCheck;
    if (check === null) return true;

    try {
      return await withTimeout(() => check(), this.healthCheckTimeoutMs);
    } catch (err: unknown) {
      this.log.warn({ err, component: component.name }, 'Health check failed');
      return false;
    }
  }

  private isoNow(): string {
    return new Date(this.nowFn()).toISOString();
  }
}
