import type { Logger } from 'pino';
import { EventPriority, EventType, createEvent } from '../domain/index.js';
import type {
  HealthCheckFn,
  HealthStatus,
  StartFn,
  StopFn,
  SupervisedComponent,
  TaskFn,
} from '../domain/index.js';
import type { DispatcherStats, EventDispatcher } from './event-dispatcher.js';
import { ComponentSupervisor } from './component-supervisor.js';
import type { ComponentSnapshot } from './component-supervisor.js';
import { TaskScheduler } from './task-scheduler.js';
import type { TaskSnapshot } from './task-scheduler.js';
import { sleep } from './async-utils.js';

type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface HeartbeatDaemonOptions {
  dispatcher: EventDispatcher;
  log: Logger;
  heartbeatIntervalSeconds?: number;
  maxComponentRestarts?: number;
  restartCooldownSeconds?: number;
  healthCheckTimeoutSeconds?: number;
  componentStartTimeoutSeconds?: number;
  componentStopTimeoutSeconds?: number;
  /** Install SIGINT/SIGTERM listeners on start. */
  handleSignals?: boolean;
  /** Pause after an unexpected heartbeat loop error. */
  errorBackoffMs?: number;
  nowFn?: () => number;
}

export type DaemonStatus = {
  running: boolean;
  health: HealthStatus;
  uptime_seconds: number;
  started_at: string | null;
  heartbeat_interval_seconds: number;
  heartbeats_sent: number;
  tasks_executed: number;
  component_restarts: number;
  components: Record<string, ComponentSnapshot>;
  scheduled_tasks: Record<string, TaskSnapshot>;
  dispatcher: DispatcherStats;
};

/**
 * Always-on orchestrator.
 *
 * Owns the component supervisor and the task scheduler, starts and stops
 * the dispatcher, and on every heartbeat:
 *   1. health-checks running components, restarting unhealthy ones
 *   2. runs due scheduled tasks
 *   3. emits a LOW priority heartbeat event carrying the status snapshot
 *   4. waits for the next interval or shutdown, whichever comes first
 *
 * OS signals only abort the shutdown controller; teardown happens in
 * `stop()`, which `run()` always reaches.
 */
export class HeartbeatDaemon {
  readonly dispatcher: EventDispatcher;

  private readonly log: Logger;
  private readonly supervisor: ComponentSupervisor;
  private readonly scheduler: TaskScheduler;
  private readonly heartbeatIntervalMs: number;
  private readonly handleSignals: boolean;
  private readonly errorBackoffMs: number;
  private readonly nowFn: () => number;

  private running = false;
  private startedAt: string | null = null;
  private shutdown = new AbortController();
  private receivedSignal: ShutdownSignal | null = null;
  private readonly signalListeners = new Map<ShutdownSignal, () => void>();
  private heartbeatsSent = 0;

  constructor(options: HeartbeatDaemonOptions) {
    this.dispatcher = options.dispatcher;
    this.log = options.log;
    this.heartbeatIntervalMs = (options.heartbeatIntervalSeconds ?? 30) * 1000;
    this.handleSignals = options.handleSignals ?? true;
    this.errorBackoffMs = options.errorBackoffMs ?? 5000;
    this.nowFn = options.nowFn ?? Date.now;

    this.supervisor = new ComponentSupervisor({
      log: this.log,
      maxRestarts: options.maxComponentRestarts ?? 5,
      restartCooldownMs: (options.restartCooldownSeconds ?? 60) * 1000,
      healthCheckTimeoutMs: (options.healthCheckTimeoutSeconds ?? 10) * 1000,
      startTimeoutMs: (options.componentStartTimeoutSeconds ?? 30) * 1000,
      stopTimeoutMs: (options.componentStopTimeoutSeconds ?? 10) * 1000,
      nowFn: this.nowFn,
      onFailure: (name, reason) => this.reportFailure(name, reason),
    });
    this.scheduler = new TaskScheduler(this.log, this.nowFn);
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Aborted once shutdown is requested. */
  get shutdownSignal(): AbortSignal {
    return this.shutdown.signal;
  }

  registerComponent(name: string, start: StartFn, stop: StopFn, healthCheck?: HealthCheckFn): void {
    this.supervisor.register(name, start, stop, healthCheck);
  }

  /** Registers an adapter object, binding its lifecycle methods. */
  supervise(name: string, component: SupervisedComponent): void {
    const check = component.healthCheck;
    this.supervisor.register(
      name,
      () => component.start(),
      () => component.stop(),
      check === undefined ? undefined : () => check.call(component),
    );
  }

  unregisterComponent(name: string): Promise<boolean> {
    return this.supervisor.unregister(name);
  }

  /** Manual restart for a component the automatic policy gave up on. */
  restartComponent(name: string): Promise<boolean> {
    return this.supervisor.restart(name);
  }

  schedule(name: string, run: TaskFn, intervalSeconds: number): void {
    this.scheduler.schedule(name, run, intervalSeconds);
  }

  unschedule(name: string): boolean {
    return this.scheduler.unschedule(name);
  }

  setTaskEnabled(name: string, enabled: boolean): boolean {
    return this.scheduler.setEnabled(name, enabled);
  }

  async start(): Promise<void> {
    if (this.running) {
      this.log.warn('Daemon already running');
      return;
    }

    this.log.info('Starting heartbeat daemon');
    this.running = true;
    this.startedAt = new Date(this.nowFn()).toISOString();
    this.shutdown = new AbortController();
    this.receivedSignal = null;

    if (this.handleSignals) this.installSignalHandlers();

    await this.dispatcher.start();
    await this.supervisor.startAll();

    this.log.info({ components: this.supervisor.size, tasks: this.scheduler.size }, 'All components started');
  }

  /** Sets the shutdown flag; the heartbeat loop exits on its next wait. */
  requestShutdown(): void {
    this.shutdown.abort();
  }

  /** Start, beat until shutdown is requested, then always stop. */
  async run(): Promise<void> {
    try {
      await this.start();
      await this.heartbeatLoop();
    } finally {
      await this.stop();
    }
  }

  /** Idempotent. Component stop errors are logged, never thrown. */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.log.info('Stopping heartbeat daemon');
    this.running = false;
    this.shutdown.abort();
    this.removeSignalHandlers();

    await this.supervisor.stopAll();
    await this.dispatcher.stop();

    this.log.info('Heartbeat daemon stopped');
  }

  /** One supervision pass: health checks, due tasks, heartbeat event. */
  async tick(): Promise<void> {
    const signal = this.shutdown.signal;

    await this.supervisor.checkAll(signal);
    await this.scheduler.runDue();

    this.heartbeatsSent++;
    this.dispatcher.emit(createEvent({
      type: EventType.HEARTBEAT,
      priority: EventPriority.LOW,
      source: 'heartbeat_daemon',
      content: `Heartbeat #${this.heartbeatsSent}`,
      metadata: this.getStatus(),
    }));
  }

  getHealth(): HealthStatus {
    if (!this.running) return 'healthy';

    const statuses = this.supervisor.statuses();
    if (statuses.every((s) => s === 'running')) return 'healthy';
    if (statuses.some((s) => s === 'failed' || s === 'stopped')) return 'unhealthy';
    return 'degraded';
  }

  getStatus(): DaemonStatus {
    const uptime = this.startedAt === null
      ? 0
      : Math.max(0, (this.nowFn() - Date.parse(this.startedAt)) / 1000);

    return {
      running: this.running,
      health: this.getHealth(),
      uptime_seconds: uptime,
      started_at: this.startedAt,
      heartbeat_interval_seconds: this.heartbeatIntervalMs / 1000,
      heartbeats_sent: this.heartbeatsSent,
      tasks_executed: this.scheduler.tasksExecuted,
      component_restarts: this.supervisor.totalRestarts,
      components: this.supervisor.snapshot(),
      scheduled_tasks: this.scheduler.snapshot(),
      dispatcher: this.dispatcher.getStats(),
    };
  }

  private async heartbeatLoop(): Promise<void> {
    const signal = this.shutdown.signal;
    this.log.info({ interval_ms: this.heartbeatIntervalMs }, 'Heartbeat loop started');

    while (this.running && !signal.aborted) {
      try {
        await this.tick();
        await sleep(this.heartbeatIntervalMs, signal);
      } catch (err: unknown) {
        this.log.error({ err }, 'Error in heartbeat loop, backing off');
        await sleep(this.errorBackoffMs, signal);
      }
    }

    this.log.info({ signal: this.receivedSignal }, 'Heartbeat loop stopped');
  }

  private reportFailure(name: string, reason: string): void {
    this.dispatcher.emit(createEvent({
      type: EventType.ERROR,
      priority: EventPriority.CRITICAL,
      source: 'heartbeat_daemon',
      source_id: name,
      content: `Component ${name} failed: ${reason}`,
      metadata: { component: name, reason },
    }));
  }

  private installSignalHandlers(): void {
    const signals: ShutdownSignal[] = process.platform === 'win32'
      ? ['SIGINT']
      : ['SIGINT', 'SIGTERM'];

    for (const sig of signals) {
      const listener = (): void => {
        this.receivedSignal = sig;
        this.shutdown.abort();
      };
      this.signalListeners.set(sig, listener);
      process.on(sig, listener);
    }
  }

  private removeSignalHandlers(): void {
    for (const [sig, listener] of this.signalListeners) {
      process.off(sig, listener);
    }
    this.signalListeners.clear();
  }
}
