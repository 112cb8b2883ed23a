import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import type { DaemonRpcPort } from '../application/ports/output/daemon-rpc.port';
import type { DaemonLogPort } from '../application/ports/output/daemon-log.port';
import type { EventPublisherPort } from '../application/ports/output/event-publisher.port';
import type {
  ArtifactRemoval,
  ServiceHostMode,
  ServiceHostPort,
} from '../application/ports/output/service-host.port';
import {
  DAEMON_HANDLE,
  DAEMON_LOG_PORT,
  DAEMON_RPC_PORT,
  EVENT_PUBLISHER_PORT,
  SERVICE_HOST_PORT,
} from '../application/ports/injection-tokens';
import type { DaemonHandle } from '../domain/value-objects/daemon-handle.vo';
import {
  RUNNING_DEGRADED,
  type ReportedServiceState,
  ServiceState,
  ServiceStateVO,
} from '../domain/value-objects/service-state.vo';
import { ServiceStateChangedEvent } from '../domain/events/service-state-changed.event';
import { LifecycleError, RelayError, describeError } from '../domain/errors/relay.errors';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';

export const SERVICE_MANAGER_OPTIONS = 'ServiceManagerOptions';

export interface ServiceManagerOptions {
  startHealthCheckAttempts: number;
  startHealthCheckIntervalMs: number;
  stopGracePeriodMs: number;
  /** How often a stopping daemon is checked for exit. */
  exitPollIntervalMs?: number;
}

export interface ServiceStatus {
  state: ReportedServiceState;
  mode: ServiceHostMode;
  pid?: number;
  version?: string;
}

export interface ServiceStateChange {
  from: ServiceState;
  to: ServiceState;
  reason?: string;
}

export type ServiceStateListener = (change: ServiceStateChange) => void;

const STATE_CHANGED = 'stateChanged';
const DEFAULT_LOG_LINES = 50;

/**
 * Supervises the one daemon process through the host adapter.
 *
 * A refused or failed operation leaves the recorded state consistent: guards
 * run before any transition, and every started transition ends in a stable
 * state (`stopped`, `running`, or `failed`).
 */
@Injectable()
export class ServiceManager implements OnModuleInit {
  private state: ServiceStateVO = ServiceStateVO.notInstalled();
  private startController: AbortController | null = null;
  private startPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private readonly emitter = new EventEmitter();
  private readonly logger: PinoLoggerService;
  private readonly exitPollIntervalMs: number;

  constructor(
    @Inject(DAEMON_HANDLE) private readonly handle: DaemonHandle,
    @Inject(SERVICE_HOST_PORT) private readonly host: ServiceHostPort,
    @Inject(DAEMON_RPC_PORT) private readonly rpc: DaemonRpcPort,
    @Inject(DAEMON_LOG_PORT) private readonly daemonLog: DaemonLogPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    @Inject(SERVICE_MANAGER_OPTIONS) private readonly options: ServiceManagerOptions,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(ServiceManager.name);
    this.exitPollIntervalMs = options.exitPollIntervalMs ?? 200;
  }

  async onModuleInit(): Promise<void> {
    await this.initialize();
  }

  /**
   * Derive the state from what the host reports: a running daemon left over
   * from a previous process is adopted as `running`.
   */
  async initialize(): Promise<ServiceState> {
    const installed = await this.host.isInstalled(this.handle);
    let next = ServiceState.NOT_INSTALLED;
    if (installed) {
      next = (await this.host.isAlive(this.handle)) ? ServiceState.RUNNING : ServiceState.STOPPED;
    }

    this.applyState(ServiceStateVO.of(next), 'initialized from host');
    this.logger.info({ state: next, mode: this.host.mode }, 'Service manager initialized');
    return next;
  }

  getState(): ServiceState {
    return this.state.value;
  }

  getHandle(): DaemonHandle {
    return this.handle;
  }

  /** Returns an unsubscribe function. */
  onStateChange(listener: ServiceStateListener): () => void {
    this.emitter.on(STATE_CHANGED, listener);
    return () => {
      this.emitter.off(STATE_CHANGED, listener);
    };
  }

  // ===== install / uninstall =====

  async install(): Promise<ServiceState> {
    if (this.state.isInstalled()) {
      throw new LifecycleError('ALREADY_INSTALLED', 'Service is already installed', {
        state: this.state.value,
      });
    }

    const missing = await this.host.missingArtifacts(this.handle);
    if (missing.length > 0) {
      throw new LifecycleError(
        'MISSING_ARTIFACTS',
        `Daemon binary or config missing: ${missing.join(', ')}`,
        { missing },
      );
    }

    await this.hostCall('install', () => this.host.install(this.handle));
    this.transition(ServiceState.STOPPED, 'installed');
    return this.state.value;
  }

  async uninstall(
    removal: ArtifactRemoval = { removeConfig: false, removeBinary: false },
  ): Promise<ServiceState> {
    if (this.state.value === ServiceState.NOT_INSTALLED) {
      return this.state.value;
    }
    if (this.state.value === ServiceState.STARTING) {
      // Cancel the health-check loop and take down what it launched; the
      // caller still has to uninstall from `stopped`.
      await this.stop();
      throw new LifecycleError(
        'INVALID_STATE',
        `Service was starting; the start was cancelled (state: ${this.state.value})`,
        { state: this.state.value },
      );
    }
    if (this.state.value !== ServiceState.STOPPED) {
      throw new LifecycleError(
        'INVALID_STATE',
        `Service must be stopped before uninstalling (state: ${this.state.value})`,
        { state: this.state.value },
      );
    }

    await this.hostCall('uninstall', () => this.host.uninstall(this.handle, removal));
    this.transition(ServiceState.NOT_INSTALLED, 'uninstalled');
    return this.state.value;
  }

  // ===== start =====

  async start(): Promise<ServiceState> {
    this.assertStartable();

    this.transition(ServiceState.STARTING);
    const controller = new AbortController();
    this.startController = controller;
    const run = this.runStart(controller.signal);
    this.startPromise = run;

    try {
      await run;
      return this.state.value;
    } finally {
      if (this.startPromise === run) {
        this.startPromise = null;
        this.startController = null;
      }
    }
  }

  private assertStartable(): void {
    if (this.state.canStart()) {
      return;
    }
    if (!this.state.isInstalled()) {
      throw new LifecycleError('NOT_INSTALLED', 'Service is not installed');
    }
    if (this.state.isBusy()) {
      throw new LifecycleError(
        'OPERATION_IN_PROGRESS',
        `Service is ${this.state.value}, try again shortly`,
        { state: this.state.value },
      );
    }
    throw new LifecycleError('ALREADY_RUNNING', 'Service is already running');
  }

  /**
   * On cancellation the state belongs to stop(); this only reports it.
   */
  private async runStart(signal: AbortSignal): Promise<void> {
    const cancelled = () =>
      new LifecycleError('START_CANCELLED', 'Start was cancelled by a stop request');

    let pid: number | undefined;
    try {
      pid = await this.host.launch(this.handle);
    } catch (error) {
      if (signal.aborted) {
        throw cancelled();
      }
      this.transition(ServiceState.FAILED, `launch failed: ${describeError(error)}`);
      throw error instanceof RelayError
        ? error
        : new LifecycleError('HOST_FAILURE', `Failed to launch daemon: ${describeError(error)}`);
    }

    const { startHealthCheckAttempts: attempts, startHealthCheckIntervalMs: interval } =
      this.options;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (signal.aborted) {
        throw cancelled();
      }

      try {
        const version = await this.rpc.getVersion({ signal });
        if (signal.aborted) {
          throw cancelled();
        }
        this.transition(ServiceState.RUNNING, 'health check passed', pid);
        this.logger.info({ pid, version: version.version, attempt }, 'Daemon is running');
        return;
      } catch (error) {
        if (signal.aborted) {
          throw cancelled();
        }
        this.logger.debug({ attempt, error: describeError(error) }, 'Daemon not answering yet');
      }

      if (attempt < attempts) {
        try {
          await sleep(interval, undefined, { signal });
        } catch {
          throw cancelled();
        }
      }
    }

    await this.host.terminate(this.handle, 'SIGKILL').catch((error: unknown) => {
      this.logger.warn({ error: describeError(error) }, 'Could not terminate unresponsive daemon');
    });
    if (signal.aborted) {
      throw cancelled();
    }
    this.transition(ServiceState.FAILED, 'health checks exhausted');
    throw new LifecycleError(
      'START_TIMEOUT',
      `Daemon did not answer after ${attempts} health checks`,
      { attempts, intervalMs: interval },
    );
  }

  // ===== stop / restart =====

  /**
   * Concurrent calls share one stop. A start in progress is cancelled and
   * whatever it launched is shut down.
   */
  async stop(): Promise<ServiceState> {
    if (this.stopPromise) {
      await this.stopPromise;
      return this.state.value;
    }

    const current = this.state.value;
    if (current === ServiceState.STOPPED || current === ServiceState.NOT_INSTALLED) {
      return current;
    }

    this.transition(ServiceState.STOPPING);
    this.startController?.abort();

    const run = this.runStop();
    this.stopPromise = run;
    try {
      await run;
      return this.state.value;
    } finally {
      this.stopPromise = null;
    }
  }

  private async runStop(): Promise<void> {
    if (this.startPromise) {
      await this.startPromise.catch(() => undefined);
    }

    const grace = this.options.stopGracePeriodMs;
    try {
      await this.rpc.shutdown({ timeoutMs: grace });
    } catch (error) {
      this.logger.debug({ error: describeError(error) }, 'RPC shutdown failed, signalling daemon');
      await this.terminateQuietly('SIGTERM');
    }

    let exited = await this.waitForExit(grace);
    if (!exited) {
      this.logger.warn({ graceMs: grace }, 'Daemon ignored graceful stop, forcing termination');
      await this.terminateQuietly('SIGKILL');
      exited = await this.waitForExit(grace);
    }

    if (!exited) {
      this.transition(ServiceState.FAILED, 'process survived forced termination');
      throw new LifecycleError('STOP_FAILED', 'Daemon process did not exit');
    }
    this.transition(ServiceState.STOPPED, 'stopped');
  }

  /**
   * Not atomic: if start() fails the service stays `stopped` or `failed`.
   */
  async restart(): Promise<ServiceState> {
    await this.stop();
    return this.start();
  }

  // ===== status / logs =====

  async status(): Promise<ServiceStatus> {
    const state = this.state.value;
    const status: ServiceStatus = { state, mode: this.host.mode };

    if (state === ServiceState.NOT_INSTALLED) {
      return status;
    }
    status.pid = await this.host.getPid(this.handle).catch(() => undefined);

    if (state === ServiceState.RUNNING) {
      try {
        const version = await this.rpc.getVersion();
        status.version = version.version;
      } catch (error) {
        this.logger.warn({ error: describeError(error) }, 'Daemon running but RPC probe failed');
        status.state = RUNNING_DEGRADED;
      }
    }
    return status;
  }

  async logs(lines = DEFAULT_LOG_LINES): Promise<string[]> {
    return this.hostCall('read log', () => this.daemonLog.tail(this.handle.logPath, lines));
  }

  async clearLogs(): Promise<void> {
    await this.hostCall('clear log', () => this.daemonLog.truncate(this.handle.logPath));
    this.logger.info({ logPath: this.handle.logPath }, 'Daemon log cleared');
  }

  // ===== Internals =====

  private async waitForExit(timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const alive = await this.host.isAlive(this.handle).catch(() => true);
      if (!alive) {
        return true;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return false;
      }
      await sleep(Math.min(this.exitPollIntervalMs, remaining));
    }
  }

  private async terminateQuietly(signal: 'SIGTERM' | 'SIGKILL'): Promise<void> {
    try {
      await this.host.terminate(this.handle, signal);
    } catch (error) {
      this.logger.warn({ signal, error: describeError(error) }, 'Failed to signal daemon');
    }
  }

  private async hostCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RelayError) {
        throw error;
      }
      throw new LifecycleError('HOST_FAILURE', `Failed to ${operation}: ${describeError(error)}`);
    }
  }

  private transition(next: ServiceState, reason?: string, pid?: number): void {
    const target = ServiceStateVO.of(next);
    if (!this.state.canTransitionTo(target)) {
      throw new LifecycleError(
        'INVALID_STATE',
        `Invalid service transition ${this.state.value} -> ${next}`,
      );
    }
    this.applyState(target, reason, pid);
  }

  private applyState(next: ServiceStateVO, reason?: string, pid?: number): void {
    const from = this.state.value;
    this.state = next;
    if (from === next.value) {
      return;
    }

    this.logger.info({ from, to: next.value, reason }, 'Service state changed');
    const change: ServiceStateChange = { from, to: next.value, reason };
    this.emitter.emit(STATE_CHANGED, change);
    this.eventPublisher.publishAsync(
      new ServiceStateChangedEvent({
        serviceName: this.handle.serviceName,
        from,
        to: next.value,
        pid,
        reason,
      }),
    );
  }
}
