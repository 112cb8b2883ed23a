import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import type { DaemonRpcPort } from '../../application/ports/output/daemon-rpc.port';
import type { EventPublisherPort } from '../../application/ports/output/event-publisher.port';
import type { SeenTaskStorePort } from '../../application/ports/output/seen-task-store.port';
import {
  DAEMON_RPC_PORT,
  EVENT_PUBLISHER_PORT,
  SEEN_TASK_STORE_PORT,
} from '../../application/ports/injection-tokens';
import {
  DownloadTask,
  type DownloadTaskStatus,
} from '../../domain/entities/download-task.entity';
import { DownloadCompletedEvent } from '../../domain/events/download-completed.event';
import { DownloadAbandonedEvent } from '../../domain/events/download-abandoned.event';
import { RemoteError, describeError } from '../../domain/errors/relay.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export const COMPLETION_WATCHER_OPTIONS = 'CompletionWatcherOptions';

export interface CompletionWatcherOptions {
  pollIntervalMs: number;
  /** Entries requested from the waiting and stopped lists per cycle. */
  pageSize: number;
}

export type WatcherEvent = DownloadCompletedEvent | DownloadAbandonedEvent;

export type WatcherListener = (event: WatcherEvent) => void | Promise<void>;

export interface WatcherStats {
  running: boolean;
  cyclesRun: number;
  cyclesSkipped: number;
  cyclesFailed: number;
  trackedTasks: number;
  seenTasks: number;
  lastCycleAt?: Date;
}

interface ObservedTask {
  status: DownloadTaskStatus;
  name: string;
}

interface InFlightCycle {
  controller: AbortController;
}

/**
 * Polls the daemon on a fixed interval and turns task-state transitions into
 * completion and abandonment events, each at most once per task id.
 *
 * A tick that finds the previous cycle still running is skipped. A cycle
 * that fails changes nothing; a cycle abandoned by stop() discards its
 * results.
 */
@Injectable()
export class CompletionWatcher implements OnModuleDestroy {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: InFlightCycle | null = null;
  private lastSeen: Map<string, ObservedTask> = new Map();
  private seen: Set<string> = new Set();
  private seenLoaded = false;
  private readonly listeners: Set<WatcherListener> = new Set();
  private readonly stats: Omit<WatcherStats, 'running' | 'trackedTasks' | 'seenTasks'> = {
    cyclesRun: 0,
    cyclesSkipped: 0,
    cyclesFailed: 0,
  };
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(DAEMON_RPC_PORT) private readonly rpc: DaemonRpcPort,
    @Inject(SEEN_TASK_STORE_PORT) private readonly seenStore: SeenTaskStorePort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    @Inject(COMPLETION_WATCHER_OPTIONS) private readonly options: CompletionWatcherOptions,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(CompletionWatcher.name);
  }

  /** Returns an unsubscribe function. */
  onEvent(listener: WatcherListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async start(): Promise<void> {
    if (this.timer) {
      return;
    }
    await this.ensureSeenLoaded();
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.tick(), this.options.pollIntervalMs);
    this.logger.info(
      { pollIntervalMs: this.options.pollIntervalMs, seenTasks: this.seen.size },
      'Completion watcher started',
    );
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Completion watcher stopped');
    }
    if (this.inFlight) {
      this.inFlight.controller.abort();
      this.inFlight = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one cycle now. Resolves with the events it emitted; skipped or
   * failed cycles resolve with none.
   */
  async pollOnce(): Promise<WatcherEvent[]> {
    if (this.inFlight) {
      this.stats.cyclesSkipped++;
      this.logger.debug('Previous poll cycle still running, skipping');
      return [];
    }

    const cycle: InFlightCycle = { controller: new AbortController() };
    this.inFlight = cycle;
    try {
      return await this.runCycle(cycle);
    } finally {
      if (this.inFlight === cycle) {
        this.inFlight = null;
      }
    }
  }

  /** Forget task ids so they can produce events again. */
  async prune(taskIds: string[]): Promise<number> {
    await this.ensureSeenLoaded();
    let removed = 0;
    for (const taskId of taskIds) {
      if (this.seen.delete(taskId)) {
        removed++;
      }
    }
    if (removed > 0) {
      await this.seenStore.save(this.seen);
      this.logger.info({ removed }, 'Seen tasks pruned');
    }
    return removed;
  }

  hasSeen(taskId: string): boolean {
    return this.seen.has(taskId);
  }

  getStats(): WatcherStats {
    return {
      running: this.isRunning(),
      cyclesRun: this.stats.cyclesRun,
      cyclesSkipped: this.stats.cyclesSkipped,
      cyclesFailed: this.stats.cyclesFailed,
      trackedTasks: this.lastSeen.size,
      seenTasks: this.seen.size,
      lastCycleAt: this.stats.lastCycleAt,
    };
  }

  onModuleDestroy(): void {
    this.stop();
  }

  private tick(): void {
    this.pollOnce().catch((error: unknown) => {
      this.logger.error({ error: describeError(error) }, 'Poll cycle crashed');
    });
  }

  private async runCycle(cycle: InFlightCycle): Promise<WatcherEvent[]> {
    await this.ensureSeenLoaded();

    const signal = cycle.controller.signal;
    const abandoned = () => this.inFlight !== cycle;
    let snapshot: DownloadTask[];

    try {
      const [active, waiting, stopped] = await Promise.all([
        this.rpc.tellActive({ signal }),
        this.rpc.tellWaiting(0, this.options.pageSize, { signal }),
        this.rpc.tellStopped(-1, this.options.pageSize, { signal }),
      ]);
      snapshot = [...active, ...waiting, ...stopped];
      snapshot.push(...(await this.confirmMissing(snapshot, signal)));
    } catch (error) {
      if (abandoned()) {
        return [];
      }
      cycle.controller.abort();
      this.stats.cyclesFailed++;
      this.logger.warn({ error: describeError(error) }, 'Poll cycle failed, skipping');
      return [];
    }

    if (abandoned()) {
      return [];
    }

    const events = this.diff(snapshot);
    this.stats.cyclesRun++;
    this.stats.lastCycleAt = new Date();

    if (events.length > 0) {
      await this.seenStore.save(this.seen).catch((error: unknown) => {
        this.logger.error({ error: describeError(error) }, 'Failed to persist seen tasks');
      });
      await this.emit(events);
    }
    return events;
  }

  /**
   * Tasks observed last cycle but absent from this page may only have moved
   * past the page. Ask for each one; ids the daemon no longer knows stay out
   * of the result and are reported as vanished.
   */
  private async confirmMissing(snapshot: DownloadTask[], signal: AbortSignal): Promise<DownloadTask[]> {
    const listed = new Set(snapshot.map((task) => task.gid));
    const missing = Array.from(this.lastSeen.keys()).filter(
      (gid) => !listed.has(gid) && !this.seen.has(gid),
    );

    const confirmed = await Promise.all(
      missing.map(async (gid) => {
        try {
          return await this.rpc.tellStatus(gid, { signal });
        } catch (error) {
          if (error instanceof RemoteError && error.code === 'REMOTE_ERROR') {
            return null;
          }
          throw error;
        }
      }),
    );
    return confirmed.filter((task): task is DownloadTask => task !== null);
  }

  /**
   * Completions first, then removals, then tasks that vanished since the
   * previous cycle. Later lists win when a task moved between list calls.
   */
  private diff(snapshot: DownloadTask[]): WatcherEvent[] {
    const current = new Map<string, DownloadTask>();
    for (const task of snapshot) {
      current.set(task.gid, task);
    }

    const events: WatcherEvent[] = [];

    for (const task of current.values()) {
      if (!this.seen.has(task.gid) && DownloadTask.isTerminal(task)) {
        this.seen.add(task.gid);
        events.push(
          new DownloadCompletedEvent({
            taskId: task.gid,
            outcome: task.status === 'complete' ? 'complete' : 'error',
            name: task.name,
            dir: task.dir,
            files: DownloadTask.outputPaths(task),
            totalLength: task.totalLength,
            errorCode: task.errorCode,
            errorMessage: task.errorMessage,
          }),
        );
      }
    }

    for (const task of current.values()) {
      if (!this.seen.has(task.gid) && task.status === 'removed') {
        this.seen.add(task.gid);
        events.push(
          new DownloadAbandonedEvent({
            taskId: task.gid,
            name: task.name,
            lastStatus: this.lastSeen.get(task.gid)?.status ?? task.status,
            reason: 'removed',
          }),
        );
      }
    }

    for (const [gid, observed] of this.lastSeen) {
      if (!current.has(gid) && !this.seen.has(gid)) {
        this.seen.add(gid);
        events.push(
          new DownloadAbandonedEvent({
            taskId: gid,
            name: observed.name,
            lastStatus: observed.status,
            reason: 'vanished',
          }),
        );
      }
    }

    this.lastSeen = new Map(
      Array.from(current.values(), (task): [string, ObservedTask] => [
        task.gid,
        { status: task.status, name: task.name },
      ]),
    );
    return events;
  }

  private async emit(events: WatcherEvent[]): Promise<void> {
    for (const event of events) {
      this.eventPublisher.publishAsync(event);
      for (const listener of this.listeners) {
        try {
          await listener(event);
        } catch (error) {
          this.logger.error(
            { eventName: event.eventName, taskId: event.taskId, error: describeError(error) },
            'Watcher listener failed',
          );
        }
      }
    }
  }

  private async ensureSeenLoaded(): Promise<void> {
    if (this.seenLoaded) {
      return;
    }
    const stored = await this.seenStore.load();
    stored.forEach((taskId) => this.seen.add(taskId));
    this.seenLoaded = true;
  }
}
