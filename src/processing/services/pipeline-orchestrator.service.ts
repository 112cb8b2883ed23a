import { Inject, Injectable, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { DownloadCompletedEvent } from '../../domain/events/download-completed.event';
import { describeError } from '../../domain/errors/relay.errors';
import { ServiceState } from '../../domain/value-objects/service-state.vo';
import { ServiceManager } from '../../service/service-manager.service';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { CompletionWatcher, type WatcherEvent } from './completion-watcher.service';
import { UploadCoordinator } from './upload-coordinator.service';

export const PIPELINE_OPTIONS = 'PipelineOptions';

export interface PipelineOptions {
  /** Start the daemon on bootstrap when it is installed but not running. */
  autoStart: boolean;
}

/**
 * Keeps the completion watcher in step with the daemon and hands completed
 * downloads to the upload coordinator.
 *
 * The watcher polls only while the service is `running`; every other state
 * stops it and cancels its in-flight cycle.
 */
@Injectable()
export class PipelineOrchestrator implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly subscriptions: Array<() => void> = [];
  private readonly pending: Set<Promise<void>> = new Set();
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly serviceManager: ServiceManager,
    private readonly watcher: CompletionWatcher,
    private readonly coordinator: UploadCoordinator,
    @Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(PipelineOrchestrator.name);
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.attach();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.detach();
  }

  async attach(): Promise<void> {
    this.subscriptions.push(
      this.serviceManager.onStateChange((change) =>
        this.track(this.syncWatcher(change.to), 'Failed to follow service state'),
      ),
      this.watcher.onEvent((event) => this.forward(event)),
    );

    await this.syncWatcher(this.serviceManager.getState());
    this.track(
      this.coordinator.resumePending().then(() => undefined),
      'Failed to resume unfinished uploads',
    );

    if (this.options.autoStart) {
      await this.autoStart();
    }
  }

  async detach(): Promise<void> {
    this.subscriptions.splice(0).forEach((unsubscribe) => unsubscribe());
    this.watcher.stop();
    await this.coordinator.shutdown();
    await Promise.allSettled(Array.from(this.pending));
  }

  private async syncWatcher(state: ServiceState): Promise<void> {
    if (state === ServiceState.RUNNING) {
      try {
        await this.watcher.start();
        // The daemon may have moved on while the seen-set was loading.
        if (this.serviceManager.getState() !== ServiceState.RUNNING) {
          this.watcher.stop();
        }
      } catch (error) {
        this.logger.error({ error: describeError(error) }, 'Failed to start completion watcher');
      }
      return;
    }
    if (this.watcher.isRunning()) {
      this.logger.info({ state }, 'Daemon left running state, stopping watcher');
      this.watcher.stop();
    }
  }

  /**
   * Uploads run detached from the poll cycle, so a slow backend never holds
   * up completion detection.
   */
  private forward(event: WatcherEvent): void {
    if (!(event instanceof DownloadCompletedEvent)) {
      this.logger.info(
        { taskId: event.taskId, reason: event.payload.reason, lastStatus: event.payload.lastStatus },
        'Download abandoned',
      );
      return;
    }

    this.track(
      this.coordinator.handleCompletion(event.payload).then((summary) => {
        this.logger.info(
          {
            taskId: summary.taskId,
            jobs: summary.jobs.map((job) => `${job.backendId}:${job.state}`),
            filesDeleted: summary.filesDeleted,
          },
          'Upload hand-off finished',
        );
      }),
      'Upload hand-off failed',
    );
  }

  private async autoStart(): Promise<void> {
    const state = this.serviceManager.getState();
    if (state !== ServiceState.STOPPED && state !== ServiceState.FAILED) {
      this.logger.debug({ state }, 'Auto-start skipped');
      return;
    }
    try {
      await this.serviceManager.start();
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Daemon auto-start failed');
    }
  }

  private track(work: Promise<void>, failureMessage: string): void {
    const tracked = work.catch((error: unknown) => {
      this.logger.error({ error: describeError(error) }, failureMessage);
    });
    this.pending.add(tracked);
    void tracked.finally(() => this.pending.delete(tracked));
  }
}
