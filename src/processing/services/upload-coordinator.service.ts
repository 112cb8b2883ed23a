import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import type { EventPublisherPort } from '../../application/ports/output/event-publisher.port';
import type { LocalFilesPort } from '../../application/ports/output/local-files.port';
import type {
  UploadBackendPort,
  UploadOutcome,
} from '../../application/ports/output/upload-backend.port';
import type { UploadJobRepositoryPort } from '../../application/ports/output/upload-job-repository.port';
import {
  EVENT_PUBLISHER_PORT,
  LOCAL_FILES_PORT,
  UPLOAD_BACKENDS,
  UPLOAD_JOB_REPOSITORY_PORT,
} from '../../application/ports/injection-tokens';
import { UploadJobEntity } from '../../domain/entities/upload-job.entity';
import type { DownloadCompletedEventPayload } from '../../domain/events/download-completed.event';
import { LocalFilesDeletedEvent } from '../../domain/events/local-files-deleted.event';
import { UploadFailedEvent } from '../../domain/events/upload-failed.event';
import { UploadSucceededEvent } from '../../domain/events/upload-succeeded.event';
import { UploadError, ValidationError, describeError } from '../../domain/errors/relay.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export const UPLOAD_COORDINATOR_OPTIONS = 'UploadCoordinatorOptions';

export interface UploadCoordinatorOptions {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  attemptTimeoutMs: number;
  deleteAfterUpload: boolean;
  /** Deletion never reaches outside this directory. */
  downloadDir: string;
}

export interface TaskUploadSummary {
  taskId: string;
  jobs: UploadJobEntity[];
  filesDeleted: boolean;
}

interface JobTarget {
  taskId: string;
  taskName: string;
  baseDir: string;
  files: string[];
}

export function backoffDelay(
  failedAttempts: number,
  options: Pick<UploadCoordinatorOptions, 'backoffBaseMs' | 'backoffMaxMs'>,
): number {
  const exponent = Math.max(0, failedAttempts - 1);
  return Math.min(options.backoffBaseMs * Math.pow(2, exponent), options.backoffMaxMs);
}

/**
 * Runs one upload job per (task, backend) and deletes the task's local files
 * once every enabled backend has succeeded.
 *
 * The job map doubles as the lock: a second request for a pair that is
 * already running joins it. Stored `succeeded` jobs are never re-run and
 * stored `failed_permanent` jobs wait for retryUpload().
 */
@Injectable()
export class UploadCoordinator implements OnModuleDestroy {
  private readonly runningJobs: Map<string, Promise<UploadJobEntity>> = new Map();
  private readonly runningTasks: Map<string, Promise<TaskUploadSummary>> = new Map();
  private readonly shutdownController = new AbortController();
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(UPLOAD_BACKENDS) private readonly backends: UploadBackendPort[],
    @Inject(UPLOAD_JOB_REPOSITORY_PORT) private readonly jobRepository: UploadJobRepositoryPort,
    @Inject(LOCAL_FILES_PORT) private readonly localFiles: LocalFilesPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    @Inject(UPLOAD_COORDINATOR_OPTIONS) private readonly options: UploadCoordinatorOptions,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(UploadCoordinator.name);
  }

  get enabledBackends(): string[] {
    return this.backends.map((backend) => backend.id);
  }

  /**
   * Upload a completed download to every enabled backend. A concurrent call
   * for the same task joins the one in progress.
   */
  handleCompletion(payload: DownloadCompletedEventPayload): Promise<TaskUploadSummary> {
    if (payload.outcome !== 'complete') {
      this.logger.warn(
        { taskId: payload.taskId, errorCode: payload.errorCode, error: payload.errorMessage },
        'Download ended in error, nothing to upload',
      );
      return Promise.resolve({ taskId: payload.taskId, jobs: [], filesDeleted: false });
    }
    if (payload.files.length === 0) {
      this.logger.warn({ taskId: payload.taskId }, 'Completed download has no files to upload');
      return Promise.resolve({ taskId: payload.taskId, jobs: [], filesDeleted: false });
    }

    return this.runTask({
      taskId: payload.taskId,
      taskName: payload.name,
      baseDir: payload.dir,
      files: payload.files,
    });
  }

  /**
   * Give permanently failed jobs of a task a fresh attempt budget and run them.
   */
  async retryUpload(taskId: string): Promise<TaskUploadSummary> {
    const jobs = await this.jobRepository.findByTaskId(taskId);
    if (jobs.length === 0) {
      throw new ValidationError(`No upload jobs recorded for task ${taskId}`, { taskId });
    }

    const failed = jobs.filter((job) => job.state === 'failed_permanent');
    for (const job of failed) {
      await this.jobRepository.save(UploadJobEntity.rearm(job, this.options.maxAttempts));
    }
    this.logger.info({ taskId, rearmed: failed.length }, 'Upload jobs re-armed');

    const first = jobs[0];
    return this.runTask({
      taskId,
      taskName: first.taskName,
      baseDir: first.baseDir,
      files: [...first.files],
    });
  }

  /**
   * Pick up jobs left unfinished by a previous process.
   */
  async resumePending(): Promise<TaskUploadSummary[]> {
    const jobs = await this.jobRepository.findAll();
    const unfinished = new Map<string, UploadJobEntity>();
    for (const job of jobs) {
      if (!UploadJobEntity.isFinished(job) && !unfinished.has(job.taskId)) {
        unfinished.set(job.taskId, job);
      }
    }
    if (unfinished.size === 0) {
      return [];
    }

    this.logger.info({ tasks: unfinished.size }, 'Resuming unfinished uploads');
    return Promise.all(
      Array.from(unfinished.values(), (job) =>
        this.runTask({
          taskId: job.taskId,
          taskName: job.taskName,
          baseDir: job.baseDir,
          files: [...job.files],
        }),
      ),
    );
  }

  async getJobs(taskId?: string): Promise<UploadJobEntity[]> {
    return taskId ? this.jobRepository.findByTaskId(taskId) : this.jobRepository.findAll();
  }

  /** Cancels backoff waits and in-flight attempts, then waits for jobs to settle. */
  async shutdown(): Promise<void> {
    if (this.shutdownController.signal.aborted) {
      return;
    }
    this.shutdownController.abort();
    await Promise.allSettled(Array.from(this.runningTasks.values()));
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  // ===== Task and job runs =====

  private runTask(target: JobTarget): Promise<TaskUploadSummary> {
    const existing = this.runningTasks.get(target.taskId);
    if (existing) {
      return existing;
    }

    const run = this.executeTask(target).finally(() => {
      this.runningTasks.delete(target.taskId);
    });
    this.runningTasks.set(target.taskId, run);
    return run;
  }

  private async executeTask(target: JobTarget): Promise<TaskUploadSummary> {
    const jobs = await Promise.all(this.backends.map((backend) => this.runJob(backend, target)));

    let filesDeleted = false;
    if (this.options.deleteAfterUpload && !this.shutdownController.signal.aborted) {
      filesDeleted = await this.deleteIfAllSucceeded(target);
    }
    return { taskId: target.taskId, jobs, filesDeleted };
  }

  private runJob(backend: UploadBackendPort, target: JobTarget): Promise<UploadJobEntity> {
    const key = UploadJobEntity.keyOf(target.taskId, backend.id);
    const existing = this.runningJobs.get(key);
    if (existing) {
      return existing;
    }

    const run = this.executeJob(key, backend, target).finally(() => {
      this.runningJobs.delete(key);
    });
    this.runningJobs.set(key, run);
    return run;
  }

  private async executeJob(
    key: string,
    backend: UploadBackendPort,
    target: JobTarget,
  ): Promise<UploadJobEntity> {
    const log = this.logger.withTaskId(target.taskId).withBackend(backend.id);
    let job = await this.jobRepository.findById(key);

    if (job && UploadJobEntity.isFinished(job)) {
      log.debug({ state: job.state }, 'Upload job already finished, not re-running');
      return job;
    }

    if (!job) {
      job = UploadJobEntity.create({
        taskId: target.taskId,
        backendId: backend.id,
        taskName: target.taskName,
        baseDir: target.baseDir,
        files: target.files,
        maxAttempts: this.options.maxAttempts,
      });
      await this.jobRepository.save(job);
    } else if (job.state === 'in_progress') {
      job = UploadJobEntity.markFailed(job, 'Interrupted before the attempt finished', true);
      await this.jobRepository.save(job);
    }

    while (UploadJobEntity.isRunnable(job) && !UploadJobEntity.isAttemptLimitReached(job)) {
      if (job.state === 'failed_retryable') {
        const delay = backoffDelay(job.attempts, this.options);
        log.debug({ delayMs: delay, attempts: job.attempts }, 'Backing off before retry');
        if (!(await this.wait(delay))) {
          return job;
        }
      }
      if (this.shutdownController.signal.aborted) {
        return job;
      }

      job = UploadJobEntity.startAttempt(job);
      await this.jobRepository.save(job);

      const outcome = await this.attempt(backend, job);

      if (outcome.status === 'succeeded') {
        job = UploadJobEntity.markSucceeded(job, outcome.remoteLocation);
        await this.jobRepository.save(job);
        log.info(
          { attempts: job.attempts, remoteLocation: outcome.remoteLocation },
          'Upload succeeded',
        );
        this.eventPublisher.publishAsync(
          new UploadSucceededEvent({
            taskId: job.taskId,
            backendId: job.backendId,
            taskName: job.taskName,
            attempts: job.attempts,
            remoteLocation: outcome.remoteLocation,
          }),
        );
        return job;
      }

      job = UploadJobEntity.markFailed(
        job,
        outcome.message,
        outcome.status === 'retryable_error',
      );
      await this.jobRepository.save(job);

      if (job.state === 'failed_permanent') {
        log.error(
          { attempts: job.attempts, error: outcome.message },
          'Upload failed permanently',
        );
        this.eventPublisher.publishAsync(
          new UploadFailedEvent({
            taskId: job.taskId,
            backendId: job.backendId,
            taskName: job.taskName,
            attempts: job.attempts,
            error: outcome.message,
          }),
        );
        return job;
      }
      log.warn({ attempts: job.attempts, error: outcome.message }, 'Upload attempt failed');
    }
    return job;
  }

  /**
   * One bounded attempt. The backend gets a signal that fires on timeout or
   * shutdown, and the attempt settles then even if the backend ignores it.
   */
  private async attempt(backend: UploadBackendPort, job: UploadJobEntity): Promise<UploadOutcome> {
    const controller = new AbortController();
    const timeoutMs = this.options.attemptTimeoutMs;
    const shutdownSignal = this.shutdownController.signal;

    const onShutdown = () =>
      controller.abort(new UploadError('UPLOAD_RETRYABLE', 'Upload cancelled by shutdown'));
    shutdownSignal.addEventListener('abort', onShutdown, { once: true });
    const timer = setTimeout(() => {
      controller.abort(
        new UploadError('UPLOAD_TIMEOUT', `Upload attempt timed out after ${timeoutMs}ms`),
      );
    }, timeoutMs);

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
        once: true,
      });
    });
    aborted.catch(() => undefined);

    try {
      return await Promise.race([
        backend.upload(job.files, this.metadataOf(job), controller.signal),
        aborted,
      ]);
    } catch (error) {
      if (error instanceof UploadError) {
        return error.retryable
          ? { status: 'retryable_error', message: error.message }
          : { status: 'permanent_error', message: error.message };
      }
      return { status: 'retryable_error', message: describeError(error) };
    } finally {
      clearTimeout(timer);
      shutdownSignal.removeEventListener('abort', onShutdown);
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }
  }

  private metadataOf(job: UploadJobEntity) {
    return { taskId: job.taskId, taskName: job.taskName, baseDir: job.baseDir };
  }

  /** Resolves false when shutdown interrupted the wait. */
  private async wait(ms: number): Promise<boolean> {
    try {
      await sleep(ms, undefined, { signal: this.shutdownController.signal });
      return true;
    } catch {
      return false;
    }
  }

  private async deleteIfAllSucceeded(target: JobTarget): Promise<boolean> {
    const jobs = await this.jobRepository.findByTaskId(target.taskId);
    const allSucceeded =
      this.backends.length > 0 &&
      this.backends.every((backend) =>
        jobs.some((job) => job.backendId === backend.id && UploadJobEntity.isSucceeded(job)),
      );

    if (!allSucceeded) {
      this.logger.info(
        {
          taskId: target.taskId,
          states: jobs.map((job) => `${job.backendId}:${job.state}`),
        },
        'Keeping local files until every backend succeeds',
      );
      return false;
    }

    try {
      const report = await this.localFiles.deleteFiles(target.files, this.options.downloadDir);
      if (report.skipped.length > 0) {
        this.logger.warn(
          { taskId: target.taskId, skipped: report.skipped },
          'Refused to delete paths outside the download directory',
        );
      }
      this.logger.info(
        { taskId: target.taskId, deleted: report.deletedFiles.length },
        'Local files deleted after upload',
      );
      this.eventPublisher.publishAsync(
        new LocalFilesDeletedEvent({
          taskId: target.taskId,
          deletedFiles: report.deletedFiles,
          removedDirectories: report.removedDirectories,
        }),
      );
      return report.deletedFiles.length > 0;
    } catch (error) {
      this.logger.error(
        { taskId: target.taskId, error: describeError(error) },
        'Failed to delete local files',
      );
      return false;
    }
  }
}
