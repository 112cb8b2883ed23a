import { produce } from 'immer';
import type { UploadBackendId } from '../value-objects/upload-backend-id.vo';

/**
 * Upload Job Entity - moving one completed task's files to one backend.
 *
 * Status Transitions:
 * pending → in_progress → succeeded (success path)
 * pending → in_progress → failed_retryable → in_progress ... (retry path)
 * in_progress → failed_permanent (attempt ceiling or permanent backend error)
 * failed_permanent → pending (operator re-arm)
 *
 * Data lives in a plain readonly interface; every transition is a pure
 * function producing a new instance through Immer.
 */
export type UploadJobState =
  | 'pending'
  | 'in_progress'
  | 'succeeded'
  | 'failed_retryable'
  | 'failed_permanent';

export interface UploadJobEntity {
  readonly jobId: string;
  readonly taskId: string;
  readonly backendId: UploadBackendId;
  readonly taskName: string;
  readonly baseDir: string;
  readonly files: readonly string[];
  readonly state: UploadJobState;
  readonly attempts: number;
  readonly maxAttempts: number;
  readonly lastError?: string;
  readonly remoteLocation?: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly completedAt?: Date;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace UploadJobEntity {
  export interface CreateProps {
    taskId: string;
    backendId: UploadBackendId;
    taskName: string;
    baseDir: string;
    files: string[];
    maxAttempts: number;
  }

  export function keyOf(taskId: string, backendId: UploadBackendId): string {
    return `${taskId}:${backendId}`;
  }

  export function create(props: CreateProps): UploadJobEntity {
    validate(props);

    const now = new Date();
    return {
      jobId: keyOf(props.taskId, props.backendId),
      taskId: props.taskId,
      backendId: props.backendId,
      taskName: props.taskName,
      baseDir: props.baseDir,
      files: [...props.files],
      state: 'pending',
      attempts: 0,
      maxAttempts: props.maxAttempts,
      createdAt: now,
      updatedAt: now,
    };
  }

  function validate(props: CreateProps): void {
    if (!props.taskId || props.taskId.trim().length === 0) {
      throw new Error('Task ID is required');
    }
    if (props.files.length === 0) {
      throw new Error('An upload job needs at least one file');
    }
    if (props.maxAttempts < 1) {
      throw new Error('Max attempts must be at least 1');
    }
  }

  // ===== Queries =====

  export function isFinished(job: UploadJobEntity): boolean {
    return job.state === 'succeeded' || job.state === 'failed_permanent';
  }

  export function isSucceeded(job: UploadJobEntity): boolean {
    return job.state === 'succeeded';
  }

  /** Jobs the coordinator picks up on its own: fresh, retrying, or interrupted. */
  export function isRunnable(job: UploadJobEntity): boolean {
    return job.state === 'pending' || job.state === 'failed_retryable';
  }

  export function isAttemptLimitReached(job: UploadJobEntity): boolean {
    return job.attempts >= job.maxAttempts;
  }

  // ===== Transitions =====

  export function startAttempt(job: UploadJobEntity): UploadJobEntity {
    if (!isRunnable(job)) {
      throw new Error(`Cannot start an attempt for a job in state ${job.state}`);
    }
    if (isAttemptLimitReached(job)) {
      throw new Error('Attempt limit reached');
    }

    return produce(job, (draft) => {
      draft.state = 'in_progress';
      draft.attempts = draft.attempts + 1;
      draft.updatedAt = new Date();
    });
  }

  export function markSucceeded(
    job: UploadJobEntity,
    remoteLocation?: string,
  ): UploadJobEntity {
    if (job.state !== 'in_progress') {
      throw new Error('Can only complete a job that is in progress');
    }

    return produce(job, (draft) => {
      const now = new Date();
      draft.state = 'succeeded';
      draft.lastError = undefined;
      draft.remoteLocation = remoteLocation;
      draft.updatedAt = now;
      draft.completedAt = now;
    });
  }

  /**
   * A retryable failure on the last allowed attempt is permanent.
   */
  export function markFailed(
    job: UploadJobEntity,
    error: string,
    retryable: boolean,
  ): UploadJobEntity {
    if (job.state !== 'in_progress') {
      throw new Error('Can only fail a job that is in progress');
    }

    const permanent = !retryable || isAttemptLimitReached(job);
    return produce(job, (draft) => {
      const now = new Date();
      draft.state = permanent ? 'failed_permanent' : 'failed_retryable';
      draft.lastError = error;
      draft.updatedAt = now;
      if (permanent) {
        draft.completedAt = now;
      }
    });
  }

  /** Give a permanently failed job a fresh attempt budget. */
  export function rearm(job: UploadJobEntity, maxAttempts: number): UploadJobEntity {
    if (job.state !== 'failed_permanent') {
      throw new Error('Only permanently failed jobs can be re-armed');
    }

    return produce(job, (draft) => {
      draft.state = 'pending';
      draft.attempts = 0;
      draft.maxAttempts = maxAttempts;
      draft.completedAt = undefined;
      draft.updatedAt = new Date();
    });
  }

  // ===== Serialization =====

  export interface Snapshot {
    jobId: string;
    taskId: string;
    backendId: UploadBackendId;
    taskName: string;
    baseDir: string;
    files: string[];
    state: UploadJobState;
    attempts: number;
    maxAttempts: number;
    lastError?: string;
    remoteLocation?: string;
    createdAt: string;
    updatedAt: string;
    completedAt?: string;
  }

  export function toJSON(job: UploadJobEntity): Snapshot {
    return {
      jobId: job.jobId,
      taskId: job.taskId,
      backendId: job.backendId,
      taskName: job.taskName,
      baseDir: job.baseDir,
      files: [...job.files],
      state: job.state,
      attempts: job.attempts,
      maxAttempts: job.maxAttempts,
      lastError: job.lastError,
      remoteLocation: job.remoteLocation,
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
      completedAt: job.completedAt?.toISOString(),
    };
  }

  export function fromJSON(snapshot: Snapshot): UploadJobEntity {
    return {
      jobId: snapshot.jobId,
      taskId: snapshot.taskId,
      backendId: snapshot.backendId,
      taskName: snapshot.taskName,
      baseDir: snapshot.baseDir,
      files: [...snapshot.files],
      state: snapshot.state,
      attempts: snapshot.attempts,
      maxAttempts: snapshot.maxAttempts,
      lastError: snapshot.lastError,
      remoteLocation: snapshot.remoteLocation,
      createdAt: new Date(snapshot.createdAt),
      updatedAt: new Date(snapshot.updatedAt),
      completedAt: snapshot.completedAt ? new Date(snapshot.completedAt) : undefined,
    };
  }
}
