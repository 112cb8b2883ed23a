import type { UploadBackendId } from '../../../domain/value-objects/upload-backend-id.vo';

export interface UploadMetadata {
  taskId: string;
  taskName: string;
  /** Directory the task's files were downloaded to; remote paths are relative to it. */
  baseDir: string;
}

export type UploadOutcome =
  | { status: 'succeeded'; remoteLocation?: string }
  | { status: 'retryable_error'; message: string }
  | { status: 'permanent_error'; message: string };

/**
 * Upload Backend Port (Driven Port)
 *
 * One archive target. Implementations report failures through the outcome,
 * and must stop work when `signal` aborts.
 */
export interface UploadBackendPort {
  readonly id: UploadBackendId;
  upload(files: readonly string[], metadata: UploadMetadata, signal: AbortSignal): Promise<UploadOutcome>;
}
