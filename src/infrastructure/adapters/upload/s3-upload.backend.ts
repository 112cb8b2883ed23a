import { S3ServiceException } from '@aws-sdk/client-s3';
import type {
  UploadBackendPort,
  UploadMetadata,
  UploadOutcome,
} from '../../../application/ports/output/upload-backend.port';
import { describeError } from '../../../domain/errors/relay.errors';
import { isErrnoException } from '../../../shared/fs/json-file';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { S3Service } from '../../../shared/storage/s3.service';
import { isRetryableStatus, joinRemote, remoteRelativePath } from './upload-paths';

/**
 * S3 Upload Backend
 * Stores every file of a task under `<S3_PREFIX><task name>/<relative path>`.
 */
export class S3UploadBackend implements UploadBackendPort {
  readonly id = 's3';
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly s3: S3Service,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(S3UploadBackend.name);
  }

  async upload(
    files: readonly string[],
    metadata: UploadMetadata,
    signal: AbortSignal,
  ): Promise<UploadOutcome> {
    const keys: string[] = [];

    for (const file of files) {
      if (signal.aborted) {
        return { status: 'retryable_error', message: 'Upload aborted' };
      }

      const key = this.keyFor(file, metadata);
      try {
        const result = await this.s3.uploadFile(key, file, {
          metadata: { 'task-id': metadata.taskId },
          signal,
        });
        keys.push(result.key);
      } catch (error) {
        return this.toOutcome(error, file);
      }
    }

    const prefix = this.s3.getFullKey(joinRemote(metadata.taskName));
    this.logger.info({ taskId: metadata.taskId, objects: keys.length, prefix }, 'Task stored in S3');
    return { status: 'succeeded', remoteLocation: `s3://${this.s3.bucket}/${prefix}` };
  }

  private keyFor(file: string, metadata: UploadMetadata): string {
    const relativePath = remoteRelativePath(file, metadata.baseDir);
    // Multi-file torrents already sit in a directory named after the task.
    if (relativePath.startsWith(`${metadata.taskName}/`)) {
      return joinRemote(relativePath);
    }
    return joinRemote(metadata.taskName, relativePath);
  }

  private toOutcome(error: unknown, file: string): UploadOutcome {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { status: 'permanent_error', message: `Local file missing: ${file}` };
    }
    if (error instanceof S3ServiceException) {
      const statusCode = error.$metadata.httpStatusCode;
      const retryable =
        error.$fault === 'server' || statusCode === undefined || isRetryableStatus(statusCode);
      const message = `S3 rejected ${file}: ${error.name} ${error.message}`;
      return retryable
        ? { status: 'retryable_error', message }
        : { status: 'permanent_error', message };
    }
    return { status: 'retryable_error', message: `S3 upload failed: ${describeError(error)}` };
  }
}
