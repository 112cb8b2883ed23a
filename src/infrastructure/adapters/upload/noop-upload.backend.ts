import type {
  UploadBackendPort,
  UploadMetadata,
  UploadOutcome,
} from '../../../application/ports/output/upload-backend.port';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Selected by `UPLOAD_BACKENDS=none`: completes every job without moving data.
 */
export class NoopUploadBackend implements UploadBackendPort {
  readonly id = 'none';
  private readonly logger: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(NoopUploadBackend.name);
  }

  async upload(files: readonly string[], metadata: UploadMetadata): Promise<UploadOutcome> {
    this.logger.debug({ taskId: metadata.taskId, files: files.length }, 'No upload backend configured');
    return { status: 'succeeded' };
  }
}
