import type { UploadBackendPort } from '../../../application/ports/output/upload-backend.port';
import type { AppConfig } from '../../../config/configuration';
import type { UploadBackendId } from '../../../domain/value-objects/upload-backend-id.vo';
import { HttpClientService } from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { S3Service } from '../../../shared/storage/s3.service';
import { NoopUploadBackend } from './noop-upload.backend';
import { OneDriveTokenProvider } from './onedrive-token.provider';
import { OneDriveUploadBackend } from './onedrive-upload.backend';
import { S3UploadBackend } from './s3-upload.backend';
import { TelegramUploadBackend } from './telegram-upload.backend';

export interface UploadBackendDependencies {
  config: Pick<AppConfig, 'onedrive' | 'telegram'>;
  http: HttpClientService;
  s3: S3Service;
  logger: PinoLoggerService;
}

/**
 * Build the backends named in `UPLOAD_BACKENDS`, once each, in the order given.
 */
export function createUploadBackends(
  ids: readonly UploadBackendId[],
  deps: UploadBackendDependencies,
): UploadBackendPort[] {
  const unique = Array.from(new Set(ids));
  return unique.map((id) => createUploadBackend(id, deps));
}

export function createUploadBackend(
  id: UploadBackendId,
  deps: UploadBackendDependencies,
): UploadBackendPort {
  switch (id) {
    case 's3':
      return new S3UploadBackend(deps.s3, deps.logger);
    case 'onedrive': {
      const tokens = new OneDriveTokenProvider(
        deps.http,
        {
          clientId: deps.config.onedrive.clientId,
          tenantId: deps.config.onedrive.tenantId,
          tokenFile: deps.config.onedrive.tokenFile,
        },
        deps.logger,
      );
      return new OneDriveUploadBackend(
        deps.http,
        tokens,
        { remotePath: deps.config.onedrive.remotePath },
        deps.logger,
      );
    }
    case 'telegram':
      return new TelegramUploadBackend(deps.http, deps.config.telegram, deps.logger);
    case 'none':
      return new NoopUploadBackend(deps.logger);
  }
}
