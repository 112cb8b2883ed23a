import { open, stat } from 'fs/promises';
import { z } from 'zod';
import type {
  UploadBackendPort,
  UploadMetadata,
  UploadOutcome,
} from '../../../application/ports/output/upload-backend.port';
import { UploadError, describeError } from '../../../domain/errors/relay.errors';
import { isErrnoException } from '../../../shared/fs/json-file';
import { HttpClientService, type HttpResponse } from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import type { OneDriveTokenProvider } from './onedrive-token.provider';
import { isRetryableStatus, joinRemote, remoteRelativePath } from './upload-paths';

/** Graph takes files up to this size in one PUT; larger ones go through an upload session. */
export const SIMPLE_UPLOAD_LIMIT_BYTES = 4 * 1024 * 1024;
/** Must be a multiple of 320 KiB. */
export const CHUNK_SIZE_BYTES = 10 * 1024 * 1024;

export interface OneDriveUploadOptions {
  remotePath: string;
  graphBaseUrl?: string;
  requestTimeoutMs?: number;
}

const uploadSessionSchema = z.object({ uploadUrl: z.string().url() });
const driveItemSchema = z.object({ webUrl: z.string().optional() }).passthrough();

/**
 * OneDrive Upload Backend
 * Writes files under `<ONEDRIVE_REMOTE_PATH>/<path relative to the download
 * directory>` through Microsoft Graph. Graph creates missing folders.
 */
export class OneDriveUploadBackend implements UploadBackendPort {
  readonly id = 'onedrive';
  private readonly graphBaseUrl: string;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly http: HttpClientService,
    private readonly tokens: OneDriveTokenProvider,
    private readonly options: OneDriveUploadOptions,
    logger: PinoLoggerService,
  ) {
    this.graphBaseUrl = (options.graphBaseUrl ?? 'https://graph.microsoft.com/v1.0').replace(
      /\/+$/,
      '',
    );
    this.logger = logger.forContext(OneDriveUploadBackend.name);
  }

  async upload(
    files: readonly string[],
    metadata: UploadMetadata,
    signal: AbortSignal,
  ): Promise<UploadOutcome> {
    let remoteLocation: string | undefined;

    for (const file of files) {
      if (signal.aborted) {
        return { status: 'retryable_error', message: 'Upload aborted' };
      }
      const remotePath = joinRemote(this.options.remotePath, remoteRelativePath(file, metadata.baseDir));

      try {
        const item = await this.uploadOne(file, remotePath, signal);
        remoteLocation = item.webUrl ?? remoteLocation;
      } catch (error) {
        return this.toOutcome(error, file);
      }
    }

    this.logger.info({ taskId: metadata.taskId, files: files.length }, 'Task uploaded to OneDrive');
    return {
      status: 'succeeded',
      remoteLocation: remoteLocation ?? `onedrive:/${joinRemote(this.options.remotePath, metadata.taskName)}`,
    };
  }

  private async uploadOne(
    file: string,
    remotePath: string,
    signal: AbortSignal,
  ): Promise<z.infer<typeof driveItemSchema>> {
    const { size } = await stat(file);
    const itemUrl = `${this.graphBaseUrl}/me/drive/root:/${encodePath(remotePath)}:`;

    if (size <= SIMPLE_UPLOAD_LIMIT_BYTES) {
      const handle = await open(file, 'r');
      let content: Buffer;
      try {
        content = await handle.readFile();
      } finally {
        await handle.close();
      }
      const response = await this.authorized(`${itemUrl}/content`, 'PUT', signal, content);
      return this.expectItem(response, remotePath);
    }

    const session = await this.authorized(`${itemUrl}/createUploadSession`, 'POST', signal, {
      item: { '@microsoft.graph.conflictBehavior': 'replace' },
    });
    this.expectOk(session, remotePath);
    const parsedSession = uploadSessionSchema.safeParse(session.body);
    if (!parsedSession.success) {
      throw new UploadError('UPLOAD_RETRYABLE', `OneDrive returned no upload session for ${remotePath}`);
    }

    return this.uploadChunks(file, size, parsedSession.data.uploadUrl, remotePath, signal);
  }

  private async uploadChunks(
    file: string,
    size: number,
    uploadUrl: string,
    remotePath: string,
    signal: AbortSignal,
  ): Promise<z.infer<typeof driveItemSchema>> {
    const handle = await open(file, 'r');
    try {
      let offset = 0;
      while (offset < size) {
        const length = Math.min(CHUNK_SIZE_BYTES, size - offset);
        const chunk = Buffer.alloc(length);
        const { bytesRead } = await handle.read(chunk, 0, length, offset);
        if (bytesRead !== length) {
          throw new UploadError('UPLOAD_RETRYABLE', `Short read from ${file} at offset ${offset}`);
        }

        // The upload URL is pre-authorized; Graph rejects an Authorization header on it.
        const response = await this.http.request(uploadUrl, {
          method: 'PUT',
          headers: {
            'Content-Length': String(length),
            'Content-Range': `bytes ${offset}-${offset + length - 1}/${size}`,
          },
          body: chunk,
          signal,
          timeout: this.options.requestTimeoutMs,
        });
        offset += length;

        if (offset < size) {
          this.expectOk(response, remotePath);
          this.logger.debug({ remotePath, uploaded: offset, total: size }, 'Chunk uploaded');
        } else {
          return this.expectItem(response, remotePath);
        }
      }
    } finally {
      await handle.close();
    }
    throw new UploadError('UPLOAD_RETRYABLE', `Upload session for ${remotePath} did not complete`);
  }

  private async authorized(
    url: string,
    method: 'PUT' | 'POST',
    signal: AbortSignal,
    body: Buffer | Record<string, unknown>,
  ): Promise<HttpResponse> {
    const accessToken = await this.tokens.getAccessToken(signal);
    const isBuffer = Buffer.isBuffer(body);
    const response = await this.http.request(url, {
      method,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'Content-Type': isBuffer ? 'application/octet-stream' : 'application/json',
      },
      body: isBuffer ? body : JSON.stringify(body),
      signal,
      timeout: this.options.requestTimeoutMs,
    });
    if (response.statusCode === 401) {
      this.tokens.invalidate();
    }
    return response;
  }

  private expectOk(response: HttpResponse, remotePath: string): void {
    if (response.statusCode >= 200 && response.statusCode < 300) {
      return;
    }
    const code = response.statusCode === 401 || isRetryableStatus(response.statusCode)
      ? 'UPLOAD_RETRYABLE'
      : 'UPLOAD_PERMANENT';
    throw new UploadError(code, `OneDrive rejected ${remotePath} with status ${response.statusCode}`, {
      statusCode: response.statusCode,
    });
  }

  private expectItem(response: HttpResponse, remotePath: string): z.infer<typeof driveItemSchema> {
    this.expectOk(response, remotePath);
    const parsed = driveItemSchema.safeParse(response.body);
    return parsed.success ? parsed.data : {};
  }

  private toOutcome(error: unknown, file: string): UploadOutcome {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { status: 'permanent_error', message: `Local file missing: ${file}` };
    }
    if (error instanceof UploadError) {
      return error.retryable
        ? { status: 'retryable_error', message: error.message }
        : { status: 'permanent_error', message: error.message };
    }
    return { status: 'retryable_error', message: `OneDrive upload failed: ${describeError(error)}` };
  }
}

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}
