import { openAsBlob } from 'fs';
import { stat } from 'fs/promises';
import { basename } from 'path';
import { FormData } from 'undici';
import { z } from 'zod';
import type {
  UploadBackendPort,
  UploadMetadata,
  UploadOutcome,
} from '../../../application/ports/output/upload-backend.port';
import { describeError } from '../../../domain/errors/relay.errors';
import { isErrnoException } from '../../../shared/fs/json-file';
import { HttpClientService } from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { isRetryableStatus } from './upload-paths';

export const DEFAULT_TELEGRAM_API = 'https://api.telegram.org';

/** Bot API limits for documents: hosted API and a self-hosted local API server. */
export const STANDARD_LIMIT_BYTES = 50 * 1024 * 1024;
export const LOCAL_API_LIMIT_BYTES = 2 * 1024 * 1024 * 1024;

export interface TelegramUploadOptions {
  botToken: string;
  channelId: string;
  apiBaseUrl: string;
  /** Per request; a document upload can take minutes. */
  requestTimeoutMs?: number;
}

const sendDocumentResponseSchema = z.object({
  ok: z.boolean(),
  result: z
    .object({
      message_id: z.number(),
      document: z.object({ file_id: z.string() }).optional(),
    })
    .optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
});

/**
 * Telegram Channel Upload Backend
 * Posts each file as a document to one channel through the Bot API.
 */
export class TelegramUploadBackend implements UploadBackendPort {
  readonly id = 'telegram';
  readonly maxFileSize: number;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly http: HttpClientService,
    private readonly options: TelegramUploadOptions,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(TelegramUploadBackend.name);
    this.maxFileSize =
      options.apiBaseUrl.replace(/\/+$/, '') === DEFAULT_TELEGRAM_API
        ? STANDARD_LIMIT_BYTES
        : LOCAL_API_LIMIT_BYTES;
  }

  async upload(
    files: readonly string[],
    metadata: UploadMetadata,
    signal: AbortSignal,
  ): Promise<UploadOutcome> {
    const oversize = await this.findOversize(files);
    if (oversize.status !== 'ok') {
      return oversize.outcome;
    }

    let lastMessageId: number | undefined;
    for (const file of files) {
      if (signal.aborted) {
        return { status: 'retryable_error', message: 'Upload aborted' };
      }
      const outcome = await this.sendDocument(file, signal);
      if (outcome.status !== 'sent') {
        return outcome.outcome;
      }
      lastMessageId = outcome.messageId;
    }

    this.logger.info(
      { taskId: metadata.taskId, files: files.length, channelId: this.options.channelId },
      'Task posted to Telegram channel',
    );
    return {
      status: 'succeeded',
      remoteLocation:
        lastMessageId === undefined ? undefined : `${this.options.channelId}/${lastMessageId}`,
    };
  }

  private async findOversize(
    files: readonly string[],
  ): Promise<{ status: 'ok' } | { status: 'rejected'; outcome: UploadOutcome }> {
    const limitMb = Math.floor(this.maxFileSize / (1024 * 1024));
    for (const file of files) {
      try {
        const info = await stat(file);
        if (info.size > this.maxFileSize) {
          return {
            status: 'rejected',
            outcome: {
              status: 'permanent_error',
              message: `${basename(file)} exceeds the ${limitMb}MB limit`,
            },
          };
        }
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return {
            status: 'rejected',
            outcome: { status: 'permanent_error', message: `Local file missing: ${file}` },
          };
        }
        throw error;
      }
    }
    return { status: 'ok' };
  }

  private async sendDocument(
    file: string,
    signal: AbortSignal,
  ): Promise<{ status: 'sent'; messageId: number } | { status: 'failed'; outcome: UploadOutcome }> {
    const name = basename(file);
    const form = new FormData();
    form.append('chat_id', this.options.channelId);
    form.append('caption', `📁 ${name}`);
    form.append('document', await openAsBlob(file), name);

    const url = `${this.options.apiBaseUrl.replace(/\/+$/, '')}/bot${this.options.botToken}/sendDocument`;

    let statusCode: number;
    let body: unknown;
    try {
      const response = await this.http.postForm(url, form, {
        signal,
        timeout: this.options.requestTimeoutMs ?? 300000,
      });
      statusCode = response.statusCode;
      body = response.body;
    } catch (error) {
      return {
        status: 'failed',
        outcome: { status: 'retryable_error', message: `Telegram unreachable: ${describeError(error)}` },
      };
    }

    const parsed = sendDocumentResponseSchema.safeParse(body);
    if (parsed.success && parsed.data.ok && parsed.data.result) {
      this.logger.debug(
        { file: name, messageId: parsed.data.result.message_id },
        'Document sent',
      );
      return { status: 'sent', messageId: parsed.data.result.message_id };
    }

    const description = parsed.success ? parsed.data.description : undefined;
    const message = `Telegram rejected ${name}: ${statusCode} ${description ?? 'unexpected response'}`;
    return {
      status: 'failed',
      outcome: isRetryableStatus(statusCode)
        ? { status: 'retryable_error', message }
        : { status: 'permanent_error', message },
    };
  }
}
