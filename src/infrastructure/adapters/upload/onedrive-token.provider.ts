import { z } from 'zod';
import { UploadError } from '../../../domain/errors/relay.errors';
import { readJsonFile, writeJsonAtomic } from '../../../shared/fs/json-file';
import { HttpClientService } from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { isRetryableStatus } from './upload-paths';

export const ONEDRIVE_SCOPES = ['Files.ReadWrite', 'offline_access'];

/** Access tokens this close to expiry are refreshed before use. */
const EXPIRY_MARGIN_SECONDS = 60;

export interface OneDriveTokenOptions {
  clientId: string;
  tenantId: string;
  tokenFile: string;
  authorityBaseUrl?: string;
}

const tokenFileSchema = z.object({
  access_token: z.string().optional(),
  refresh_token: z.string().min(1),
  expires_at: z.number().optional(),
});

export type OneDriveTokenFile = z.infer<typeof tokenFileSchema>;

const tokenResponseSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
  expires_in: z.coerce.number(),
});

/**
 * Access tokens for Microsoft Graph, refreshed from the token file written
 * by the interactive sign-in. Refreshed tokens are written back.
 */
export class OneDriveTokenProvider {
  private cached: OneDriveTokenFile | null = null;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly http: HttpClientService,
    private readonly options: OneDriveTokenOptions,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(OneDriveTokenProvider.name);
  }

  async getAccessToken(signal?: AbortSignal): Promise<string> {
    const token = this.cached ?? (await this.load());
    const now = Math.floor(Date.now() / 1000);

    if (token.access_token && token.expires_at && token.expires_at - EXPIRY_MARGIN_SECONDS > now) {
      return token.access_token;
    }
    return this.refresh(token.refresh_token, signal);
  }

  /** Forget the access token, e.g. after Graph answered 401. */
  invalidate(): void {
    if (this.cached) {
      this.cached = { refresh_token: this.cached.refresh_token };
    }
  }

  private async load(): Promise<OneDriveTokenFile> {
    const stored = await readJsonFile(this.options.tokenFile, tokenFileSchema);
    if (!stored) {
      throw new UploadError('UPLOAD_PERMANENT', 'OneDrive is not signed in', {
        tokenFile: this.options.tokenFile,
      });
    }
    this.cached = stored;
    return stored;
  }

  private async refresh(refreshToken: string, signal?: AbortSignal): Promise<string> {
    const authority = (this.options.authorityBaseUrl ?? 'https://login.microsoftonline.com').replace(
      /\/+$/,
      '',
    );
    const body = new URLSearchParams({
      client_id: this.options.clientId,
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
      scope: ONEDRIVE_SCOPES.join(' '),
    }).toString();

    const response = await this.http.request(
      `${authority}/${this.options.tenantId}/oauth2/v2.0/token`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body,
        signal,
      },
    );

    const parsed = tokenResponseSchema.safeParse(response.body);
    if (response.statusCode !== 200 || !parsed.success) {
      const message = `OneDrive token refresh failed with status ${response.statusCode}`;
      throw new UploadError(
        isRetryableStatus(response.statusCode) ? 'UPLOAD_RETRYABLE' : 'UPLOAD_PERMANENT',
        message,
      );
    }

    const next: OneDriveTokenFile = {
      access_token: parsed.data.access_token,
      refresh_token: parsed.data.refresh_token ?? refreshToken,
      expires_at: Math.floor(Date.now() / 1000) + parsed.data.expires_in,
    };
    this.cached = next;
    await writeJsonAtomic(this.options.tokenFile, next);
    this.logger.debug({ expiresAt: next.expires_at }, 'OneDrive access token refreshed');
    return parsed.data.access_token;
  }
}
