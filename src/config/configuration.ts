/**
 * Application Configuration Module
 *
 * Central configuration for the aria2 relay. Loads and validates environment
 * variables and exposes them as a typed AppConfig through the NestJS
 * ConfigService.
 *
 * ## Configuration Sources:
 * 1. Environment variables (system environment)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object, `~/` paths expanded
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const watcher = this.configService.get('watcher', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { homedir } from 'os';
import { resolve } from 'path';
import { validateEnv, type EnvConfig } from './validation.schema';
import type { UploadBackendId } from '../domain/value-objects/upload-backend-id.vo';

/**
 * Expand a leading `~/` to the current user's home directory.
 */
export function expandPath(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aria2: {
    rpcHost: string;
    rpcPort: number;
    rpcSecret: string;
    rpcTimeoutMs: number;
    binaryPath: string;
    configPath: string;
    logPath: string;
    downloadDir: string;
  };
  service: {
    mode: 'systemd' | 'subprocess';
    name: string;
    systemdUserDir: string;
    autoStart: boolean;
    startHealthCheckAttempts: number;
    startHealthCheckIntervalMs: number;
    stopGracePeriodMs: number;
  };
  watcher: {
    pollIntervalMs: number;
    pageSize: number;
  };
  /**
   * Upload coordination.
   *
   * ### backends (Environment: UPLOAD_BACKENDS)
   * - Comma separated list of `s3`, `onedrive`, `telegram` or `none`
   * - Every listed backend receives one upload job per completed download
   *
   * ### maxAttempts / backoffBaseMs / backoffMaxMs
   * - Retryable failures wait `backoffBaseMs * 2^(attempt - 1)`, capped at `backoffMaxMs`
   * - After `maxAttempts` attempts the job is failed permanently
   *
   * ### deleteAfterUpload (Environment: DELETE_AFTER_UPLOAD)
   * - Local files are removed once every listed backend succeeded
   */
  upload: {
    backends: UploadBackendId[];
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    attemptTimeoutMs: number;
    deleteAfterUpload: boolean;
  };
  stateDir: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  s3: {
    bucketName: string;
    prefix: string;
  };
  onedrive: {
    clientId: string;
    tenantId: string;
    remotePath: string;
    tokenFile: string;
  };
  telegram: {
    botToken: string;
    channelId: string;
    apiBaseUrl: string;
  };
}

export function buildConfig(env: EnvConfig): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aria2: {
      rpcHost: env.ARIA2_RPC_HOST,
      rpcPort: env.ARIA2_RPC_PORT,
      rpcSecret: env.ARIA2_RPC_SECRET,
      rpcTimeoutMs: env.ARIA2_RPC_TIMEOUT_MS,
      binaryPath: expandPath(env.ARIA2_BIN),
      configPath: expandPath(env.ARIA2_CONF),
      logPath: expandPath(env.ARIA2_LOG),
      downloadDir: expandPath(env.DOWNLOAD_DIR),
    },
    service: {
      mode: env.SERVICE_MODE,
      name: env.SERVICE_NAME,
      systemdUserDir: expandPath(env.SYSTEMD_USER_DIR),
      autoStart: env.AUTO_START_DAEMON,
      startHealthCheckAttempts: env.START_HEALTH_CHECK_ATTEMPTS,
      startHealthCheckIntervalMs: env.START_HEALTH_CHECK_INTERVAL_MS,
      stopGracePeriodMs: env.STOP_GRACE_PERIOD_MS,
    },
    watcher: {
      pollIntervalMs: env.WATCHER_POLL_INTERVAL_MS,
      pageSize: env.WATCHER_PAGE_SIZE,
    },
    upload: {
      backends: env.UPLOAD_BACKENDS,
      maxAttempts: env.UPLOAD_MAX_ATTEMPTS,
      backoffBaseMs: env.UPLOAD_BACKOFF_BASE_MS,
      backoffMaxMs: env.UPLOAD_BACKOFF_MAX_MS,
      attemptTimeoutMs: env.UPLOAD_TIMEOUT_MS,
      deleteAfterUpload: env.DELETE_AFTER_UPLOAD,
    },
    stateDir: expandPath(env.STATE_DIR),
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    s3: {
      bucketName: env.S3_BUCKET_NAME ?? '',
      prefix: env.S3_PREFIX,
    },
    onedrive: {
      clientId: env.ONEDRIVE_CLIENT_ID ?? '',
      tenantId: env.ONEDRIVE_TENANT_ID,
      remotePath: env.ONEDRIVE_REMOTE_PATH,
      tokenFile: expandPath(env.ONEDRIVE_TOKEN_FILE),
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN ?? '',
      channelId: env.TELEGRAM_CHANNEL_ID ?? '',
      apiBaseUrl: env.TELEGRAM_API_BASE_URL,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildConfig(validateEnv(process.env));
