import { z } from 'zod';
import { UPLOAD_BACKEND_IDS } from '../domain/value-objects/upload-backend-id.vo';

const booleanFlag = z
  .string()
  .default('false')
  .transform((value) => ['true', '1', 'yes'].includes(value.trim().toLowerCase()));

const backendList = z
  .string()
  .default('none')
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0),
  )
  .pipe(z.array(z.enum(UPLOAD_BACKEND_IDS)));

export const envSchema = z
  .object({
    // Core
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // aria2 RPC
    ARIA2_RPC_HOST: z.string().min(1).default('localhost'),
    ARIA2_RPC_PORT: z.coerce.number().int().min(1).max(65535).default(6800),
    ARIA2_RPC_SECRET: z.string().default(''),
    ARIA2_RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

    // Daemon artifacts (placed by the installer)
    ARIA2_BIN: z.string().default('~/.local/bin/aria2c'),
    ARIA2_CONF: z.string().default('~/.config/aria2/aria2.conf'),
    ARIA2_LOG: z.string().default('~/.config/aria2/aria2.log'),
    DOWNLOAD_DIR: z.string().default('~/downloads'),

    // Service supervision
    SERVICE_MODE: z.enum(['systemd', 'subprocess']).default('subprocess'),
    SERVICE_NAME: z
      .string()
      .regex(/^[A-Za-z0-9_.@-]+$/, 'must be a valid unit name')
      .default('aria2'),
    SYSTEMD_USER_DIR: z.string().default('~/.config/systemd/user'),
    AUTO_START_DAEMON: booleanFlag,
    START_HEALTH_CHECK_ATTEMPTS: z.coerce.number().int().min(1).default(10),
    START_HEALTH_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(500),
    STOP_GRACE_PERIOD_MS: z.coerce.number().int().positive().default(5000),

    // Completion watcher
    WATCHER_POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(5000),
    WATCHER_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(100),

    // Upload coordinator
    UPLOAD_BACKENDS: backendList,
    UPLOAD_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
    UPLOAD_BACKOFF_BASE_MS: z.coerce.number().int().positive().default(5000),
    UPLOAD_BACKOFF_MAX_MS: z.coerce.number().int().positive().default(300000),
    UPLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(600000),
    DELETE_AFTER_UPLOAD: booleanFlag,
    STATE_DIR: z.string().default('~/.config/aria2-relay'),

    // S3 backend
    AWS_REGION: z.string().default('us-east-1'),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),
    AWS_ENDPOINT: z.string().url().optional(), // MinIO, LocalStack
    S3_BUCKET_NAME: z.string().optional(),
    S3_PREFIX: z.string().default('downloads/'),

    // OneDrive backend
    ONEDRIVE_CLIENT_ID: z.string().optional(),
    ONEDRIVE_TENANT_ID: z.string().default('common'),
    ONEDRIVE_REMOTE_PATH: z.string().default('/aria2bot'),
    ONEDRIVE_TOKEN_FILE: z.string().default('~/.config/aria2/cloud_tokens/onedrive_token.json'),

    // Telegram channel backend
    TELEGRAM_BOT_TOKEN: z.string().optional(),
    TELEGRAM_CHANNEL_ID: z.string().optional(),
    TELEGRAM_API_BASE_URL: z.string().url().default('https://api.telegram.org'),
  })
  .superRefine((env, ctx) => {
    const backends = env.UPLOAD_BACKENDS;

    if (backends.includes('none') && backends.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['UPLOAD_BACKENDS'],
        message: '"none" cannot be combined with other backends',
      });
    }
    if (env.DELETE_AFTER_UPLOAD && backends.every((backend) => backend === 'none')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DELETE_AFTER_UPLOAD'],
        message: 'requires at least one real upload backend',
      });
    }
    if (backends.includes('s3') && !env.S3_BUCKET_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET_NAME'],
        message: 'required when the s3 backend is enabled',
      });
    }
    if (backends.includes('onedrive') && !env.ONEDRIVE_CLIENT_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ONEDRIVE_CLIENT_ID'],
        message: 'required when the onedrive backend is enabled',
      });
    }
    if (backends.includes('telegram')) {
      if (!env.TELEGRAM_BOT_TOKEN) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['TELEGRAM_BOT_TOKEN'],
          message: 'required when the telegram backend is enabled',
        });
      }
      if (!env.TELEGRAM_CHANNEL_ID) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['TELEGRAM_CHANNEL_ID'],
          message: 'required when the telegram backend is enabled',
        });
      }
    }
    if (env.UPLOAD_BACKOFF_MAX_MS < env.UPLOAD_BACKOFF_BASE_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['UPLOAD_BACKOFF_MAX_MS'],
        message: 'must not be lower than UPLOAD_BACKOFF_BASE_MS',
      });
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
