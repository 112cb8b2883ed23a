import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { resolve } from 'path';
import { validateEnv } from '../../../src/config/validation.schema';
import { buildConfig, expandPath } from '../../../src/config/configuration';

describe('Configuration', () => {
  describe('validateEnv', () => {
    it('should apply defaults to an empty environment', () => {
      const env = validateEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.ARIA2_RPC_HOST).toBe('localhost');
      expect(env.ARIA2_RPC_PORT).toBe(6800);
      expect(env.ARIA2_RPC_SECRET).toBe('');
      expect(env.SERVICE_MODE).toBe('subprocess');
      expect(env.UPLOAD_BACKENDS).toEqual(['none']);
      expect(env.DELETE_AFTER_UPLOAD).toBe(false);
      expect(env.AUTO_START_DAEMON).toBe(false);
      expect(env.WATCHER_POLL_INTERVAL_MS).toBe(5000);
    });

    it('should coerce numbers and flags from strings', () => {
      const env = validateEnv({
        ARIA2_RPC_PORT: '6801',
        UPLOAD_MAX_ATTEMPTS: '7',
        AUTO_START_DAEMON: 'Yes',
      });

      expect(env.ARIA2_RPC_PORT).toBe(6801);
      expect(env.UPLOAD_MAX_ATTEMPTS).toBe(7);
      expect(env.AUTO_START_DAEMON).toBe(true);
    });

    it('should parse a comma separated backend list', () => {
      const env = validateEnv({
        UPLOAD_BACKENDS: 's3, Telegram,',
        S3_BUCKET_NAME: 'archive',
        TELEGRAM_BOT_TOKEN: 'test-token',
        TELEGRAM_CHANNEL_ID: '@archive',
      });

      expect(env.UPLOAD_BACKENDS).toEqual(['s3', 'telegram']);
    });

    it('should reject unknown backends', () => {
      expect(() => validateEnv({ UPLOAD_BACKENDS: 'dropbox' })).toThrow(/UPLOAD_BACKENDS\.0/);
    });

    it('should require backend settings for enabled backends', () => {
      expect(() => validateEnv({ UPLOAD_BACKENDS: 's3' })).toThrow(
        'S3_BUCKET_NAME: required when the s3 backend is enabled',
      );
      expect(() => validateEnv({ UPLOAD_BACKENDS: 'onedrive' })).toThrow(
        'ONEDRIVE_CLIENT_ID: required when the onedrive backend is enabled',
      );
      expect(() => validateEnv({ UPLOAD_BACKENDS: 'telegram', TELEGRAM_BOT_TOKEN: 'test-token' })).toThrow(
        'TELEGRAM_CHANNEL_ID: required when the telegram backend is enabled',
      );
    });

    it('should not combine none with real backends', () => {
      expect(() => validateEnv({ UPLOAD_BACKENDS: 'none,s3', S3_BUCKET_NAME: 'archive' })).toThrow(
        'UPLOAD_BACKENDS: "none" cannot be combined with other backends',
      );
    });

    it('should refuse deletion without a real backend', () => {
      expect(() => validateEnv({ DELETE_AFTER_UPLOAD: 'true' })).toThrow(
        'DELETE_AFTER_UPLOAD: requires at least one real upload backend',
      );
    });

    it('should refuse a backoff cap below the base delay', () => {
      expect(() =>
        validateEnv({ UPLOAD_BACKOFF_BASE_MS: '1000', UPLOAD_BACKOFF_MAX_MS: '500' }),
      ).toThrow('UPLOAD_BACKOFF_MAX_MS: must not be lower than UPLOAD_BACKOFF_BASE_MS');
    });

    it('should refuse service names that are not valid unit names', () => {
      expect(() => validateEnv({ SERVICE_NAME: 'aria2 daemon' })).toThrow(
        'SERVICE_NAME: must be a valid unit name',
      );
    });

    it('should list every problem in the error', () => {
      expect(() => validateEnv({ ARIA2_RPC_PORT: '70000', SERVICE_MODE: 'docker' })).toThrow(
        /Environment validation failed:\n {2}- ARIA2_RPC_PORT: .*\n {2}- SERVICE_MODE: /,
      );
    });
  });

  describe('expandPath', () => {
    it('should expand the home directory', () => {
      expect(expandPath('~')).toBe(homedir());
      expect(expandPath('~/downloads')).toBe(resolve(homedir(), 'downloads'));
    });

    it('should resolve other paths', () => {
      expect(expandPath('/srv/aria2/../data')).toBe('/srv/data');
      expect(expandPath('state')).toBe(resolve('state'));
    });
  });

  describe('buildConfig', () => {
    it('should group settings and expand paths', () => {
      const config = buildConfig(
        validateEnv({
          ARIA2_CONF: '/etc/aria2/aria2.conf',
          DOWNLOAD_DIR: '~/media',
          UPLOAD_BACKENDS: 's3',
          S3_BUCKET_NAME: 'archive',
          DELETE_AFTER_UPLOAD: 'true',
        }),
      );

      expect(config.aria2.configPath).toBe('/etc/aria2/aria2.conf');
      expect(config.aria2.downloadDir).toBe(resolve(homedir(), 'media'));
      expect(config.upload).toMatchObject({ backends: ['s3'], deleteAfterUpload: true });
      expect(config.s3).toEqual({ bucketName: 'archive', prefix: 'downloads/' });
      expect(config.aws.credentials).toBeUndefined();
    });

    it('should only set AWS credentials when both parts are given', () => {
      const partial = buildConfig(validateEnv({ AWS_ACCESS_KEY_ID: 'test-key' }));
      const full = buildConfig(
        validateEnv({ AWS_ACCESS_KEY_ID: 'test-key', AWS_SECRET_ACCESS_KEY: 'test-secret' }),
      );

      expect(partial.aws.credentials).toBeUndefined();
      expect(full.aws.credentials).toEqual({
        accessKeyId: 'test-key',
        secretAccessKey: 'test-secret',
      });
    });
  });
});
