import { describe, it, expect } from 'vitest';
import { createUploadBackends } from '../../../../src/infrastructure/adapters/upload/upload-backend.registry';
import { NoopUploadBackend } from '../../../../src/infrastructure/adapters/upload/noop-upload.backend';
import { OneDriveUploadBackend } from '../../../../src/infrastructure/adapters/upload/onedrive-upload.backend';
import { S3UploadBackend } from '../../../../src/infrastructure/adapters/upload/s3-upload.backend';
import { TelegramUploadBackend } from '../../../../src/infrastructure/adapters/upload/telegram-upload.backend';
import {
  createHttpClientMock,
  createS3ServiceMock,
  createTestLogger,
} from '../../helpers/mock-factories';

describe('Upload backend registry', () => {
  const deps = () => ({
    config: {
      onedrive: {
        clientId: 'test-client',
        tenantId: 'common',
        remotePath: '/aria2bot',
        tokenFile: '/tmp/aria2-test/onedrive_token.json',
      },
      telegram: {
        botToken: 'test-token',
        channelId: '@archive',
        apiBaseUrl: 'https://api.telegram.org',
      },
    },
    http: createHttpClientMock().http,
    s3: createS3ServiceMock().s3,
    logger: createTestLogger(),
  });

  it('should build one backend per id in the configured order', () => {
    const backends = createUploadBackends(['telegram', 's3', 'onedrive'], deps());

    expect(backends.map((backend) => backend.id)).toEqual(['telegram', 's3', 'onedrive']);
    expect(backends[0]).toBeInstanceOf(TelegramUploadBackend);
    expect(backends[1]).toBeInstanceOf(S3UploadBackend);
    expect(backends[2]).toBeInstanceOf(OneDriveUploadBackend);
  });

  it('should ignore repeated ids', () => {
    const backends = createUploadBackends(['s3', 's3', 'telegram', 's3'], deps());

    expect(backends.map((backend) => backend.id)).toEqual(['s3', 'telegram']);
  });

  it('should build the no-op backend for none', async () => {
    const [backend] = createUploadBackends(['none'], deps());

    expect(backend).toBeInstanceOf(NoopUploadBackend);
    await expect(
      backend?.upload(['/downloads/a.txt'], { taskId: 'gid-1', taskName: 'a.txt', baseDir: '/downloads' }, new AbortController().signal),
    ).resolves.toEqual({ status: 'succeeded' });
  });
});
