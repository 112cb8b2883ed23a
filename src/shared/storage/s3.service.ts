import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { createReadStream, promises as fs } from 'fs';
import type { AppConfig } from '../../config/configuration';
import { PinoLoggerService } from '../logging/pino-logger.service';

export interface UploadOptions {
  contentType?: string;
  metadata?: Record<string, string>;
  signal?: AbortSignal;
}

@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly client: S3Client;
  private readonly bucketName: string;
  private readonly prefix: string;
  private readonly logger: PinoLoggerService;

  constructor(configService: ConfigService<AppConfig, true>, logger: PinoLoggerService) {
    const awsConfig = configService.get('aws', { infer: true });
    const s3Config = configService.get('s3', { infer: true });

    this.client = new S3Client({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint, forcePathStyle: true }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.bucketName = s3Config.bucketName;
    this.prefix = s3Config.prefix;
    this.logger = logger.forContext(S3Service.name);
  }

  get bucket(): string {
    return this.bucketName;
  }

  async uploadFile(
    key: string,
    filePath: string,
    options?: UploadOptions,
  ): Promise<{ key: string; etag: string; size: number }> {
    const fullKey = this.getFullKey(key);
    const stats = await fs.stat(filePath);
    const fileStream = createReadStream(filePath);

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucketName,
        Key: fullKey,
        Body: fileStream,
        ContentType: options?.contentType,
        Metadata: options?.metadata,
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      this.logger.debug(
        { key: fullKey, loaded: progress.loaded, total: progress.total },
        'Upload progress',
      );
    });

    const onAbort = () => {
      upload.abort().catch((error: unknown) => {
        this.logger.warn({ key: fullKey, error: String(error) }, 'Failed to abort upload');
      });
    };
    options?.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await upload.done();
      this.logger.info({ key: fullKey, size: stats.size }, 'File uploaded successfully');

      return {
        key: fullKey,
        etag: result.ETag || '',
        size: stats.size,
      };
    } finally {
      options?.signal?.removeEventListener('abort', onAbort);
      fileStream.destroy();
    }
  }

  getFullKey(key: string): string {
    if (key.startsWith(this.prefix)) {
      return key;
    }
    return `${this.prefix}${key}`;
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
