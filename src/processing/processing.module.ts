import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { ServiceModule } from '../service/service.module';
import {
  COMPLETION_WATCHER_OPTIONS,
  CompletionWatcher,
  type CompletionWatcherOptions,
} from './services/completion-watcher.service';
import {
  PIPELINE_OPTIONS,
  PipelineOrchestrator,
  type PipelineOptions,
} from './services/pipeline-orchestrator.service';
import {
  UPLOAD_COORDINATOR_OPTIONS,
  UploadCoordinator,
  type UploadCoordinatorOptions,
} from './services/upload-coordinator.service';

@Module({
  imports: [InfrastructureModule, ServiceModule],
  providers: [
    {
      provide: COMPLETION_WATCHER_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): CompletionWatcherOptions =>
        configService.get('watcher', { infer: true }),
    },
    {
      provide: UPLOAD_COORDINATOR_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): UploadCoordinatorOptions => {
        const upload = configService.get('upload', { infer: true });
        return {
          maxAttempts: upload.maxAttempts,
          backoffBaseMs: upload.backoffBaseMs,
          backoffMaxMs: upload.backoffMaxMs,
          attemptTimeoutMs: upload.attemptTimeoutMs,
          deleteAfterUpload: upload.deleteAfterUpload,
          downloadDir: configService.get('aria2', { infer: true }).downloadDir,
        };
      },
    },
    {
      provide: PIPELINE_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): PipelineOptions => ({
        autoStart: configService.get('service', { infer: true }).autoStart,
      }),
    },
    CompletionWatcher,
    UploadCoordinator,
    PipelineOrchestrator,
  ],
  exports: [CompletionWatcher, UploadCoordinator],
})
export class ProcessingModule {}
