import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { SharedModule } from '../shared/shared.module';
import { HttpClientService } from '../shared/http/http-client.service';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import { S3Service } from '../shared/storage/s3.service';
import { DaemonHandleLoader } from '../service/daemon-handle.loader';

// Injection tokens (string symbols for DI)
import {
  DAEMON_CONFIG_PORT,
  DAEMON_HANDLE,
  DAEMON_LOG_PORT,
  DAEMON_RPC_PORT,
  EVENT_PUBLISHER_PORT,
  LOCAL_FILES_PORT,
  RPC_TRANSPORT_PORT,
  SEEN_TASK_STORE_PORT,
  SERVICE_HOST_PORT,
  UPLOAD_BACKENDS,
  UPLOAD_JOB_REPOSITORY_PORT,
} from '../application/ports/injection-tokens';
import type { ServiceHostPort } from '../application/ports/output/service-host.port';

// Adapters (implementations)
import { Aria2RpcClient, RPC_CLIENT_OPTIONS, type RpcClientOptions } from './adapters/rpc/aria2-rpc.client';
import { HttpRpcTransportAdapter } from './adapters/rpc/http-rpc-transport.adapter';
import { Aria2ConfFileAdapter } from './adapters/daemon/aria2-conf-file.adapter';
import { DaemonLogFileAdapter } from './adapters/daemon/daemon-log-file.adapter';
import { SubprocessServiceHostAdapter } from './adapters/daemon/subprocess-service-host.adapter';
import { SystemdServiceHostAdapter } from './adapters/daemon/systemd-service-host.adapter';
import { LogEventPublisherAdapter } from './adapters/events/log-event-publisher.adapter';
import { LocalFilesAdapter } from './adapters/fs/local-files.adapter';
import { JsonSeenTaskStoreAdapter } from './adapters/persistence/json-seen-task-store.adapter';
import { JsonUploadJobRepositoryAdapter } from './adapters/persistence/json-upload-job-repository.adapter';
import { createUploadBackends } from './adapters/upload/upload-backend.registry';

const PORT_TOKENS = [
  DAEMON_HANDLE,
  DAEMON_CONFIG_PORT,
  DAEMON_RPC_PORT,
  DAEMON_LOG_PORT,
  SERVICE_HOST_PORT,
  SEEN_TASK_STORE_PORT,
  UPLOAD_JOB_REPOSITORY_PORT,
  UPLOAD_BACKENDS,
  LOCAL_FILES_PORT,
  EVENT_PUBLISHER_PORT,
];

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Builds the process's single DaemonHandle from config and aria2.conf
 * 2. Creates adapters that implement ports, chosen by configuration
 * 3. Exports the port tokens so services and use cases can inject them
 */
@Module({
  imports: [SharedModule],
  providers: [
    // Daemon handle
    {
      provide: DAEMON_CONFIG_PORT,
      useClass: Aria2ConfFileAdapter,
    },
    DaemonHandleLoader,
    {
      provide: DAEMON_HANDLE,
      inject: [DaemonHandleLoader],
      useFactory: (loader: DaemonHandleLoader) => loader.load(),
    },

    // RPC
    {
      provide: RPC_CLIENT_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): RpcClientOptions => ({
        timeoutMs: configService.get('aria2', { infer: true }).rpcTimeoutMs,
      }),
    },
    {
      provide: RPC_TRANSPORT_PORT,
      useClass: HttpRpcTransportAdapter,
    },
    Aria2RpcClient,
    {
      provide: DAEMON_RPC_PORT,
      useExisting: Aria2RpcClient,
    },

    // Service host, chosen by SERVICE_MODE
    {
      provide: SERVICE_HOST_PORT,
      inject: [ConfigService, PinoLoggerService],
      useFactory: (
        configService: ConfigService<AppConfig, true>,
        logger: PinoLoggerService,
      ): ServiceHostPort => {
        const service = configService.get('service', { infer: true });
        if (service.mode === 'systemd') {
          return new SystemdServiceHostAdapter({ unitDir: service.systemdUserDir }, logger);
        }
        return new SubprocessServiceHostAdapter(
          { stateDir: configService.get('stateDir', { infer: true }) },
          logger,
        );
      },
    },
    {
      provide: DAEMON_LOG_PORT,
      useClass: DaemonLogFileAdapter,
    },

    // Persistence adapters
    {
      provide: SEEN_TASK_STORE_PORT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        new JsonSeenTaskStoreAdapter(configService.get('stateDir', { infer: true })),
    },
    {
      provide: UPLOAD_JOB_REPOSITORY_PORT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        new JsonUploadJobRepositoryAdapter(configService.get('stateDir', { infer: true })),
    },

    // Upload backends, chosen by UPLOAD_BACKENDS
    {
      provide: UPLOAD_BACKENDS,
      inject: [ConfigService, HttpClientService, S3Service, PinoLoggerService],
      useFactory: (
        configService: ConfigService<AppConfig, true>,
        http: HttpClientService,
        s3: S3Service,
        logger: PinoLoggerService,
      ) =>
        createUploadBackends(configService.get('upload', { infer: true }).backends, {
          config: {
            onedrive: configService.get('onedrive', { infer: true }),
            telegram: configService.get('telegram', { infer: true }),
          },
          http,
          s3,
          logger,
        }),
    },
    {
      provide: LOCAL_FILES_PORT,
      inject: [PinoLoggerService],
      useFactory: (logger: PinoLoggerService) => new LocalFilesAdapter(logger),
    },

    // Event publisher adapter
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LogEventPublisherAdapter,
    },
  ],
  exports: PORT_TOKENS,
})
export class InfrastructureModule {}
