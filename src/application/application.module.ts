import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { ServiceModule } from '../service/service.module';

// Use Cases
import {
  AddDownloadUseCase,
  ControlServiceUseCase,
  GetGlobalStatsUseCase,
  ListDownloadsUseCase,
  ManageDownloadUseCase,
  RotateRpcSecretUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains the command facade the chat front end drives
 *
 * This module depends on output ports (interfaces) but not on their implementations.
 * The implementations (adapters) are provided by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule, ServiceModule],
  providers: [
    AddDownloadUseCase,
    ListDownloadsUseCase,
    GetGlobalStatsUseCase,
    ManageDownloadUseCase,
    ControlServiceUseCase,
    RotateRpcSecretUseCase,
  ],
  exports: [
    // Export use cases so they can be used by driving adapters (chat handlers)
    AddDownloadUseCase,
    ListDownloadsUseCase,
    GetGlobalStatsUseCase,
    ManageDownloadUseCase,
    ControlServiceUseCase,
    RotateRpcSecretUseCase,
  ],
})
export class ApplicationModule {}
