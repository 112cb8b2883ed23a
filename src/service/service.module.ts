import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import {
  SERVICE_MANAGER_OPTIONS,
  ServiceManager,
  type ServiceManagerOptions,
} from './service-manager.service';

@Module({
  imports: [InfrastructureModule],
  providers: [
    {
      provide: SERVICE_MANAGER_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): ServiceManagerOptions => {
        const service = configService.get('service', { infer: true });
        return {
          startHealthCheckAttempts: service.startHealthCheckAttempts,
          startHealthCheckIntervalMs: service.startHealthCheckIntervalMs,
          stopGracePeriodMs: service.stopGracePeriodMs,
        };
      },
    },
    ServiceManager,
  ],
  exports: [ServiceManager],
})
export class ServiceModule {}
