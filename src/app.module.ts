import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { InfrastructureModule } from './infrastructure/infrastructure.module';
import { ServiceModule } from './service/service.module';
import { ProcessingModule } from './processing/processing.module';
import { ApplicationModule } from './application/application.module';

/**
 * Application Module
 * Daemon supervision, completion pipeline and the command facade.
 * No HTTP server: the chat front end drives the use cases in-process.
 */
@Module({
  imports: [
    ConfigModule,
    SharedModule,
    InfrastructureModule,
    ServiceModule,
    ProcessingModule,
    ApplicationModule,
  ],
})
export class AppModule {}
