import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigModule } from '../../config/config.module';
import type { AppConfig } from '../../config/configuration';
import { PinoLoggerService, ROOT_LOGGER, createRootLogger } from './pino-logger.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: ROOT_LOGGER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        createRootLogger({
          logLevel: configService.get('logLevel', { infer: true }),
          nodeEnv: configService.get('nodeEnv', { infer: true }),
        }),
    },
    PinoLoggerService,
  ],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
