import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

/**
 * Loads `.env` (when present) on top of the process environment, then runs
 * the zod validation inside `configuration()`. A bad variable aborts bootstrap.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      load: [configuration],
      cache: true,
    }),
  ],
})
export class ConfigModule {}
