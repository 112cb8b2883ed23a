import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import type { AppConfig } from './config/configuration';
import { ServiceManager } from './service/service-manager.service';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the relay as a NestJS application context (no HTTP server).
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const logger = app.get(PinoLoggerService).forContext('Bootstrap');

  // Use custom logger
  app.useLogger(logger);

  // Enable graceful shutdown
  app.enableShutdownHooks();

  // Register shutdown handlers
  let shuttingDown = false;
  const shutdownHandler = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal, stopping pipeline...');
    await app.close();
    logger.info('Relay shut down gracefully');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdownHandler('SIGTERM'));
  process.on('SIGINT', () => void shutdownHandler('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason: String(reason) }, 'Unhandled rejection');
    process.exit(1);
  });

  const serviceManager = app.get(ServiceManager);
  logger.info(
    {
      nodeEnv: configService.get('nodeEnv', { infer: true }),
      pid: process.pid,
      serviceMode: configService.get('service', { infer: true }).mode,
      daemonState: serviceManager.getState(),
      uploadBackends: configService.get('upload', { infer: true }).backends,
    },
    'aria2 relay started',
  );
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start relay:', error);
  process.exit(1);
});
