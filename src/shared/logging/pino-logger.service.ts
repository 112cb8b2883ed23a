import { Inject, Injectable, LoggerService } from '@nestjs/common';
import pino, { type Logger } from 'pino';

export const ROOT_LOGGER = 'RootLogger';

export interface RootLoggerOptions {
  logLevel: string;
  nodeEnv: string;
}

export function createRootLogger(options: RootLoggerOptions): Logger {
  return pino({
    level: options.logLevel,
    ...(options.nodeEnv === 'development' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: 'aria2-relay',
      env: options.nodeEnv,
    },
  });
}

@Injectable()
export class PinoLoggerService implements LoggerService {
  private context?: string;

  constructor(@Inject(ROOT_LOGGER) private readonly logger: Logger) {}

  setContext(context: string): void {
    this.context = context;
  }

  /**
   * Logger bound to a component name, leaving this instance untouched.
   */
  forContext(context: string): PinoLoggerService {
    const scoped = new PinoLoggerService(this.logger);
    scoped.context = context;
    return scoped;
  }

  private formatMessage(
    message: string,
    context?: string,
  ): { msg: string; context?: string } {
    return {
      msg: message,
      context: context || this.context,
    };
  }

  log(message: string, context?: string): void {
    this.logger.info(this.formatMessage(message, context));
  }

  info(message: string): void;
  info(obj: Record<string, unknown>, message: string): void;
  info(objOrMessage: Record<string, unknown> | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.info(this.formatMessage(objOrMessage));
    } else {
      this.logger.info({ ...objOrMessage, context: this.context }, message || '');
    }
  }

  error(
    message: string | Record<string, unknown>,
    trace?: string,
    context?: string,
  ): void {
    if (typeof message === 'object') {
      this.logger.error({ ...message, context: this.context }, trace || '');
    } else {
      this.logger.error({ trace, ...this.formatMessage(message, context) }, message);
    }
  }

  warn(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.warn({ ...message, context: this.context }, context || '');
    } else {
      this.logger.warn(this.formatMessage(message, context));
    }
  }

  debug(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.debug({ ...message, context: this.context }, context || '');
    } else {
      this.logger.debug(this.formatMessage(message, context));
    }
  }

  verbose(message: string, context?: string): void {
    this.logger.trace(this.formatMessage(message, context));
  }

  child(bindings: Record<string, unknown>): PinoLoggerService {
    const childLogger = new PinoLoggerService(this.logger.child(bindings));
    childLogger.context = this.context;
    return childLogger;
  }

  withTaskId(taskId: string): PinoLoggerService {
    return this.child({ taskId });
  }

  withBackend(backendId: string): PinoLoggerService {
    return this.child({ backendId });
  }
}
