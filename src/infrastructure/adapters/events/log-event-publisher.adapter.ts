import { Injectable } from '@nestjs/common';
import type { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import type { DomainEvent } from '../../../domain/events/base.event';
import { describeError } from '../../../domain/errors/relay.errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Log Event Publisher Adapter
 * Implements EventPublisherPort by writing each event as a structured log line.
 *
 * Chat front ends subscribe to the watcher and coordinator directly; this
 * adapter is the audit trail.
 */
@Injectable()
export class LogEventPublisherAdapter implements EventPublisherPort {
  private readonly logger: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext('Events');
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.info({ event: event.toJSON() }, `[EVENT] ${event.eventName}`);
  }

  publishAsync(event: DomainEvent): void {
    // Fire and forget
    this.publish(event).catch((error: unknown) => {
      this.logger.error(
        { eventName: event.eventName, error: describeError(error) },
        'Failed to publish event',
      );
    });
  }
}
