import type { EventPublisherPort } from '../../src/application/ports/output/event-publisher.port';
import type { DomainEvent } from '../../src/domain/events/base.event';

/**
 * In-Memory Event Publisher Adapter
 * Captures published events for verification
 */
export class InMemoryEventPublisherAdapter implements EventPublisherPort {
  private readonly publishedEvents: DomainEvent[] = [];

  async publish(event: DomainEvent): Promise<void> {
    this.publishedEvents.push(event);
  }

  publishAsync(event: DomainEvent): void {
    this.publishedEvents.push(event);
  }

  // Test helper methods

  getPublishedEvents(): DomainEvent[] {
    return [...this.publishedEvents];
  }

  /**
   * Event names in publication order
   */
  getEventNames(): string[] {
    return this.publishedEvents.map((event) => event.eventName);
  }

  getEventsByName(eventName: string): DomainEvent[] {
    return this.publishedEvents.filter((event) => event.eventName === eventName);
  }

  getEventCountByName(eventName: string): number {
    return this.getEventsByName(eventName).length;
  }
}
