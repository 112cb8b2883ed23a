import { DomainEvent } from './base.event';
import type { ServiceState } from '../value-objects/service-state.vo';

export interface ServiceStateChangedEventPayload {
  serviceName: string;
  from: ServiceState;
  to: ServiceState;
  pid?: number;
  reason?: string;
}

export class ServiceStateChangedEvent extends DomainEvent {
  constructor(public readonly payload: ServiceStateChangedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'service.state_changed';
  }

  get to(): ServiceState {
    return this.payload.to;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
