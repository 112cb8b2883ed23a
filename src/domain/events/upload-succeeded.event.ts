import { DomainEvent } from './base.event';
import type { UploadBackendId } from '../value-objects/upload-backend-id.vo';

export interface UploadSucceededEventPayload {
  taskId: string;
  backendId: UploadBackendId;
  taskName: string;
  attempts: number;
  remoteLocation?: string;
}

export class UploadSucceededEvent extends DomainEvent {
  constructor(public readonly payload: UploadSucceededEventPayload) {
    super();
  }

  get eventName(): string {
    return 'upload.succeeded';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
