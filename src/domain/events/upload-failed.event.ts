import { DomainEvent } from './base.event';
import type { UploadBackendId } from '../value-objects/upload-backend-id.vo';

/**
 * Upload Failed Event
 * Emitted when a job gives up for good: attempt ceiling reached or the
 * backend refused permanently
 */
export interface UploadFailedEventPayload {
  taskId: string;
  backendId: UploadBackendId;
  taskName: string;
  attempts: number;
  error: string;
}

export class UploadFailedEvent extends DomainEvent {
  constructor(public readonly payload: UploadFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'upload.failed';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
