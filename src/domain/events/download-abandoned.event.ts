import { DomainEvent } from './base.event';
import type { DownloadTaskStatus } from '../entities/download-task.entity';

/**
 * Download Abandoned Event
 * A task was removed, or vanished from the daemon, before completing
 */
export interface DownloadAbandonedEventPayload {
  taskId: string;
  name: string;
  lastStatus: DownloadTaskStatus;
  reason: 'removed' | 'vanished';
}

export class DownloadAbandonedEvent extends DomainEvent {
  constructor(public readonly payload: DownloadAbandonedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'download.abandoned';
  }

  get taskId(): string {
    return this.payload.taskId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
