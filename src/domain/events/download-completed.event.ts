import { DomainEvent } from './base.event';

/**
 * Download Completed Event
 * Emitted once per task id when the daemon reports it `complete` or `error`
 */
export type CompletionOutcome = 'complete' | 'error';

export interface DownloadCompletedEventPayload {
  taskId: string;
  outcome: CompletionOutcome;
  name: string;
  dir: string;
  files: string[];
  totalLength: number;
  errorCode?: string;
  errorMessage?: string;
}

export class DownloadCompletedEvent extends DomainEvent {
  constructor(public readonly payload: DownloadCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'download.completed';
  }

  get taskId(): string {
    return this.payload.taskId;
  }

  get succeeded(): boolean {
    return this.payload.outcome === 'complete';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
