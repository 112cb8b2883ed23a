import { DomainEvent } from './base.event';

export interface LocalFilesDeletedEventPayload {
  taskId: string;
  deletedFiles: string[];
  removedDirectories: string[];
}

export class LocalFilesDeletedEvent extends DomainEvent {
  constructor(public readonly payload: LocalFilesDeletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'download.local_files_deleted';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
