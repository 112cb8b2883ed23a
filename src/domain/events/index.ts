/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export {
  DownloadCompletedEvent,
  type DownloadCompletedEventPayload,
  type CompletionOutcome,
} from './download-completed.event';
export {
  DownloadAbandonedEvent,
  type DownloadAbandonedEventPayload,
} from './download-abandoned.event';
export { UploadSucceededEvent, type UploadSucceededEventPayload } from './upload-succeeded.event';
export { UploadFailedEvent, type UploadFailedEventPayload } from './upload-failed.event';
export {
  LocalFilesDeletedEvent,
  type LocalFilesDeletedEventPayload,
} from './local-files-deleted.event';
export {
  ServiceStateChangedEvent,
  type ServiceStateChangedEventPayload,
} from './service-state-changed.event';
