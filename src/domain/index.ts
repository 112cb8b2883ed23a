/**
 * Domain Layer Barrel Export
 *
 * The domain layer is the core of the application and has no framework dependencies.
 */

// Entities
export { DownloadTask, type DownloadTaskStatus, type DownloadTaskFile } from './entities/download-task.entity';
export { UploadJobEntity, type UploadJobState } from './entities/upload-job.entity';

// Value Objects
export { DownloadUriVO, type DownloadUriScheme } from './value-objects/download-uri.vo';
export {
  ServiceState,
  ServiceStateVO,
  RUNNING_DEGRADED,
  type ReportedServiceState,
} from './value-objects/service-state.vo';
export { type DaemonHandle, type RpcEndpoint, rpcUrl } from './value-objects/daemon-handle.vo';
export {
  UPLOAD_BACKEND_IDS,
  type UploadBackendId,
  isUploadBackendId,
} from './value-objects/upload-backend-id.vo';

// Errors
export * from './errors/relay.errors';

// Events
export * from './events';
