// Injection tokens (string symbols for DI)
export const DAEMON_HANDLE = 'DaemonHandle';
export const DAEMON_RPC_PORT = 'DaemonRpcPort';
export const RPC_TRANSPORT_PORT = 'RpcTransportPort';
export const SERVICE_HOST_PORT = 'ServiceHostPort';
export const DAEMON_LOG_PORT = 'DaemonLogPort';
export const DAEMON_CONFIG_PORT = 'DaemonConfigPort';
export const SEEN_TASK_STORE_PORT = 'SeenTaskStorePort';
export const UPLOAD_JOB_REPOSITORY_PORT = 'UploadJobRepositoryPort';
export const UPLOAD_BACKENDS = 'UploadBackends';
export const LOCAL_FILES_PORT = 'LocalFilesPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
