/**
 * Output Ports (Driven Ports)
 * Interfaces the application layer needs from the outside world.
 */
export * from './daemon-rpc.port';
export * from './rpc-transport.port';
export * from './service-host.port';
export * from './daemon-log.port';
export * from './daemon-config.port';
export * from './seen-task-store.port';
export * from './upload-job-repository.port';
export * from './upload-backend.port';
export * from './local-files.port';
export * from './event-publisher.port';
