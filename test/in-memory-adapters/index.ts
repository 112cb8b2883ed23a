// Export all in-memory adapters for easy import
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
export { InMemorySeenTaskStoreAdapter } from './in-memory-seen-task-store.adapter';
export { InMemoryUploadJobRepositoryAdapter } from './in-memory-upload-job-repository.adapter';
export { InMemoryLocalFilesAdapter } from './in-memory-local-files.adapter';
export { InMemoryDaemonLogAdapter } from './in-memory-daemon-log.adapter';
export { ScriptedUploadBackend, type ScriptedStep } from './scripted-upload.backend';
export { ManualRpcTransport } from './manual-rpc.transport';
export { FakeAria2Daemon, type FakeTask, type FakeTaskInput } from './fake-aria2.daemon';
export { FakeServiceHost, FAKE_PID } from './fake-service.host';
