import { Aria2RpcClient } from '../../../src/infrastructure/adapters/rpc/aria2-rpc.client';
import {
  ServiceManager,
  type ServiceManagerOptions,
} from '../../../src/service/service-manager.service';
import type { DaemonHandle } from '../../../src/domain/value-objects/daemon-handle.vo';
import {
  FakeAria2Daemon,
  FakeServiceHost,
  InMemoryDaemonLogAdapter,
  InMemoryEventPublisherAdapter,
} from '../../in-memory-adapters';
import { createDaemonHandle, createTestLogger } from './mock-factories';

export interface RelayHarness {
  handle: DaemonHandle;
  daemon: FakeAria2Daemon;
  host: FakeServiceHost;
  rpc: Aria2RpcClient;
  daemonLog: InMemoryDaemonLogAdapter;
  events: InMemoryEventPublisherAdapter;
  serviceManager: ServiceManager;
}

export const FAST_SERVICE_OPTIONS: ServiceManagerOptions = {
  startHealthCheckAttempts: 3,
  startHealthCheckIntervalMs: 5,
  stopGracePeriodMs: 50,
  exitPollIntervalMs: 5,
};

/**
 * Real RPC client and service manager over a fake daemon and host.
 */
export function createRelayHarness(
  options: { serviceOptions?: Partial<ServiceManagerOptions>; rpcTimeoutMs?: number } = {},
): RelayHarness {
  const handle = createDaemonHandle();
  const logger = createTestLogger();
  const daemon = new FakeAria2Daemon({ secret: handle.rpc.secret, downloadDir: handle.downloadDir });
  const host = new FakeServiceHost(daemon);
  const rpc = new Aria2RpcClient(daemon, handle, { timeoutMs: options.rpcTimeoutMs ?? 200 }, logger);
  const daemonLog = new InMemoryDaemonLogAdapter();
  const events = new InMemoryEventPublisherAdapter();
  const serviceManager = new ServiceManager(
    handle,
    host,
    rpc,
    daemonLog,
    events,
    { ...FAST_SERVICE_OPTIONS, ...options.serviceOptions },
    logger,
  );
  return { handle, daemon, host, rpc, daemonLog, events, serviceManager };
}
