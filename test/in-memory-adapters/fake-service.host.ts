import type {
  ArtifactRemoval,
  ServiceHostMode,
  ServiceHostPort,
  TerminationSignal,
} from '../../src/application/ports/output/service-host.port';
import type { DaemonHandle } from '../../src/domain/value-objects/daemon-handle.vo';
import type { FakeAria2Daemon } from './fake-aria2.daemon';

export const FAKE_PID = 4242;

/**
 * Fake Service Host
 * Runs a FakeAria2Daemon instead of a process: launch brings its RPC
 * online, signals and RPC shutdown take it down.
 */
export class FakeServiceHost implements ServiceHostPort {
  readonly mode: ServiceHostMode = 'subprocess';
  installed = false;
  alive = false;
  missing: string[] = [];
  launchError: Error | null = null;
  /** Process comes up but its RPC never answers. */
  unresponsive = false;
  readonly ignoredSignals: Set<TerminationSignal> = new Set();
  ignoreRpcShutdown = false;
  readonly signals: TerminationSignal[] = [];
  readonly removals: ArtifactRemoval[] = [];
  launchCount = 0;

  constructor(private readonly daemon: FakeAria2Daemon) {
    this.daemon.online = false;
    this.daemon.onShutdown = () => {
      if (!this.ignoreRpcShutdown) {
        this.alive = false;
      }
    };
  }

  async missingArtifacts(_handle: DaemonHandle): Promise<string[]> {
    return [...this.missing];
  }

  async isInstalled(_handle: DaemonHandle): Promise<boolean> {
    return this.installed;
  }

  async install(_handle: DaemonHandle): Promise<void> {
    this.installed = true;
  }

  async uninstall(_handle: DaemonHandle, removal: ArtifactRemoval): Promise<void> {
    this.removals.push(removal);
    this.installed = false;
  }

  async launch(_handle: DaemonHandle): Promise<number | undefined> {
    this.launchCount++;
    if (this.launchError) {
      throw this.launchError;
    }
    this.alive = true;
    this.daemon.online = !this.unresponsive;
    return FAKE_PID;
  }

  async terminate(_handle: DaemonHandle, signal: TerminationSignal): Promise<void> {
    this.signals.push(signal);
    if (this.ignoredSignals.has(signal)) {
      return;
    }
    this.alive = false;
    this.daemon.online = false;
  }

  async isAlive(_handle: DaemonHandle): Promise<boolean> {
    return this.alive;
  }

  async getPid(_handle: DaemonHandle): Promise<number | undefined> {
    return this.alive ? FAKE_PID : undefined;
  }

  // Test helper methods

  /** Put the host in the state a previous process left behind. */
  adopt(state: { installed: boolean; alive: boolean }): void {
    this.installed = state.installed;
    this.alive = state.alive;
    this.daemon.online = state.alive;
  }
}
