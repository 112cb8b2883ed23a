import type { DaemonHandle } from '../../../domain/value-objects/daemon-handle.vo';

export type ServiceHostMode = 'systemd' | 'subprocess';

export type TerminationSignal = 'SIGTERM' | 'SIGKILL';

export interface ArtifactRemoval {
  removeConfig: boolean;
  removeBinary: boolean;
}

/**
 * Service Host Port (Driven Port)
 * The operating system's way of running the daemon in the background.
 */
export interface ServiceHostPort {
  readonly mode: ServiceHostMode;

  /** Paths of the binary/config that are missing on disk. */
  missingArtifacts(handle: DaemonHandle): Promise<string[]>;

  isInstalled(handle: DaemonHandle): Promise<boolean>;
  install(handle: DaemonHandle): Promise<void>;
  uninstall(handle: DaemonHandle, removal: ArtifactRemoval): Promise<void>;

  /** Starts the daemon and resolves with its pid when the host knows it. */
  launch(handle: DaemonHandle): Promise<number | undefined>;
  terminate(handle: DaemonHandle, signal: TerminationSignal): Promise<void>;

  isAlive(handle: DaemonHandle): Promise<boolean>;
  getPid(handle: DaemonHandle): Promise<number | undefined>;
}
