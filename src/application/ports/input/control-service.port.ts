import type { ArtifactRemoval } from '../output/service-host.port';
import type { ServiceStatus } from '../../../service/service-manager.service';
import type { ServiceState } from '../../../domain/value-objects/service-state.vo';
import type { CommandResult } from './command-result.port';

export type ControlServiceCommand =
  | { action: 'install' | 'start' | 'stop' | 'restart' | 'status' | 'clear_logs' }
  | { action: 'uninstall'; removal?: ArtifactRemoval }
  | { action: 'logs'; lines?: number };

export type ControlServiceResult =
  | { action: 'install' | 'start' | 'stop' | 'restart' | 'uninstall'; state: ServiceState }
  | { action: 'status'; status: ServiceStatus }
  | { action: 'logs'; lines: string[] }
  | { action: 'clear_logs' };

/**
 * Control Service Port (Driving Port / Use Case Interface)
 * Daemon lifecycle commands.
 */
export interface ControlServicePort {
  execute(command: ControlServiceCommand): Promise<CommandResult<ControlServiceResult>>;
}
