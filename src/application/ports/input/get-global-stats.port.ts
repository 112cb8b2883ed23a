import type { GlobalStat } from '../output/daemon-rpc.port';
import type { CommandResult } from './command-result.port';

/**
 * Get Global Stats Port (Driving Port / Use Case Interface)
 */
export interface GetGlobalStatsPort {
  execute(): Promise<CommandResult<GlobalStat>>;
}
