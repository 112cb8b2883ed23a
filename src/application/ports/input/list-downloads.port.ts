import type { DownloadTask } from '../../../domain/entities/download-task.entity';
import type { CommandResult } from './command-result.port';

export interface ListDownloadsCommand {
  /** Entries requested from the waiting and stopped lists. */
  limit?: number;
}

export interface ListDownloadsResult {
  active: DownloadTask[];
  waiting: DownloadTask[];
  stopped: DownloadTask[];
}

/**
 * List Downloads Port (Driving Port / Use Case Interface)
 */
export interface ListDownloadsPort {
  execute(command?: ListDownloadsCommand): Promise<CommandResult<ListDownloadsResult>>;
}
