import type { CommandResult } from './command-result.port';

export type DownloadAction = 'pause' | 'resume' | 'remove';

export interface ManageDownloadCommand {
  taskId: string;
  action: DownloadAction;
  /** `remove` only: also delete the task's files inside the download directory. */
  deleteFiles?: boolean;
}

export interface ManageDownloadResult {
  taskId: string;
  action: DownloadAction;
  filesDeleted: boolean;
}

/**
 * Manage Download Port (Driving Port / Use Case Interface)
 */
export interface ManageDownloadPort {
  execute(command: ManageDownloadCommand): Promise<CommandResult<ManageDownloadResult>>;
}
