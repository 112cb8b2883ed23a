import type { DownloadOptions } from '../output/daemon-rpc.port';
import type { CommandResult } from './command-result.port';

/**
 * Add Download Command
 * Exactly one of `uri` (http, https, ftp, sftp or magnet) and `torrent`.
 */
export type AddDownloadCommand =
  | { uri: string; options?: DownloadOptions }
  | { torrent: Buffer; options?: DownloadOptions };

export interface AddDownloadResult {
  taskId: string;
}

/**
 * Add Download Port (Driving Port / Use Case Interface)
 */
export interface AddDownloadPort {
  execute(command: AddDownloadCommand): Promise<CommandResult<AddDownloadResult>>;
}
