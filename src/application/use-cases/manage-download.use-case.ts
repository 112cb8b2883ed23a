import { Inject, Injectable } from '@nestjs/common';
import { type CommandResult, failed, succeeded } from '../ports/input/command-result.port';
import type {
  ManageDownloadCommand,
  ManageDownloadPort,
  ManageDownloadResult,
} from '../ports/input/manage-download.port';
import type { DaemonRpcPort } from '../ports/output/daemon-rpc.port';
import type { LocalFilesPort } from '../ports/output/local-files.port';
import { DAEMON_HANDLE, DAEMON_RPC_PORT, LOCAL_FILES_PORT } from '../ports/injection-tokens';
import { DownloadTask } from '../../domain/entities/download-task.entity';
import type { DaemonHandle } from '../../domain/value-objects/daemon-handle.vo';
import {
  RemoteError,
  ValidationError,
  describeError,
  toErrorView,
} from '../../domain/errors/relay.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Manage Download Use Case
 * Pause, resume or remove one task.
 *
 * Removal asks the daemon politely first and forces it when refused, then
 * clears the stopped result so the task leaves the list.
 */
@Injectable()
export class ManageDownloadUseCase implements ManageDownloadPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(DAEMON_RPC_PORT) private readonly rpc: DaemonRpcPort,
    @Inject(LOCAL_FILES_PORT) private readonly localFiles: LocalFilesPort,
    @Inject(DAEMON_HANDLE) private readonly handle: DaemonHandle,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(ManageDownloadUseCase.name);
  }

  async execute(command: ManageDownloadCommand): Promise<CommandResult<ManageDownloadResult>> {
    const { taskId, action } = command;
    try {
      if (taskId.trim().length === 0) {
        throw new ValidationError('Task id is required');
      }

      let filesDeleted = false;
      switch (action) {
        case 'pause':
          await this.rpc.pause(taskId);
          break;
        case 'resume':
          await this.rpc.unpause(taskId);
          break;
        case 'remove':
          filesDeleted = await this.remove(taskId, command.deleteFiles ?? false);
          break;
      }

      this.logger.info({ taskId, action, filesDeleted }, 'Download updated');
      return succeeded({ taskId, action, filesDeleted });
    } catch (error) {
      this.logger.warn({ taskId, action, error: describeError(error) }, 'Download command failed');
      return failed(toErrorView(error));
    }
  }

  private async remove(taskId: string, deleteFiles: boolean): Promise<boolean> {
    const task = await this.rpc.tellStatus(taskId);

    if (!DownloadTask.isTerminal(task) && task.status !== 'removed') {
      try {
        await this.rpc.remove(taskId);
      } catch (error) {
        if (!(error instanceof RemoteError)) {
          throw error;
        }
        await this.rpc.forceRemove(taskId);
      }
    }

    try {
      await this.rpc.removeDownloadResult(taskId);
    } catch (error) {
      // Still shutting down connections; the result disappears with the next purge.
      if (!(error instanceof RemoteError)) {
        throw error;
      }
      this.logger.debug({ taskId, error: error.message }, 'Download result not removable yet');
    }

    if (!deleteFiles) {
      return false;
    }
    const paths = DownloadTask.outputPaths(task);
    const report = await this.localFiles.deleteFiles(paths, this.handle.downloadDir);
    return report.deletedFiles.length > 0;
  }
}
