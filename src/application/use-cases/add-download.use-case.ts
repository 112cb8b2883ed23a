import { Inject, Injectable } from '@nestjs/common';
import type {
  AddDownloadCommand,
  AddDownloadPort,
  AddDownloadResult,
} from '../ports/input/add-download.port';
import { type CommandResult, failed, succeeded } from '../ports/input/command-result.port';
import type { DaemonRpcPort } from '../ports/output/daemon-rpc.port';
import { DAEMON_RPC_PORT } from '../ports/injection-tokens';
import { DownloadUriVO } from '../../domain/value-objects/download-uri.vo';
import { ValidationError, describeError, toErrorView } from '../../domain/errors/relay.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Add Download Use Case
 * Hands a URI or a torrent file to the daemon and returns its task id.
 */
@Injectable()
export class AddDownloadUseCase implements AddDownloadPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(DAEMON_RPC_PORT) private readonly rpc: DaemonRpcPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(AddDownloadUseCase.name);
  }

  async execute(command: AddDownloadCommand): Promise<CommandResult<AddDownloadResult>> {
    try {
      let taskId: string;
      if ('uri' in command) {
        const uri = DownloadUriVO.create(command.uri);
        taskId = await this.rpc.addUri([uri.value], command.options);
      } else {
        if (command.torrent.length === 0) {
          throw new ValidationError('Torrent file is empty');
        }
        taskId = await this.rpc.addTorrent(command.torrent, command.options);
      }
      return succeeded({ taskId });
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Failed to add download');
      return failed(toErrorView(error));
    }
  }
}
