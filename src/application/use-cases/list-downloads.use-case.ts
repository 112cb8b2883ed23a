import { Inject, Injectable } from '@nestjs/common';
import { type CommandResult, failed, succeeded } from '../ports/input/command-result.port';
import type {
  ListDownloadsCommand,
  ListDownloadsPort,
  ListDownloadsResult,
} from '../ports/input/list-downloads.port';
import type { DaemonRpcPort } from '../ports/output/daemon-rpc.port';
import { DAEMON_RPC_PORT } from '../ports/injection-tokens';
import { describeError, toErrorView } from '../../domain/errors/relay.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

const DEFAULT_LIMIT = 100;

/**
 * List Downloads Use Case
 * Active, waiting and stopped tasks in one snapshot.
 */
@Injectable()
export class ListDownloadsUseCase implements ListDownloadsPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(DAEMON_RPC_PORT) private readonly rpc: DaemonRpcPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(ListDownloadsUseCase.name);
  }

  async execute(command: ListDownloadsCommand = {}): Promise<CommandResult<ListDownloadsResult>> {
    const limit = command.limit ?? DEFAULT_LIMIT;
    try {
      const [active, waiting, stopped] = await Promise.all([
        this.rpc.tellActive(),
        this.rpc.tellWaiting(0, limit),
        // Newest first; the daemon keeps stopped results oldest first.
        this.rpc.tellStopped(-1, limit),
      ]);
      return succeeded({ active, waiting, stopped });
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Failed to list downloads');
      return failed(toErrorView(error));
    }
  }
}
