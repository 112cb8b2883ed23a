import { Inject, Injectable } from '@nestjs/common';
import { type CommandResult, failed, succeeded } from '../ports/input/command-result.port';
import type { GetGlobalStatsPort } from '../ports/input/get-global-stats.port';
import type { DaemonRpcPort, GlobalStat } from '../ports/output/daemon-rpc.port';
import { DAEMON_RPC_PORT } from '../ports/injection-tokens';
import { describeError, toErrorView } from '../../domain/errors/relay.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

@Injectable()
export class GetGlobalStatsUseCase implements GetGlobalStatsPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(DAEMON_RPC_PORT) private readonly rpc: DaemonRpcPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(GetGlobalStatsUseCase.name);
  }

  async execute(): Promise<CommandResult<GlobalStat>> {
    try {
      return succeeded(await this.rpc.getGlobalStat());
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Failed to read global stats');
      return failed(toErrorView(error));
    }
  }
}
