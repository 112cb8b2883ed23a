import { Injectable } from '@nestjs/common';
import { type CommandResult, failed, succeeded } from '../ports/input/command-result.port';
import type {
  ControlServiceCommand,
  ControlServicePort,
  ControlServiceResult,
} from '../ports/input/control-service.port';
import { describeError, toErrorView } from '../../domain/errors/relay.errors';
import { ServiceManager } from '../../service/service-manager.service';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Control Service Use Case
 * Daemon lifecycle commands; every failure comes back as an error view.
 */
@Injectable()
export class ControlServiceUseCase implements ControlServicePort {
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly serviceManager: ServiceManager,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(ControlServiceUseCase.name);
  }

  async execute(command: ControlServiceCommand): Promise<CommandResult<ControlServiceResult>> {
    try {
      return succeeded(await this.run(command));
    } catch (error) {
      this.logger.warn(
        { action: command.action, error: describeError(error) },
        'Service command failed',
      );
      return failed(toErrorView(error));
    }
  }

  private async run(command: ControlServiceCommand): Promise<ControlServiceResult> {
    switch (command.action) {
      case 'install':
        return { action: 'install', state: await this.serviceManager.install() };
      case 'start':
        return { action: 'start', state: await this.serviceManager.start() };
      case 'stop':
        return { action: 'stop', state: await this.serviceManager.stop() };
      case 'restart':
        return { action: 'restart', state: await this.serviceManager.restart() };
      case 'uninstall':
        return { action: 'uninstall', state: await this.serviceManager.uninstall(command.removal) };
      case 'status':
        return { action: 'status', status: await this.serviceManager.status() };
      case 'logs':
        return { action: 'logs', lines: await this.serviceManager.logs(command.lines) };
      case 'clear_logs':
        await this.serviceManager.clearLogs();
        return { action: 'clear_logs' };
    }
  }
}
