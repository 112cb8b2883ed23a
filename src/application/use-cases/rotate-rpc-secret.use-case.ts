import { Inject, Injectable } from '@nestjs/common';
import { randomInt } from 'crypto';
import { type CommandResult, failed, succeeded } from '../ports/input/command-result.port';
import type {
  RotateRpcSecretCommand,
  RotateRpcSecretPort,
  RotateRpcSecretResult,
} from '../ports/input/rotate-rpc-secret.port';
import type { DaemonConfigPort } from '../ports/output/daemon-config.port';
import type { DaemonRpcPort } from '../ports/output/daemon-rpc.port';
import { DAEMON_CONFIG_PORT, DAEMON_RPC_PORT } from '../ports/injection-tokens';
import { ServiceState } from '../../domain/value-objects/service-state.vo';
import { ValidationError, describeError, toErrorView } from '../../domain/errors/relay.errors';
import { ServiceManager } from '../../service/service-manager.service';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

const SECRET_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
export const GENERATED_SECRET_LENGTH = 20;

export function generateRpcSecret(length = GENERATED_SECRET_LENGTH): string {
  let secret = '';
  for (let i = 0; i < length; i++) {
    secret += SECRET_ALPHABET[randomInt(SECRET_ALPHABET.length)];
  }
  return secret;
}

/**
 * Rotate RPC Secret Use Case
 *
 * A running daemon is stopped with the old secret, the new one is written to
 * aria2.conf and handed to the client, and the daemon is started again.
 */
@Injectable()
export class RotateRpcSecretUseCase implements RotateRpcSecretPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(DAEMON_CONFIG_PORT) private readonly daemonConfig: DaemonConfigPort,
    @Inject(DAEMON_RPC_PORT) private readonly rpc: DaemonRpcPort,
    private readonly serviceManager: ServiceManager,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(RotateRpcSecretUseCase.name);
  }

  async execute(
    command: RotateRpcSecretCommand = {},
  ): Promise<CommandResult<RotateRpcSecretResult>> {
    try {
      const secret = command.secret ?? generateRpcSecret();
      if (!/^[A-Za-z0-9_-]{8,}$/.test(secret)) {
        throw new ValidationError(
          'RPC secret must be at least 8 letters, digits, dashes or underscores',
        );
      }

      const wasRunning = this.serviceManager.getState() === ServiceState.RUNNING;
      if (wasRunning) {
        await this.serviceManager.stop();
      }

      const { configPath } = this.serviceManager.getHandle();
      await this.daemonConfig.writeSecret(configPath, secret);
      this.rpc.setSecret(secret);

      if (wasRunning) {
        await this.serviceManager.start();
      }

      this.logger.info({ restarted: wasRunning }, 'RPC secret rotated');
      return succeeded({ secret, restarted: wasRunning });
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Failed to rotate RPC secret');
      return failed(toErrorView(error));
    }
  }
}
