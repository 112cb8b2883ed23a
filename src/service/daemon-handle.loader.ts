import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import type { DaemonConfigPort } from '../application/ports/output/daemon-config.port';
import { DAEMON_CONFIG_PORT } from '../application/ports/injection-tokens';
import type { DaemonHandle } from '../domain/value-objects/daemon-handle.vo';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';

/**
 * Builds the process's single DaemonHandle from configuration and the
 * daemon's own aria2.conf.
 *
 * The conf file decides the RPC port (the daemon binds what it reads there).
 * An explicitly configured secret wins over the one in the file.
 */
@Injectable()
export class DaemonHandleLoader {
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    @Inject(DAEMON_CONFIG_PORT) private readonly daemonConfig: DaemonConfigPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(DaemonHandleLoader.name);
  }

  async load(): Promise<DaemonHandle> {
    const aria2 = this.configService.get('aria2', { infer: true });
    const service = this.configService.get('service', { infer: true });
    const fromFile = await this.daemonConfig.read(aria2.configPath);

    const handle: DaemonHandle = {
      binaryPath: aria2.binaryPath,
      configPath: aria2.configPath,
      logPath: aria2.logPath,
      downloadDir: aria2.downloadDir,
      serviceName: service.name,
      rpc: {
        host: aria2.rpcHost,
        port: fromFile.rpcPort ?? aria2.rpcPort,
        secret: aria2.rpcSecret || fromFile.rpcSecret || '',
      },
    };

    this.logger.info(
      {
        configPath: handle.configPath,
        rpcHost: handle.rpc.host,
        rpcPort: handle.rpc.port,
        secretConfigured: handle.rpc.secret.length > 0,
      },
      'Daemon handle resolved',
    );
    return handle;
  }
}
