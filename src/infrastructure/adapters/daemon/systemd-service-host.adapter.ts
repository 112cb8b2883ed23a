import { execFile } from 'child_process';
import { access, mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { promisify } from 'util';
import type { TerminationSignal } from '../../../application/ports/output/service-host.port';
import type { DaemonHandle } from '../../../domain/value-objects/daemon-handle.vo';
import { LifecycleError, describeError } from '../../../domain/errors/relay.errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { ServiceHostBase, removeIfPresent } from './service-host.base';

const execFileAsync = promisify(execFile);

export interface SystemdHostOptions {
  /** Where user units live, usually ~/.config/systemd/user. */
  unitDir: string;
}

export function renderUnit(handle: DaemonHandle): string {
  return [
    '[Unit]',
    'Description=aria2 download daemon',
    'After=network.target',
    '',
    '[Service]',
    'Type=simple',
    `ExecStart=${handle.binaryPath} --conf-path=${handle.configPath}`,
    'ExecReload=/bin/kill -HUP $MAINPID',
    'Restart=on-failure',
    'RestartSec=5',
    'TimeoutStopSec=10',
    '',
    '[Install]',
    'WantedBy=default.target',
    '',
  ].join('\n');
}

/**
 * Supervises the daemon as a systemd user unit through `systemctl --user`.
 */
export class SystemdServiceHostAdapter extends ServiceHostBase {
  readonly mode = 'systemd' as const;

  constructor(
    private readonly options: SystemdHostOptions,
    logger: PinoLoggerService,
  ) {
    super(logger.forContext(SystemdServiceHostAdapter.name));
  }

  async isInstalled(handle: DaemonHandle): Promise<boolean> {
    try {
      await access(this.unitPath(handle));
      return true;
    } catch {
      return false;
    }
  }

  async install(handle: DaemonHandle): Promise<void> {
    await mkdir(this.options.unitDir, { recursive: true });
    await writeFile(this.unitPath(handle), renderUnit(handle), 'utf-8');
    await this.systemctl('daemon-reload');
    this.logger.info({ unit: this.unitPath(handle) }, 'systemd user unit written');
  }

  async launch(handle: DaemonHandle): Promise<number | undefined> {
    await this.systemctl('start', this.unitName(handle));
    return this.getPid(handle);
  }

  async terminate(handle: DaemonHandle, signal: TerminationSignal): Promise<void> {
    if (signal === 'SIGTERM') {
      await this.systemctl('kill', '--signal=SIGTERM', this.unitName(handle));
      return;
    }
    // A killed unit would be restarted by Restart=on-failure; stop does not.
    await this.systemctl('stop', this.unitName(handle));
  }

  async isAlive(handle: DaemonHandle): Promise<boolean> {
    try {
      await execFileAsync('systemctl', ['--user', 'is-active', '--quiet', this.unitName(handle)]);
      return true;
    } catch {
      return false;
    }
  }

  async getPid(handle: DaemonHandle): Promise<number | undefined> {
    const output = await this.systemctl('show', '--property=MainPID', '--value', this.unitName(handle));
    const pid = Number.parseInt(output.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : undefined;
  }

  protected async removeDefinition(handle: DaemonHandle): Promise<void> {
    await removeIfPresent(this.unitPath(handle));
    await this.systemctl('daemon-reload');
  }

  private async systemctl(...args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync('systemctl', ['--user', ...args]);
      return stdout;
    } catch (error) {
      const stderr =
        error instanceof Error && 'stderr' in error && typeof error.stderr === 'string'
          ? error.stderr.trim()
          : '';
      throw new LifecycleError(
        'HOST_FAILURE',
        `systemctl --user ${args.join(' ')} failed: ${stderr || describeError(error)}`,
      );
    }
  }

  private unitName(handle: DaemonHandle): string {
    return `${handle.serviceName}.service`;
  }

  private unitPath(handle: DaemonHandle): string {
    return join(this.options.unitDir, this.unitName(handle));
  }
}
