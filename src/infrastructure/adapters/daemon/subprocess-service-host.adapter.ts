import { spawn } from 'child_process';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import type { TerminationSignal } from '../../../application/ports/output/service-host.port';
import type { DaemonHandle } from '../../../domain/value-objects/daemon-handle.vo';
import { LifecycleError, describeError } from '../../../domain/errors/relay.errors';
import { isErrnoException, writeJsonAtomic } from '../../../shared/fs/json-file';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { ServiceHostBase, removeIfPresent } from './service-host.base';

export interface SubprocessHostOptions {
  /** Directory holding the definition marker and the pid file. */
  stateDir: string;
}

/**
 * Signal 0 probes for existence without touching the process. EPERM means it
 * exists but belongs to someone else.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

/**
 * Runs the daemon as a detached child process tracked by a pid file. For
 * hosts without a user service manager.
 */
export class SubprocessServiceHostAdapter extends ServiceHostBase {
  readonly mode = 'subprocess' as const;

  constructor(
    private readonly options: SubprocessHostOptions,
    logger: PinoLoggerService,
  ) {
    super(logger.forContext(SubprocessServiceHostAdapter.name));
  }

  async isInstalled(handle: DaemonHandle): Promise<boolean> {
    return (await this.readOptional(this.definitionPath(handle))) !== null;
  }

  async install(handle: DaemonHandle): Promise<void> {
    await writeJsonAtomic(this.definitionPath(handle), {
      serviceName: handle.serviceName,
      command: [handle.binaryPath, `--conf-path=${handle.configPath}`],
      installedAt: new Date().toISOString(),
    });
    this.logger.info({ serviceName: handle.serviceName }, 'Service definition written');
  }

  async launch(handle: DaemonHandle): Promise<number | undefined> {
    const child = spawn(handle.binaryPath, [`--conf-path=${handle.configPath}`], {
      detached: true,
      stdio: 'ignore',
    });

    const pid = await new Promise<number>((resolve, reject) => {
      child.once('error', (error) => {
        reject(
          new LifecycleError('HOST_FAILURE', `Failed to launch daemon: ${describeError(error)}`, {
            binaryPath: handle.binaryPath,
          }),
        );
      });
      child.once('spawn', () => {
        if (child.pid === undefined) {
          reject(new LifecycleError('HOST_FAILURE', 'Daemon launched without a pid'));
          return;
        }
        resolve(child.pid);
      });
    });

    child.unref();
    await mkdir(this.options.stateDir, { recursive: true });
    await writeFile(this.pidPath(handle), pid.toString(), 'utf-8');

    this.logger.info({ pid, serviceName: handle.serviceName }, 'Daemon process launched');
    return pid;
  }

  async terminate(handle: DaemonHandle, signal: TerminationSignal): Promise<void> {
    const pid = await this.readPid(handle);
    if (pid === undefined) {
      return;
    }

    try {
      process.kill(pid, signal);
      this.logger.debug({ pid, signal }, 'Signal sent to daemon');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ESRCH') {
        await removeIfPresent(this.pidPath(handle));
        return;
      }
      throw new LifecycleError('HOST_FAILURE', `Failed to signal daemon: ${describeError(error)}`, {
        pid,
        signal,
      });
    }
  }

  async isAlive(handle: DaemonHandle): Promise<boolean> {
    return (await this.getPid(handle)) !== undefined;
  }

  async getPid(handle: DaemonHandle): Promise<number | undefined> {
    const pid = await this.readPid(handle);
    if (pid === undefined || !isProcessRunning(pid)) {
      return undefined;
    }
    return pid;
  }

  protected async removeDefinition(handle: DaemonHandle): Promise<void> {
    await removeIfPresent(this.definitionPath(handle));
    await removeIfPresent(this.pidPath(handle));
  }

  private async readPid(handle: DaemonHandle): Promise<number | undefined> {
    const content = await this.readOptional(this.pidPath(handle));
    if (content === null) {
      return undefined;
    }
    const pid = Number.parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : undefined;
  }

  private async readOptional(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private definitionPath(handle: DaemonHandle): string {
    return join(this.options.stateDir, `${handle.serviceName}.service.json`);
  }

  private pidPath(handle: DaemonHandle): string {
    return join(this.options.stateDir, `${handle.serviceName}.pid`);
  }
}
