import { access, unlink } from 'fs/promises';
import { constants } from 'fs';
import type {
  ArtifactRemoval,
  ServiceHostMode,
  ServiceHostPort,
  TerminationSignal,
} from '../../../application/ports/output/service-host.port';
import type { DaemonHandle } from '../../../domain/value-objects/daemon-handle.vo';
import { isErrnoException } from '../../../shared/fs/json-file';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Artifact bookkeeping shared by every host. Subclasses own the service
 * definition and the process itself.
 */
export abstract class ServiceHostBase implements ServiceHostPort {
  abstract readonly mode: ServiceHostMode;

  constructor(protected readonly logger: PinoLoggerService) {}

  async missingArtifacts(handle: DaemonHandle): Promise<string[]> {
    const missing: string[] = [];
    if (!(await isAccessible(handle.binaryPath, constants.X_OK))) {
      missing.push(handle.binaryPath);
    }
    if (!(await isAccessible(handle.configPath, constants.R_OK))) {
      missing.push(handle.configPath);
    }
    return missing;
  }

  async uninstall(handle: DaemonHandle, removal: ArtifactRemoval): Promise<void> {
    await this.removeDefinition(handle);

    if (removal.removeConfig) {
      await removeIfPresent(handle.configPath);
    }
    if (removal.removeBinary) {
      await removeIfPresent(handle.binaryPath);
    }
    this.logger.info(
      { serviceName: handle.serviceName, ...removal },
      'Service definition removed',
    );
  }

  abstract isInstalled(handle: DaemonHandle): Promise<boolean>;
  abstract install(handle: DaemonHandle): Promise<void>;
  abstract launch(handle: DaemonHandle): Promise<number | undefined>;
  abstract terminate(handle: DaemonHandle, signal: TerminationSignal): Promise<void>;
  abstract isAlive(handle: DaemonHandle): Promise<boolean>;
  abstract getPid(handle: DaemonHandle): Promise<number | undefined>;

  protected abstract removeDefinition(handle: DaemonHandle): Promise<void>;
}

async function isAccessible(path: string, mode: number): Promise<boolean> {
  try {
    await access(path, mode);
    return true;
  } catch {
    return false;
  }
}

export async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw error;
    }
  }
}
