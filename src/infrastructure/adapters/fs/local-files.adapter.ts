import { readdir, rmdir, unlink } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import type { DeletionReport, LocalFilesPort } from '../../../application/ports/output/local-files.port';
import { isErrnoException } from '../../../shared/fs/json-file';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

export function isInside(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel.length > 0 && !rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel);
}

/**
 * Local Files Adapter
 * Implements LocalFilesPort on the local file system.
 */
export class LocalFilesAdapter implements LocalFilesPort {
  private readonly logger: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(LocalFilesAdapter.name);
  }

  async deleteFiles(paths: readonly string[], root: string): Promise<DeletionReport> {
    const rootDir = resolve(root);
    const report: DeletionReport = { deletedFiles: [], removedDirectories: [], skipped: [] };
    const touchedDirs = new Set<string>();

    for (const path of paths) {
      const target = resolve(rootDir, path);
      if (!isInside(rootDir, target)) {
        report.skipped.push(path);
        continue;
      }

      try {
        await unlink(target);
        report.deletedFiles.push(target);
        touchedDirs.add(dirname(target));
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          this.logger.debug({ path: target }, 'File already gone');
          touchedDirs.add(dirname(target));
          continue;
        }
        throw error;
      }
    }

    // Deepest first, so a parent is considered only after its children.
    const ordered = Array.from(touchedDirs).sort((a, b) => b.length - a.length);
    for (const dir of ordered) {
      await this.pruneUpwards(dir, rootDir, report);
    }
    return report;
  }

  private async pruneUpwards(start: string, rootDir: string, report: DeletionReport): Promise<void> {
    let dir = start;
    while (isInside(rootDir, dir)) {
      if (report.removedDirectories.includes(dir)) {
        dir = dirname(dir);
        continue;
      }
      let entries: string[];
      try {
        entries = await readdir(dir);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          dir = dirname(dir);
          continue;
        }
        throw error;
      }
      if (entries.length > 0) {
        return;
      }
      await rmdir(dir);
      report.removedDirectories.push(dir);
      dir = dirname(dir);
    }
  }
}
