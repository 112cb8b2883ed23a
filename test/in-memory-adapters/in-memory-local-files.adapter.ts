import type {
  DeletionReport,
  LocalFilesPort,
} from '../../src/application/ports/output/local-files.port';

/**
 * In-Memory Local Files Adapter
 * Records deletion requests instead of touching the disk.
 */
export class InMemoryLocalFilesAdapter implements LocalFilesPort {
  readonly calls: Array<{ paths: string[]; root: string }> = [];
  failWith: Error | null = null;

  async deleteFiles(paths: readonly string[], root: string): Promise<DeletionReport> {
    this.calls.push({ paths: [...paths], root });
    if (this.failWith) {
      throw this.failWith;
    }
    return { deletedFiles: [...paths], removedDirectories: [], skipped: [] };
  }
}
