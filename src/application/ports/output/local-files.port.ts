export interface DeletionReport {
  deletedFiles: string[];
  removedDirectories: string[];
  skipped: string[];
}

/**
 * Local Files Port (Driven Port)
 * Removes downloaded files, confined to one root directory.
 */
export interface LocalFilesPort {
  /**
   * Paths outside `root` are skipped. Directories emptied by the removal are
   * pruned up to, but not including, `root`.
   */
  deleteFiles(paths: readonly string[], root: string): Promise<DeletionReport>;
}
