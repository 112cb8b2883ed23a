/**
 * Daemon Log Port (Driven Port)
 * The daemon's own log file.
 */
export interface DaemonLogPort {
  /** Last `lines` lines, oldest first. Empty when the file does not exist. */
  tail(path: string, lines: number): Promise<string[]>;
  truncate(path: string): Promise<void>;
}
