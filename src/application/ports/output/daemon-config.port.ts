/**
 * Settings read from the daemon's own configuration file.
 */
export interface DaemonConfigSettings {
  rpcPort?: number;
  rpcSecret?: string;
  downloadDir?: string;
}

/**
 * Daemon Config Port (Driven Port)
 */
export interface DaemonConfigPort {
  /** Returns an empty object when the file does not exist. */
  read(configPath: string): Promise<DaemonConfigSettings>;
  writeSecret(configPath: string, secret: string): Promise<void>;
}
