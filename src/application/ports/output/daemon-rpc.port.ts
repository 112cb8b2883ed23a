import type { DownloadTask } from '../../../domain/entities/download-task.entity';

export interface RpcCallOptions {
  /** Abandons the call; the pending entry is dropped and the call rejects. */
  signal?: AbortSignal;
  /** Overrides the client's default bounded wait. */
  timeoutMs?: number;
}

export interface GlobalStat {
  downloadSpeed: number;
  uploadSpeed: number;
  numActive: number;
  numWaiting: number;
  numStopped: number;
  numStoppedTotal: number;
}

export interface DaemonVersion {
  version: string;
  enabledFeatures: string[];
}

/** Per-download options passed through to the daemon, e.g. `{ dir: '/data' }`. */
export type DownloadOptions = Record<string, string>;

/**
 * Daemon RPC Port (Driven Port)
 * Typed procedures of the download daemon. Every call is bounded by a
 * timeout and never retried here.
 */
export interface DaemonRpcPort {
  call(method: string, params?: unknown[], options?: RpcCallOptions): Promise<unknown>;

  addUri(uris: string[], downloadOptions?: DownloadOptions, options?: RpcCallOptions): Promise<string>;
  addTorrent(
    torrent: Buffer,
    downloadOptions?: DownloadOptions,
    options?: RpcCallOptions,
  ): Promise<string>;

  tellStatus(gid: string, options?: RpcCallOptions): Promise<DownloadTask>;
  tellActive(options?: RpcCallOptions): Promise<DownloadTask[]>;
  tellWaiting(offset: number, num: number, options?: RpcCallOptions): Promise<DownloadTask[]>;
  tellStopped(offset: number, num: number, options?: RpcCallOptions): Promise<DownloadTask[]>;

  pause(gid: string, options?: RpcCallOptions): Promise<string>;
  unpause(gid: string, options?: RpcCallOptions): Promise<string>;
  remove(gid: string, options?: RpcCallOptions): Promise<string>;
  forceRemove(gid: string, options?: RpcCallOptions): Promise<string>;
  removeDownloadResult(gid: string, options?: RpcCallOptions): Promise<void>;

  getGlobalStat(options?: RpcCallOptions): Promise<GlobalStat>;
  getVersion(options?: RpcCallOptions): Promise<DaemonVersion>;
  shutdown(options?: RpcCallOptions): Promise<void>;
  forceShutdown(options?: RpcCallOptions): Promise<void>;

  /** Token used for subsequent calls; an empty string disables it. */
  setSecret(secret: string): void;
}
