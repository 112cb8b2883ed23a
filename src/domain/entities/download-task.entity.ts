import { basename } from 'path';

/**
 * Download Task - read-only snapshot of one daemon task (gid).
 *
 * Snapshots are produced by the RPC client on every status call and are
 * never mutated; a later poll yields a new snapshot.
 */
export type DownloadTaskStatus =
  | 'waiting'
  | 'active'
  | 'paused'
  | 'error'
  | 'complete'
  | 'removed';

export const TERMINAL_TASK_STATUSES: readonly DownloadTaskStatus[] = ['complete', 'error'];

export interface DownloadTaskFile {
  readonly index: number;
  readonly path: string;
  readonly length: number;
  readonly completedLength: number;
  readonly selected: boolean;
  readonly uris: readonly string[];
}

export interface DownloadTask {
  readonly gid: string;
  readonly status: DownloadTaskStatus;
  readonly totalLength: number;
  readonly completedLength: number;
  readonly downloadSpeed: number;
  readonly uploadSpeed: number;
  readonly dir: string;
  readonly files: readonly DownloadTaskFile[];
  readonly name: string;
  readonly errorCode?: string;
  readonly errorMessage?: string;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace DownloadTask {
  export interface CreateProps {
    gid: string;
    status: DownloadTaskStatus;
    totalLength?: number;
    completedLength?: number;
    downloadSpeed?: number;
    uploadSpeed?: number;
    dir?: string;
    files?: DownloadTaskFile[];
    bittorrentName?: string;
    errorCode?: string;
    errorMessage?: string;
  }

  export function create(props: CreateProps): DownloadTask {
    if (!props.gid || props.gid.trim().length === 0) {
      throw new Error('Task gid is required');
    }

    const files = props.files ?? [];
    const hasError = props.status === 'error';

    return {
      gid: props.gid,
      status: props.status,
      totalLength: props.totalLength ?? 0,
      completedLength: props.completedLength ?? 0,
      downloadSpeed: props.downloadSpeed ?? 0,
      uploadSpeed: props.uploadSpeed ?? 0,
      dir: props.dir ?? '',
      files,
      name: resolveName(props.bittorrentName, files),
      errorCode: hasError ? props.errorCode : undefined,
      errorMessage: hasError ? props.errorMessage : undefined,
    };
  }

  /**
   * Torrent name first, then the first file's basename, then the last
   * segment of its first URI. Metadata-only magnet tasks have none of these.
   */
  export function resolveName(
    bittorrentName: string | undefined,
    files: readonly DownloadTaskFile[],
  ): string {
    if (bittorrentName) {
      return bittorrentName;
    }

    const first = files[0];
    if (!first) {
      return 'unknown';
    }
    if (first.path) {
      return basename(first.path);
    }

    const uri = first.uris[0];
    if (uri) {
      const lastSegment = uri.split('?')[0]?.split('/').filter(Boolean).pop();
      if (lastSegment) {
        return decodeSegment(lastSegment);
      }
    }
    return 'unknown';
  }

  export function isTerminal(task: DownloadTask): boolean {
    return TERMINAL_TASK_STATUSES.includes(task.status);
  }

  export function isComplete(task: DownloadTask): boolean {
    return task.status === 'complete';
  }

  /** Paths written to disk, skipping unselected torrent files and empty entries. */
  export function outputPaths(task: DownloadTask): string[] {
    return task.files
      .filter((file) => file.selected && file.path.length > 0)
      .map((file) => file.path);
  }

  export function progressPercent(task: DownloadTask): number {
    if (task.totalLength <= 0) {
      return 0;
    }
    return Math.min(100, Math.floor((task.completedLength / task.totalLength) * 1000) / 10);
  }

  export function toJSON(task: DownloadTask) {
    return {
      gid: task.gid,
      status: task.status,
      name: task.name,
      totalLength: task.totalLength,
      completedLength: task.completedLength,
      progress: progressPercent(task),
      downloadSpeed: task.downloadSpeed,
      uploadSpeed: task.uploadSpeed,
      dir: task.dir,
      files: outputPaths(task),
      errorCode: task.errorCode,
      errorMessage: task.errorMessage,
    };
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
