import { basename, isAbsolute, relative, sep } from 'path';

/**
 * Remote path of `file`, relative to the task's download directory and
 * always `/`-separated. Files outside that directory keep only their name.
 */
export function remoteRelativePath(file: string, baseDir: string): string {
  const rel = relative(baseDir, file);
  if (rel.length === 0 || rel.startsWith('..') || isAbsolute(rel)) {
    return basename(file);
  }
  return rel.split(sep).join('/');
}

export function joinRemote(...segments: string[]): string {
  return segments
    .flatMap((segment) => segment.split('/'))
    .filter((segment) => segment.length > 0)
    .join('/');
}

/** 429 and 5xx are worth another attempt; other 4xx are not. */
export function isRetryableStatus(statusCode: number): boolean {
  return statusCode === 408 || statusCode === 429 || statusCode >= 500;
}
