import { Injectable } from '@nestjs/common';
import { mkdir, readFile, truncate, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { DaemonLogPort } from '../../../application/ports/output/daemon-log.port';
import { isErrnoException } from '../../../shared/fs/json-file';

@Injectable()
export class DaemonLogFileAdapter implements DaemonLogPort {
  async tail(path: string, lines: number): Promise<string[]> {
    if (lines <= 0) {
      return [];
    }

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const all = content.split(/\r?\n/);
    if (all[all.length - 1] === '') {
      all.pop();
    }
    return all.slice(-lines);
  }

  async truncate(path: string): Promise<void> {
    try {
      await truncate(path, 0);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, '', 'utf-8');
    }
  }
}
