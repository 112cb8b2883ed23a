import { Injectable } from '@nestjs/common';
import { readFile, writeFile } from 'fs/promises';
import type {
  DaemonConfigPort,
  DaemonConfigSettings,
} from '../../../application/ports/output/daemon-config.port';
import { isErrnoException } from '../../../shared/fs/json-file';
import { RelayError } from '../../../domain/errors/relay.errors';

/**
 * `key=value` lines of aria2.conf. Comments start with `#`; the last
 * occurrence of a key wins, as it does for the daemon.
 */
export function parseAria2Conf(content: string): Map<string, string> {
  const settings = new Map<string, string>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) {
      continue;
    }
    const separator = trimmed.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    settings.set(trimmed.slice(0, separator).trim(), trimmed.slice(separator + 1).trim());
  }
  return settings;
}

/**
 * Rewrite every `key=` line in place, keeping its indentation, or append the
 * setting when the key is absent.
 */
export function replaceConfSetting(content: string, key: string, value: string): string {
  const prefix = `${key}=`;
  let found = false;

  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const updated = lines.map((line) => {
    const stripped = line.trimStart();
    if (!stripped.startsWith(prefix)) {
      return line;
    }
    found = true;
    return `${line.slice(0, line.length - stripped.length)}${prefix}${value}`;
  });

  if (!found) {
    updated.push(`${prefix}${value}`);
  }
  return `${updated.join('\n')}\n`;
}

@Injectable()
export class Aria2ConfFileAdapter implements DaemonConfigPort {
  async read(configPath: string): Promise<DaemonConfigSettings> {
    const content = await readOptional(configPath);
    if (content === null) {
      return {};
    }

    const settings = parseAria2Conf(content);
    const port = Number(settings.get('rpc-listen-port'));

    return {
      rpcPort: Number.isInteger(port) && port >= 1 && port <= 65535 ? port : undefined,
      rpcSecret: settings.get('rpc-secret') || undefined,
      downloadDir: settings.get('dir') || undefined,
    };
  }

  async writeSecret(configPath: string, secret: string): Promise<void> {
    if (/[\r\n]/.test(secret)) {
      throw new RelayError('RPC secret must be a single line', 'INVALID_INPUT');
    }

    const content = await readOptional(configPath);
    if (content === null) {
      throw new RelayError(`Daemon config ${configPath} does not exist`, 'CONFIG_MISSING', {
        configPath,
      });
    }

    await writeFile(configPath, replaceConfSetting(content, 'rpc-secret', secret), 'utf-8');
  }
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
