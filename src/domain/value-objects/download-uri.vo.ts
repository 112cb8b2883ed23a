import { ValidationError } from '../errors/relay.errors';

/**
 * Download URI Value Object
 * A link the daemon can fetch: plain transfer protocols or a magnet link.
 */
export type DownloadUriScheme = 'http' | 'https' | 'ftp' | 'sftp' | 'magnet';

export class DownloadUriVO {
  private static readonly VALID_URI_PATTERN = /^(https?|s?ftp):\/\/[^\s]+$/i;
  private static readonly MAGNET_PATTERN = /^magnet:\?[^\s]*xt=urn:[a-z0-9]+:[a-z0-9]+/i;
  private static readonly MAX_LENGTH = 8192;

  private constructor(
    private readonly _value: string,
    private readonly _scheme: DownloadUriScheme,
  ) {}

  static create(raw: string): DownloadUriVO {
    const value = raw.trim();

    if (value.length === 0) {
      throw new ValidationError('Download URI cannot be empty');
    }
    if (value.length > DownloadUriVO.MAX_LENGTH) {
      throw new ValidationError(
        `Download URI exceeds ${DownloadUriVO.MAX_LENGTH} characters`,
      );
    }
    if (DownloadUriVO.MAGNET_PATTERN.test(value)) {
      return new DownloadUriVO(value, 'magnet');
    }

    const match = DownloadUriVO.VALID_URI_PATTERN.exec(value);
    if (!match) {
      throw new ValidationError('Unsupported download URI, expected http, https, ftp, sftp or magnet', {
        uri: value.slice(0, 80),
      });
    }

    return new DownloadUriVO(value, toScheme(match[1]));
  }

  get value(): string {
    return this._value;
  }

  get scheme(): DownloadUriScheme {
    return this._scheme;
  }

  isMagnet(): boolean {
    return this._scheme === 'magnet';
  }

  toString(): string {
    return this._value;
  }
}

function toScheme(raw: string | undefined): DownloadUriScheme {
  switch (raw?.toLowerCase()) {
    case 'https':
      return 'https';
    case 'ftp':
      return 'ftp';
    case 'sftp':
      return 'sftp';
    default:
      return 'http';
  }
}
