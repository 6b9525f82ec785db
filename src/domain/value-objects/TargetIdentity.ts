import { ValidationError } from '../../shared/errors/AppError';
import { DownloadRecord } from '../entities/DownloadRecord';

/**
 * Value object identifying what is being downloaded: the source URL, the
 * exact headers sent with every request and, once resolved, the checksum of
 * the media playlist bytes.
 */
export class TargetIdentity {
  private readonly _url: string;
  private readonly _headers: Readonly<Record<string, string>>;
  private readonly _checksum?: string;

  constructor(url: string, headers: Record<string, string> = {}, checksum?: string) {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ValidationError(`Invalid URL: ${url}`, 'url');
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ValidationError(`Unsupported protocol: ${parsed.protocol}`, 'url');
    }

    this._url = parsed.toString();
    this._headers = Object.freeze({ ...headers });
    this._checksum = checksum;
  }

  get url(): string {
    return this._url;
  }

  get headers(): Readonly<Record<string, string>> {
    return this._headers;
  }

  get checksum(): string | undefined {
    return this._checksum;
  }

  get hostname(): string {
    return new URL(this._url).hostname;
  }

  withChecksum(checksum: string): TargetIdentity {
    return new TargetIdentity(this._url, { ...this._headers }, checksum);
  }

  /**
   * A record describes this target only if its checksum matches
   */
  matches(record: DownloadRecord): boolean {
    return this._checksum !== undefined && record.m3u8_sum === this._checksum;
  }

  toRecord(): DownloadRecord {
    if (this._checksum === undefined) {
      throw new ValidationError('Target has no checksum yet', 'checksum');
    }
    return {
      target: this._url,
      headers: { ...this._headers },
      m3u8_sum: this._checksum
    };
  }

  toString(): string {
    return this._url;
  }
}
