import * as path from 'path';
import { TargetIdentity } from '../../domain/value-objects/TargetIdentity';
import { AppError, ValidationError } from '../../shared/errors/AppError';
import { DEFAULT_MAX_REDIRECTS } from '../services/PlaylistResolver';
import { DEFAULT_MAX_CONCURRENCY } from '../services/SegmentDownloader';

export const INDEX_FILE_NAME = 'index.m3u8';

// RFC 7230 token
const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const HEADER_VALUE_FORBIDDEN = /[\r\n\0]/;

/**
 * Everything a download needs, already validated
 */
export interface DownloadRequest {
  target: TargetIdentity;
  saveDir: string;
  indexName: string;
  maxConcurrency: number;
  maxRedirects: number;
}

export type BuildResult =
  | { ok: true; request: DownloadRequest }
  | { ok: false; errors: ValidationError[] };

/**
 * Collects download settings. Each setter validates its input on the spot;
 * `build()` reports every problem found, or the finished request.
 */
export class DownloadRequestBuilder {
  private readonly errors: ValidationError[] = [];
  private readonly headers: Record<string, string> = {};
  private _saveDir?: string;
  private _indexName = INDEX_FILE_NAME;
  private _maxConcurrency = DEFAULT_MAX_CONCURRENCY;
  private _maxRedirects = DEFAULT_MAX_REDIRECTS;

  constructor(private readonly url: string) {}

  header(name: string, value: string): this {
    const trimmedName = name.trim();
    if (!HEADER_NAME.test(trimmedName)) {
      this.errors.push(new ValidationError(`Invalid header name: '${name}'`, 'headers'));
      return this;
    }
    if (HEADER_VALUE_FORBIDDEN.test(value)) {
      this.errors.push(new ValidationError(`Invalid value for header '${trimmedName}'`, 'headers'));
      return this;
    }
    this.headers[trimmedName] = value.trim();
    return this;
  }

  headersFrom(headers: Record<string, string>): this {
    Object.entries(headers).forEach(([name, value]) => this.header(name, value));
    return this;
  }

  saveDir(dir: string): this {
    if (dir.trim() === '') {
      this.errors.push(new ValidationError('Save directory cannot be empty', 'saveDir'));
      return this;
    }
    this._saveDir = path.resolve(dir);
    return this;
  }

  indexName(name: string): this {
    if (name.trim() === '' || /[/\\]/.test(name) || name === '.' || name === '..') {
      this.errors.push(new ValidationError(`Invalid index file name: '${name}'`, 'indexName'));
      return this;
    }
    this._indexName = name;
    return this;
  }

  maxConcurrency(max: number): this {
    if (!Number.isInteger(max) || max < 1) {
      this.errors.push(new ValidationError(`Concurrency must be a positive integer, got ${max}`, 'maxConcurrency'));
      return this;
    }
    this._maxConcurrency = max;
    return this;
  }

  maxRedirects(max: number): this {
    if (!Number.isInteger(max) || max < 0) {
      this.errors.push(new ValidationError(`Redirect limit must be a non-negative integer, got ${max}`, 'maxRedirects'));
      return this;
    }
    this._maxRedirects = max;
    return this;
  }

  build(): BuildResult {
    const errors = [...this.errors];

    let target: TargetIdentity | undefined;
    try {
      target = new TargetIdentity(this.url, this.headers);
    } catch (error) {
      errors.push(
        error instanceof ValidationError
          ? error
          : new ValidationError(error instanceof AppError ? error.message : `Invalid URL: ${this.url}`, 'url')
      );
    }

    if (this._saveDir === undefined && !errors.some(error => error.field === 'saveDir')) {
      errors.push(new ValidationError('Save directory is required', 'saveDir'));
    }

    if (errors.length > 0 || target === undefined || this._saveDir === undefined) {
      return { ok: false, errors };
    }

    return {
      ok: true,
      request: {
        target,
        saveDir: this._saveDir,
        indexName: this._indexName,
        maxConcurrency: this._maxConcurrency,
        maxRedirects: this._maxRedirects
      }
    };
  }
}
