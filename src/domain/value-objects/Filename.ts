import { createHash } from 'crypto';
import { ResolutionError } from '../../shared/errors/AppError';

/**
 * Value object for the local name of a downloaded resource: the last path
 * component of its URI, without query string or fragment. See
 * `assignLocalNames` for URLs that share that component.
 */
export class Filename {
  static readonly TEMP_SUFFIX = '.writing';

  private readonly value: string;

  constructor(filename: string) {
    if (!filename || filename.trim().length === 0) {
      throw new ResolutionError('Filename cannot be empty');
    }
    if (filename === '.' || filename === '..' || /[/\\]/.test(filename)) {
      throw new ResolutionError(`Not a plain file name: ${filename}`, { filename });
    }

    this.value = filename;
  }

  /**
   * Derive the local name from a segment, key or init-section URI.
   * `seg/001.ts?token=x` and `http://cdn/seg/001.ts` both give `001.ts`.
   */
  static fromUri(uri: string): Filename {
    const path = uri.split(/[?#]/, 1)[0];
    const name = path.substring(path.lastIndexOf('/') + 1);
    if (!name) {
      throw new ResolutionError(`URI has no file name: ${uri}`, { uri });
    }
    return new Filename(name);
  }

  /**
   * Get the file name
   */
  toString(): string {
    return this.value;
  }

  /**
   * Name of the sibling file an atomic write goes through
   */
  toTemporary(): string {
    return `${this.value}${Filename.TEMP_SUFFIX}`;
  }

  equals(other: Filename): boolean {
    return this.value === other.value;
  }
}

/**
 * Shorthand used wherever only the string is needed
 */
export function localFileName(uri: string): string {
  return Filename.fromUri(uri).toString();
}

const MAX_QUERY_SUFFIX = 40;

/**
 * Local names for a set of resource URLs. Each URL gets its plain local
 * file name unless another URL in the set shares it; those URLs all get a
 * suffix from their query string, or from a hash of the URL when the query
 * is missing, too long or still ambiguous.
 */
export function assignLocalNames(urls: readonly string[]): Map<string, string> {
  const groups = new Map<string, string[]>();
  for (const url of new Set(urls)) {
    const name = localFileName(url);
    groups.set(name, [...(groups.get(name) ?? []), url]);
  }

  const names = new Map<string, string>();
  for (const [name, members] of groups) {
    if (members.length === 1) {
      names.set(members[0], name);
      continue;
    }
    const byQuery = members.map(url => withSuffix(name, querySuffix(url) ?? hashSuffix(url)));
    const ambiguous = new Set(byQuery).size !== byQuery.length;
    members.forEach((url, index) => {
      names.set(url, ambiguous ? withSuffix(name, hashSuffix(url)) : byQuery[index]);
    });
  }
  return names;
}

function querySuffix(url: string): string | undefined {
  const queryStart = url.indexOf('?');
  if (queryStart < 0) {
    return undefined;
  }
  const query = url.slice(queryStart + 1).split('#', 1)[0];
  const sanitized = query.replace(/[^A-Za-z0-9-]+/g, '_').replace(/^_+|_+$/g, '');
  if (sanitized === '' || sanitized.length > MAX_QUERY_SUFFIX) {
    return undefined;
  }
  return sanitized;
}

function hashSuffix(url: string): string {
  return createHash('md5').update(url).digest('hex').slice(0, 8);
}

function withSuffix(name: string, suffix: string): string {
  const dot = name.lastIndexOf('.');
  if (dot <= 0) {
    return `${name}_${suffix}`;
  }
  return `${name.slice(0, dot)}_${suffix}${name.slice(dot)}`;
}
