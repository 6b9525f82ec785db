import { ResolutionError, InternalError } from '../../shared/errors/AppError';
import { assignLocalNames } from '../value-objects/Filename';

/**
 * Encryption key reference attached to a segment (EXT-X-KEY)
 */
export interface EncryptionKey {
  method: string;
  uri?: string;
}

/**
 * Initialization section attached to a segment (EXT-X-MAP)
 */
export interface InitSection {
  uri: string;
}

/**
 * One entry of a media playlist
 */
export interface SegmentDescriptor {
  uri: string;
  key?: EncryptionKey;
  map?: InitSection;
}

export interface Resolution {
  width: number;
  height: number;
}

/**
 * One quality option listed in a master playlist
 */
export interface VariantStream {
  uri: string;
  bandwidth?: number;
  resolution?: Resolution;
  frameRate?: number;
}

export interface MasterPlaylistData {
  kind: 'master';
  variants: VariantStream[];
}

export interface MediaPlaylistData {
  kind: 'media';
  segments: SegmentDescriptor[];
}

/**
 * Output of the parsing collaborator
 */
export type ParsedPlaylist = MasterPlaylistData | MediaPlaylistData;

/**
 * A concrete media playlist after all master → variant hops, with the
 * checksum of its raw bytes and the URL relative references resolve against.
 */
export class MediaPlaylist {
  private _baseUrl?: string;

  constructor(
    public readonly segments: readonly SegmentDescriptor[],
    public readonly checksum: string,
    public readonly source: string
  ) {}

  get baseUrl(): string | undefined {
    return this._baseUrl;
  }

  /**
   * Set once, after the last redirect-follow step.
   */
  setBaseUrl(url: string): void {
    if (this._baseUrl !== undefined) {
      throw new InternalError('Base URL of a media playlist can only be set once', {
        current: this._baseUrl,
        attempted: url
      });
    }
    this._baseUrl = url;
  }

  /**
   * Absolute http(s) URIs are returned unchanged; anything else is resolved
   * against the base URL. Without a base URL the candidate is returned as is.
   */
  resolveUri(uri: string): string {
    return resolveUri(uri, this._baseUrl);
  }

  segmentUrls(): string[] {
    return this.segments.map(segment => this.resolveUri(segment.uri));
  }

  /**
   * The first segment's key comes first; later rotated keys follow in
   * playlist order, each once.
   */
  keyUrls(): string[] {
    const urls: string[] = [];
    for (const segment of this.segments) {
      const uri = segment.key?.uri;
      if (!uri || segment.key?.method === 'NONE') {
        continue;
      }
      const url = this.resolveUri(uri);
      if (!urls.includes(url)) {
        urls.push(url);
      }
    }
    return urls;
  }

  initSectionUrls(): string[] {
    const urls: string[] = [];
    for (const segment of this.segments) {
      if (!segment.map) {
        continue;
      }
      const url = this.resolveUri(segment.map.uri);
      if (!urls.includes(url)) {
        urls.push(url);
      }
    }
    return urls;
  }

  /**
   * Local file name of every key, init section and segment, keyed by
   * resolved URL
   */
  localNames(): Map<string, string> {
    return assignLocalNames([...this.keyUrls(), ...this.initSectionUrls(), ...this.segmentUrls()]);
  }
}

export function isAbsoluteHttpUrl(uri: string): boolean {
  return /^https?:\/\//i.test(uri);
}

export function resolveUri(uri: string, baseUrl?: string): string {
  if (isAbsoluteHttpUrl(uri) || baseUrl === undefined) {
    return uri;
  }
  try {
    return new URL(uri, baseUrl).toString();
  } catch {
    throw new ResolutionError(`Cannot resolve '${uri}' against '${baseUrl}'`, { uri, baseUrl });
  }
}
