import { createHash } from 'crypto';
import { IFetchClient } from '../../domain/interfaces/IFetchClient';
import { IPlaylistParser } from '../../domain/interfaces/IPlaylistParser';
import { MediaPlaylist, ParsedPlaylist, VariantStream, resolveUri } from '../../domain/entities/Playlist';
import { AppError, FetchError, ParseError, ResolutionError } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

export const DEFAULT_MAX_REDIRECTS = 8;

export interface PlaylistResolverOptions {
  /** How many master → variant hops are followed before giving up */
  maxRedirects?: number;
}

/**
 * Pick one variant of a master playlist. When every variant declares a
 * resolution the largest picture wins and bandwidth breaks ties; otherwise
 * the highest bandwidth wins. Frame rate is not considered. Among equal
 * candidates the first listed is kept.
 */
export function selectVariant(variants: readonly VariantStream[]): VariantStream | undefined {
  const byResolution = variants.length > 0 && variants.every(variant => variant.resolution !== undefined);

  let best: VariantStream | undefined;
  for (const variant of variants) {
    if (!best || compareVariants(variant, best, byResolution) > 0) {
      best = variant;
    }
  }
  return best;
}

function compareVariants(a: VariantStream, b: VariantStream, byResolution: boolean): number {
  if (byResolution) {
    const pixels = pixelCount(a) - pixelCount(b);
    if (pixels !== 0) {
      return pixels;
    }
  }
  return (a.bandwidth ?? 0) - (b.bandwidth ?? 0);
}

function pixelCount(variant: VariantStream): number {
  return variant.resolution ? variant.resolution.width * variant.resolution.height : 0;
}

/**
 * Follows master playlists down to a concrete media playlist
 */
export class PlaylistResolver {
  private readonly maxRedirects: number;

  constructor(
    private readonly fetchClient: IFetchClient,
    private readonly parser: IPlaylistParser,
    private readonly logger: ILogger,
    options: PlaylistResolverOptions = {}
  ) {
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  }

  async resolve(
    startUrl: string,
    headers: Readonly<Record<string, string>>,
    maxRedirects: number = this.maxRedirects
  ): Promise<MediaPlaylist> {
    let url = startUrl;
    let hops = 0;

    for (;;) {
      const bytes = await this.fetch(url, headers);
      const parsed = this.parse(bytes, url);

      if (parsed.kind === 'media') {
        const checksum = createHash('md5').update(bytes).digest('hex');
        const playlist = new MediaPlaylist(parsed.segments, checksum, bytes.toString('utf8'));
        playlist.setBaseUrl(url);

        this.logger.info('Media playlist resolved', {
          url,
          segments: parsed.segments.length,
          checksum
        });
        return playlist;
      }

      if (hops >= maxRedirects) {
        throw new ResolutionError(`Gave up after following ${hops} master playlist(s)`, {
          url,
          maxRedirects
        });
      }

      const variant = selectVariant(parsed.variants);
      if (!variant) {
        throw new ResolutionError(`Master playlist declares no variant: ${url}`, { url });
      }

      const next = resolveUri(variant.uri, url);
      this.logger.info('Master playlist found, following variant', {
        from: url,
        to: next,
        bandwidth: variant.bandwidth,
        resolution: variant.resolution
          ? `${variant.resolution.width}x${variant.resolution.height}`
          : undefined
      });

      url = next;
      hops++;
    }
  }

  private async fetch(url: string, headers: Readonly<Record<string, string>>): Promise<Buffer> {
    try {
      return await this.fetchClient.fetchBytes(url, headers);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new FetchError(`Failed to fetch ${url}: ${messageOf(error)}`, url);
    }
  }

  private parse(bytes: Buffer, url: string): ParsedPlaylist {
    try {
      return this.parser.parse(bytes);
    } catch (error) {
      throw new ParseError(`Failed to parse playlist at ${url}: ${messageOf(error)}`, url);
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
