import { Parser } from 'm3u8-parser';
import { IPlaylistParser } from '../../domain/interfaces/IPlaylistParser';
import {
  EncryptionKey,
  ParsedPlaylist,
  Resolution,
  SegmentDescriptor,
  VariantStream
} from '../../domain/entities/Playlist';
import { ParseError } from '../../shared/errors/AppError';

const MASTER_TAGS = ['#EXT-X-STREAM-INF', '#EXT-X-MEDIA:', '#EXT-X-I-FRAME-STREAM-INF'];

type UnknownRecord = Record<string, unknown>;

/**
 * Parsing collaborator backed by m3u8-parser. The parser is lenient, so the
 * header line is checked here and its output is narrowed field by field.
 */
export class M3u8PlaylistParser implements IPlaylistParser {
  parse(bytes: Buffer): ParsedPlaylist {
    const text = bytes.toString('utf8').replace(/^\uFEFF/, '');
    if (!text.trimStart().startsWith('#EXTM3U')) {
      throw new ParseError('Missing #EXTM3U header');
    }

    let manifest: unknown;
    try {
      const parser = new Parser();
      parser.push(text);
      parser.end();
      manifest = parser.manifest;
    } catch (error) {
      throw new ParseError(`Malformed playlist: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!isRecord(manifest)) {
      throw new ParseError('Parser produced no manifest');
    }

    const playlists = Array.isArray(manifest.playlists) ? manifest.playlists : [];
    if (playlists.length > 0 || MASTER_TAGS.some(tag => text.includes(tag))) {
      return {
        kind: 'master',
        variants: playlists.filter(isRecord).map(toVariant).filter(isDefined)
      };
    }

    const segments = Array.isArray(manifest.segments) ? manifest.segments : [];
    return {
      kind: 'media',
      segments: segments.filter(isRecord).map(toSegment).filter(isDefined)
    };
  }
}

function toVariant(playlist: UnknownRecord): VariantStream | undefined {
  if (typeof playlist.uri !== 'string') {
    return undefined;
  }
  const attributes = isRecord(playlist.attributes) ? playlist.attributes : {};

  const variant: VariantStream = { uri: playlist.uri };
  const bandwidth = numberOf(attributes.BANDWIDTH);
  if (bandwidth !== undefined) {
    variant.bandwidth = bandwidth;
  }
  const resolution = toResolution(attributes.RESOLUTION);
  if (resolution) {
    variant.resolution = resolution;
  }
  const frameRate = numberOf(attributes['FRAME-RATE']);
  if (frameRate !== undefined) {
    variant.frameRate = frameRate;
  }
  return variant;
}

function toResolution(value: unknown): Resolution | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const width = numberOf(value.width);
  const height = numberOf(value.height);
  return width !== undefined && height !== undefined ? { width, height } : undefined;
}

function toSegment(segment: UnknownRecord): SegmentDescriptor | undefined {
  if (typeof segment.uri !== 'string') {
    return undefined;
  }

  const descriptor: SegmentDescriptor = { uri: segment.uri };
  if (isRecord(segment.key) && typeof segment.key.method === 'string') {
    const key: EncryptionKey = { method: segment.key.method };
    if (typeof segment.key.uri === 'string') {
      key.uri = segment.key.uri;
    }
    descriptor.key = key;
  }
  if (isRecord(segment.map) && typeof segment.map.uri === 'string') {
    descriptor.map = { uri: segment.map.uri };
  }
  return descriptor;
}

function numberOf(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}
