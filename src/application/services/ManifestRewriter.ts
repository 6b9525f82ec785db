import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { MediaPlaylist } from '../../domain/entities/Playlist';
import { localFileName } from '../../domain/value-objects/Filename';
import { ILogger } from '../../shared/logging/Logger';

const URI_ATTRIBUTE_TAGS = ['#EXT-X-KEY:', '#EXT-X-MAP:'];
const URI_ATTRIBUTE = /URI="([^"]*)"/;

/**
 * Produces the local copy of a media playlist: every segment URI and every
 * key or init-section URI attribute is replaced by the name of the file the
 * downloader stored it under. All other lines pass through untouched.
 */
export class ManifestRewriter {
  constructor(
    private readonly storage: IFileStorage,
    private readonly logger: ILogger
  ) {}

  rewrite(playlist: MediaPlaylist): string {
    // odd indices hold the line breaks, kept as they were
    const parts = playlist.source.split(/(\r?\n)/);
    const names = playlist.localNames();
    const localName = (uri: string): string => {
      const url = playlist.resolveUri(uri);
      return names.get(url) ?? localFileName(url);
    };
    return parts
      .map((part, index) => (index % 2 === 1 ? part : this.rewriteLine(part, localName)))
      .join('');
  }

  async write(playlist: MediaPlaylist, outputPath: string): Promise<void> {
    await this.storage.writeAtomic(outputPath, this.rewrite(playlist));
    this.logger.info(`Local playlist written: ${outputPath}`);
  }

  private rewriteLine(line: string, localName: (uri: string) => string): string {
    const trimmed = line.trim();
    if (trimmed === '') {
      return line;
    }

    if (trimmed.startsWith('#')) {
      if (!URI_ATTRIBUTE_TAGS.some(tag => trimmed.startsWith(tag))) {
        return line;
      }
      return line.replace(URI_ATTRIBUTE, (_match, uri: string) =>
        `URI="${localName(uri)}"`
      );
    }

    return localName(trimmed);
  }
}
