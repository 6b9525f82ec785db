import * as path from 'path';
import { IFileStorage, IRecordStore, DownloadSummary, ProgressCallback, TargetIdentity } from '../../domain';
import { ILogger, CacheError } from '../../shared';
import { PlaylistResolver } from '../services/PlaylistResolver';
import { SegmentDownloader } from '../services/SegmentDownloader';
import { ManifestRewriter } from '../services/ManifestRewriter';
import { DownloadRequest } from './DownloadRequest';

/**
 * Use case for archiving an HLS playlist: resolve, decide resume or restart,
 * download, write the local playlist.
 */
export class DownloadPlaylistUseCase {
  constructor(
    private readonly resolver: PlaylistResolver,
    private readonly recordStore: IRecordStore,
    private readonly storage: IFileStorage,
    private readonly downloader: SegmentDownloader,
    private readonly rewriter: ManifestRewriter,
    private readonly logger: ILogger
  ) {}

  async execute(request: DownloadRequest, onProgress?: ProgressCallback): Promise<DownloadSummary> {
    const startTime = Date.now();
    const { saveDir } = request;
    this.logger.info('Starting playlist download', { url: request.target.url, saveDir });

    const playlist = await this.resolver.resolve(
      request.target.url,
      request.target.headers,
      request.maxRedirects
    );
    const target = request.target.withChecksum(playlist.checksum);

    await this.storage.ensureDirectory(saveDir);
    const resumed = await this.prepareDirectory(target, saveDir);

    const stats = await this.downloader.download(playlist, saveDir, {
      headers: target.headers,
      maxConcurrency: request.maxConcurrency,
      onProgress
    });

    const indexPath = path.join(saveDir, request.indexName);
    await this.rewriter.write(playlist, indexPath);

    const summary = DownloadSummary.create({
      indexPath,
      saveDir,
      checksum: playlist.checksum,
      resumed,
      stats,
      duration: Date.now() - startTime
    });

    this.logger.info('Download completed', {
      indexPath,
      total: stats.total,
      fetched: stats.fetched,
      skipped: stats.skipped,
      duration: summary.duration
    });
    return summary;
  }

  /**
   * Keep the directory when its record matches the playlist checksum,
   * otherwise wipe it and write a fresh record before anything else.
   * Returns whether the directory is being resumed.
   */
  private async prepareDirectory(target: TargetIdentity, saveDir: string): Promise<boolean> {
    try {
      const record = await this.recordStore.load(saveDir);
      if (target.matches(record)) {
        this.logger.info('Download record matches, resuming', { saveDir });
        await this.storage.removeTemporaryFiles(saveDir);
        return true;
      }
      this.logger.warn('Playlist changed since last download', {
        saveDir,
        previous: record.m3u8_sum,
        current: target.checksum
      });
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      this.logger.warn(`Cache not usable: ${error.message}`, { saveDir });
    }

    this.logger.warn(`Cleaning directory: ${saveDir}`);
    await this.storage.resetDirectory(saveDir);

    const record = target.toRecord();
    await this.recordStore.save(saveDir, record);
    this.logger.info('Download record saved', { target: record.target, m3u8_sum: record.m3u8_sum });
    return false;
  }
}
