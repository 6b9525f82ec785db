import * as path from 'path';
import pLimit from 'p-limit';
import { IFetchClient } from '../../domain/interfaces/IFetchClient';
import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { MediaPlaylist } from '../../domain/entities/Playlist';
import { ProgressCallback, SegmentStats } from '../../domain/entities/DownloadResult';
import { localFileName } from '../../domain/value-objects/Filename';
import { AppError, FetchError, ResolutionError } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

export const DEFAULT_MAX_CONCURRENCY = 10;

/**
 * One resource to materialize: where it comes from and the file it becomes
 */
export interface DownloadUnit {
  url: string;
  fileName: string;
}

export interface SegmentDownloadOptions {
  headers?: Readonly<Record<string, string>>;
  maxConcurrency?: number;
  onProgress?: ProgressCallback;
}

type UnitOutcome = 'fetched' | 'skipped';

/**
 * Materializes keys, init sections and segments of a media playlist as files
 * in one directory. A file already present counts as downloaded.
 */
export class SegmentDownloader {
  constructor(
    private readonly fetchClient: IFetchClient,
    private readonly storage: IFileStorage,
    private readonly logger: ILogger,
    private readonly defaultConcurrency: number = DEFAULT_MAX_CONCURRENCY
  ) {}

  async download(
    playlist: MediaPlaylist,
    saveDir: string,
    options: SegmentDownloadOptions = {}
  ): Promise<SegmentStats> {
    const headers = options.headers ?? {};
    const names = playlist.localNames();
    const toUnit = (url: string): DownloadUnit => ({ url, fileName: names.get(url) ?? localFileName(url) });
    const preconditions = [...playlist.keyUrls(), ...playlist.initSectionUrls()].map(toUnit);
    const segments = dedupe(playlist.segmentUrls().map(toUnit));
    assertDistinctNames([...preconditions, ...segments]);

    // keys and init sections must be on disk before any segment
    for (const unit of preconditions) {
      const outcome = await this.downloadUnit(unit, saveDir, headers);
      this.logger.info(`Precondition ${outcome === 'skipped' ? 'already present' : 'downloaded'}: ${unit.fileName}`);
    }

    return this.downloadSegments(segments, saveDir, headers, options);
  }

  /**
   * Fail-fast bounded batch. After the first failure no waiting task issues
   * a request; tasks already running finish on their own. Everything is
   * awaited before the first error is rethrown.
   */
  private async downloadSegments(
    units: DownloadUnit[],
    saveDir: string,
    headers: Readonly<Record<string, string>>,
    options: SegmentDownloadOptions
  ): Promise<SegmentStats> {
    const maxConcurrency = options.maxConcurrency ?? this.defaultConcurrency;
    const limit = pLimit(maxConcurrency);
    const stats: SegmentStats = { total: units.length, fetched: 0, skipped: 0 };

    const batch: { closed: boolean; error?: unknown } = { closed: false };
    let completed = 0;

    this.logger.info(`Downloading ${units.length} segment(s)`, { saveDir, maxConcurrency });

    const tasks = units.map(unit =>
      limit(async () => {
        if (batch.closed) {
          return;
        }
        try {
          const outcome = await this.downloadUnit(unit, saveDir, headers);
          stats[outcome]++;
          completed++;
          options.onProgress?.({
            completed,
            total: units.length,
            fileName: unit.fileName,
            skipped: outcome === 'skipped'
          });
        } catch (error) {
          if (!batch.closed) {
            batch.closed = true;
            batch.error = error;
            this.logger.error(`Segment failed, stopping batch: ${unit.url}`, error);
          } else {
            this.logger.debug(`Segment failed after batch stopped: ${unit.url}`);
          }
        }
      })
    );

    await Promise.all(tasks);

    if (batch.closed) {
      throw batch.error;
    }

    this.logger.info('Segments downloaded', { ...stats });
    return stats;
  }

  private async downloadUnit(
    unit: DownloadUnit,
    saveDir: string,
    headers: Readonly<Record<string, string>>
  ): Promise<UnitOutcome> {
    const savePath = path.join(saveDir, unit.fileName);
    if (await this.storage.exists(savePath)) {
      return 'skipped';
    }

    let bytes: Buffer;
    try {
      bytes = await this.fetchClient.fetchBytes(unit.url, headers);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new FetchError(`Failed to fetch ${unit.url}: ${error instanceof Error ? error.message : String(error)}`, unit.url);
    }

    await this.storage.writeAtomic(savePath, bytes);
    return 'fetched';
  }
}

/**
 * The same URL listed twice is downloaded once
 */
function dedupe(units: DownloadUnit[]): DownloadUnit[] {
  const seen = new Set<string>();
  return units.filter(unit => {
    if (seen.has(unit.url)) {
      return false;
    }
    seen.add(unit.url);
    return true;
  });
}

function assertDistinctNames(units: DownloadUnit[]): void {
  const owners = new Map<string, string>();
  for (const unit of units) {
    const owner = owners.get(unit.fileName);
    if (owner !== undefined && owner !== unit.url) {
      throw new ResolutionError(`Two resources map to the same local file '${unit.fileName}'`, {
        fileName: unit.fileName,
        first: owner,
        second: unit.url
      });
    }
    owners.set(unit.fileName, unit.url);
  }
}
