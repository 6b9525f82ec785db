/**
 * Outcome of a completed playlist download
 */
export class DownloadSummary {
  private constructor(
    public readonly indexPath: string,
    public readonly saveDir: string,
    public readonly checksum: string,
    public readonly resumed: boolean,
    public readonly stats: SegmentStats,
    public readonly duration: number
  ) {}

  static create(params: {
    indexPath: string;
    saveDir: string;
    checksum: string;
    resumed: boolean;
    stats: SegmentStats;
    duration: number;
  }): DownloadSummary {
    return new DownloadSummary(
      params.indexPath,
      params.saveDir,
      params.checksum,
      params.resumed,
      params.stats,
      params.duration
    );
  }

  get total(): number {
    return this.stats.total;
  }

  get fetched(): number {
    return this.stats.fetched;
  }

  get skipped(): number {
    return this.stats.skipped;
  }
}

/**
 * Per-batch counters reported by the segment downloader
 */
export interface SegmentStats {
  total: number;
  fetched: number;
  skipped: number;
}

/**
 * Progress event, one per segment that completed successfully
 */
export interface SegmentProgress {
  completed: number;
  total: number;
  fileName: string;
  skipped: boolean;
}

export type ProgressCallback = (progress: SegmentProgress) => void;
