import { DownloadRecord } from '../entities/DownloadRecord';

/**
 * Persistence of the download record kept in a destination directory
 */
export interface IRecordStore {
  /**
   * Rejects with a CacheError when the record is missing, unreadable or malformed
   */
  load(directory: string): Promise<DownloadRecord>;

  /**
   * Rejects with an IOError when the record cannot be written
   */
  save(directory: string, record: DownloadRecord): Promise<void>;
}
