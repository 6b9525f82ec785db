import * as path from 'path';
import { IRecordStore } from '../../domain/interfaces/IRecordStore';
import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { DownloadRecord, RECORD_FILE_NAME, isDownloadRecord } from '../../domain/entities/DownloadRecord';
import { CacheError } from '../../shared/errors/AppError';

/**
 * `record.json` inside the destination directory, pretty-printed so it can
 * be inspected by hand.
 */
export class JsonRecordStore implements IRecordStore {
  constructor(private readonly storage: IFileStorage) {}

  async load(directory: string): Promise<DownloadRecord> {
    const recordPath = path.join(directory, RECORD_FILE_NAME);

    if (!(await this.storage.exists(recordPath))) {
      throw new CacheError(`No download record in ${directory}`, directory);
    }

    let parsed: unknown;
    try {
      const content = await this.storage.read(recordPath);
      parsed = JSON.parse(content.toString('utf8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CacheError(`Unreadable download record in ${directory}: ${reason}`, directory);
    }

    if (!isDownloadRecord(parsed)) {
      throw new CacheError(`Malformed download record in ${directory}`, directory);
    }
    return parsed;
  }

  async save(directory: string, record: DownloadRecord): Promise<void> {
    const content = JSON.stringify(
      { target: record.target, headers: record.headers, m3u8_sum: record.m3u8_sum },
      null,
      2
    );
    await this.storage.writeAtomic(path.join(directory, RECORD_FILE_NAME), content);
  }
}
