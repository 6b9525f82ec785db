/**
 * Persisted in every destination directory as `record.json`
 */
export interface DownloadRecord {
  target: string;
  headers: Record<string, string>;
  m3u8_sum: string;
}

export const RECORD_FILE_NAME = 'record.json';

export function isDownloadRecord(value: unknown): value is DownloadRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('target' in value) || typeof value.target !== 'string') {
    return false;
  }
  if (!('m3u8_sum' in value) || typeof value.m3u8_sum !== 'string') {
    return false;
  }
  if (!('headers' in value) || typeof value.headers !== 'object' || value.headers === null) {
    return false;
  }
  return Object.values(value.headers).every(header => typeof header === 'string');
}
