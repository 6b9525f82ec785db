/**
 * Core interface for file storage operations
 */
export interface IFileStorage {
  /**
   * Write data so that `path` either does not exist or holds all of it:
   * write a sibling temporary file, sync it, rename it into place.
   */
  writeAtomic(path: string, data: Buffer | string): Promise<void>;

  /**
   * Read file from storage
   */
  read(path: string): Promise<Buffer>;

  /**
   * Check if file exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Delete file from storage. A missing file is not an error.
   */
  delete(path: string): Promise<void>;

  /**
   * Create directory (and parents) if missing
   */
  ensureDirectory(path: string): Promise<void>;

  /**
   * Remove the directory with all its contents and recreate it empty
   */
  resetDirectory(path: string): Promise<void>;

  /**
   * Delete temporary files left behind by interrupted atomic writes.
   * Returns the removed paths.
   */
  removeTemporaryFiles(directory: string): Promise<string[]>;
}
