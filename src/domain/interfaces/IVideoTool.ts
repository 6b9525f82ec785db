/**
 * Merge and playback of a local playlist through an external program
 */
export interface IVideoTool {
  merge(indexPath: string, outputPath: string): Promise<void>;
  play(indexPath: string): Promise<void>;

  /**
   * Delete every segment, key and init-section file the local index refers to
   */
  cleanSegments(indexPath: string): Promise<string[]>;
}
