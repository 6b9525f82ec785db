import { ParsedPlaylist } from '../entities/Playlist';

/**
 * Turns raw manifest bytes into a master or media playlist
 */
export interface IPlaylistParser {
  /**
   * Rejects malformed input with a ParseError
   */
  parse(bytes: Buffer): ParsedPlaylist;
}
