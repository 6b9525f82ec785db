import * as path from 'path';
import { IVideoTool } from '../../domain/interfaces/IVideoTool';
import { IProcessRunner } from '../../domain/interfaces/IProcessRunner';
import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { IPlaylistParser } from '../../domain/interfaces/IPlaylistParser';
import { ExternalProcessError, ParseError } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

export type PlayerChoice = 'auto' | 'mpv' | 'ffplay';

export interface VideoToolOptions {
  ffmpegPath?: string;
  ffplayPath?: string;
  mpvPath?: string;
  player?: PlayerChoice;
  /** Let the external program write to our terminal */
  verbose?: boolean;
}

interface Invocation {
  command: string;
  args: string[];
  cwd: string;
}

const MPV_PROBE_PATH = '/usr/bin/mpv';

// ============================================================================
// Command Builders
// ============================================================================

export function buildMergeArgs(indexFile: string, outputPath: string): string[] {
  return ['-allowed_extensions', 'ALL', '-i', indexFile, '-codec', 'copy', '-y', outputPath];
}

export function buildFfplayArgs(indexFile: string): string[] {
  return ['-allowed_extensions', 'ALL', '-i', indexFile];
}

export function buildMpvArgs(indexFile: string): string[] {
  return ['--demuxer-lavf-o=allowed_extensions=ALL', indexFile];
}

/**
 * Merge and playback through ffmpeg, ffplay or mpv. Every program runs in
 * the index's directory so the basename references inside it resolve.
 */
export class FfmpegVideoTool implements IVideoTool {
  private readonly options: Required<VideoToolOptions>;

  constructor(
    private readonly runner: IProcessRunner,
    private readonly storage: IFileStorage,
    private readonly parser: IPlaylistParser,
    private readonly logger: ILogger,
    options: VideoToolOptions = {}
  ) {
    this.options = {
      ffmpegPath: 'ffmpeg',
      ffplayPath: 'ffplay',
      mpvPath: 'mpv',
      player: 'auto',
      verbose: false,
      ...options
    };
  }

  async merge(indexPath: string, outputPath: string): Promise<void> {
    const { dir, file } = splitIndexPath(indexPath);
    const output = path.resolve(outputPath);

    this.logger.info(`Merging ${indexPath} into ${output}`);
    await this.invoke({
      command: this.options.ffmpegPath,
      args: buildMergeArgs(file, output),
      cwd: dir
    });
  }

  async play(indexPath: string): Promise<void> {
    const { dir, file } = splitIndexPath(indexPath);

    const invocation = (await this.useMpv())
      ? { command: this.options.mpvPath, args: buildMpvArgs(file), cwd: dir }
      : { command: this.options.ffplayPath, args: buildFfplayArgs(file), cwd: dir };

    this.logger.info(`Playing ${indexPath} with ${invocation.command}`);
    await this.invoke(invocation);
  }

  async cleanSegments(indexPath: string): Promise<string[]> {
    const { dir } = splitIndexPath(indexPath);
    const playlist = this.parser.parse(await this.storage.read(indexPath));
    if (playlist.kind !== 'media') {
      throw new ParseError(`${indexPath} is not a media playlist`);
    }

    const references = new Set<string>();
    for (const segment of playlist.segments) {
      references.add(segment.uri);
      if (segment.key?.uri) {
        references.add(segment.key.uri);
      }
      if (segment.map) {
        references.add(segment.map.uri);
      }
    }

    const removed: string[] = [];
    for (const reference of references) {
      const filePath = path.isAbsolute(reference) ? reference : path.join(dir, reference);
      await this.storage.delete(filePath);
      removed.push(filePath);
    }

    this.logger.info(`Removed ${removed.length} file(s) referenced by ${indexPath}`);
    return removed;
  }

  private async useMpv(): Promise<boolean> {
    switch (this.options.player) {
      case 'mpv':
        return true;
      case 'ffplay':
        return false;
      default:
        return this.runner.exists(MPV_PROBE_PATH);
    }
  }

  private async invoke(invocation: Invocation): Promise<void> {
    this.logger.debug(`Running ${invocation.command} ${invocation.args.join(' ')}`, { cwd: invocation.cwd });

    const result = await this.runner.run(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      inheritOutput: this.options.verbose
    });

    if (!result.success) {
      throw new ExternalProcessError(invocation.command, result.code, result.stderr);
    }
  }
}

function splitIndexPath(indexPath: string): { dir: string; file: string } {
  const resolved = path.resolve(indexPath);
  return { dir: path.dirname(resolved), file: path.basename(resolved) };
}
