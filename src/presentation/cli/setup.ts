import { ICommand } from './commands/ICommand';
import { DownloadCommand } from './commands/DownloadCommand';
import { MergeCommand } from './commands/MergeCommand';
import { PlayCommand } from './commands/PlayCommand';
import { DownloadPlaylistUseCase } from '../../application/use-cases/DownloadPlaylistUseCase';
import { PlaylistResolver } from '../../application/services/PlaylistResolver';
import { SegmentDownloader } from '../../application/services/SegmentDownloader';
import { ManifestRewriter } from '../../application/services/ManifestRewriter';
import { HttpClient } from '../../infrastructure/http/HttpClient';
import { M3u8PlaylistParser } from '../../infrastructure/parsing/M3u8PlaylistParser';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import { JsonRecordStore } from '../../infrastructure/storage/JsonRecordStore';
import { ChildProcessRunner } from '../../infrastructure/media/ProcessRunner';
import { FfmpegVideoTool } from '../../infrastructure/media/FfmpegVideoTool';
import { IProcessRunner } from '../../domain/interfaces/IProcessRunner';
import { IVideoTool } from '../../domain/interfaces/IVideoTool';
import { IFetchClient } from '../../domain/interfaces/IFetchClient';
import { Logger, createChildLogger } from '../../shared/logging/Logger';
import { AppConfig } from '../config/ConfigLoader';

export interface Dependencies {
    commands: ICommand[];
    downloadUseCase: DownloadPlaylistUseCase;
    videoTool: IVideoTool;
}

/**
 * Collaborators that can be swapped, mostly for tests
 */
export interface DependencyOverrides {
    fetchClient?: IFetchClient;
    processRunner?: IProcessRunner;
    showProgress?: boolean;
}

/**
 * Set up all dependencies using manual dependency injection
 */
export function setupDependencies(
    config: AppConfig,
    logger: Logger,
    overrides: DependencyOverrides = {}
): Dependencies {
    const fetchClient = overrides.fetchClient ?? new HttpClient(createChildLogger(logger, 'http'), {
        timeout: config.timeout,
        retries: config.retries
    });
    const parser = new M3u8PlaylistParser();
    const storage = new LocalFileStorage(createChildLogger(logger, 'storage'));
    const recordStore = new JsonRecordStore(storage);

    const resolver = new PlaylistResolver(fetchClient, parser, createChildLogger(logger, 'resolver'), {
        maxRedirects: config.maxRedirects
    });
    const downloader = new SegmentDownloader(
        fetchClient,
        storage,
        createChildLogger(logger, 'downloader'),
        config.concurrency
    );
    const rewriter = new ManifestRewriter(storage, createChildLogger(logger, 'rewriter'));

    const downloadUseCase = new DownloadPlaylistUseCase(
        resolver,
        recordStore,
        storage,
        downloader,
        rewriter,
        createChildLogger(logger, 'download')
    );

    const videoTool = new FfmpegVideoTool(
        overrides.processRunner ?? new ChildProcessRunner(),
        storage,
        parser,
        createChildLogger(logger, 'video'),
        {
            ffmpegPath: config.ffmpegPath,
            player: config.player,
            verbose: config.verbose
        }
    );

    const commands: ICommand[] = [
        new DownloadCommand(logger, downloadUseCase, videoTool, config, overrides.showProgress),
        new MergeCommand(logger, videoTool),
        new PlayCommand(logger, videoTool)
    ];

    return {
        commands,
        downloadUseCase,
        videoTool
    };
}
