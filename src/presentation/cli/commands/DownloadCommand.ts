import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { DownloadPlaylistUseCase } from '../../../application/use-cases/DownloadPlaylistUseCase';
import { DownloadRequestBuilder } from '../../../application/use-cases/DownloadRequest';
import { DownloadSummary } from '../../../domain/entities/DownloadResult';
import { IVideoTool } from '../../../domain/interfaces/IVideoTool';
import { Logger } from '../../../shared/logging/Logger';
import { ValidationError } from '../../../shared/errors/AppError';
import { AppConfig } from '../../config/ConfigLoader';
import { ProgressReporter } from '../ProgressReporter';

const HEADER_SEPARATOR = ': ';

/**
 * Split a `Name: value` header argument at its first ": "
 */
export function parseHeaderArgument(raw: string): [string, string] {
    const index = raw.indexOf(HEADER_SEPARATOR);
    if (index <= 0) {
        throw new ValidationError(`Invalid header '${raw}', expected 'Name: value'`, 'headers');
    }
    return [raw.slice(0, index), raw.slice(index + HEADER_SEPARATOR.length)];
}

export class DownloadCommand extends BaseCommand {
    name = 'download <url>';
    description = 'Archive an HLS playlist and its segments into a directory';
    aliases = ['dl'];
    isDefault = true;

    constructor(
        logger: Logger,
        private downloadUseCase: DownloadPlaylistUseCase,
        private videoTool: IVideoTool,
        private config: AppConfig,
        private showProgress: boolean = process.stderr.isTTY === true
    ) {
        super(logger);
    }

    async execute(args: CommandArgs): Promise<void> {
        this.validateArgs(args);

        const builder = new DownloadRequestBuilder(this.getPositional(args, 'url'))
            .headersFrom(this.config.headers)
            .indexName(this.getString(args, 'index-name') ?? this.config.indexName)
            .maxConcurrency(this.getNumber(args, 'concurrency') ?? this.config.concurrency)
            .maxRedirects(this.config.maxRedirects);

        for (const raw of this.getStrings(args, 'header')) {
            const [name, value] = parseHeaderArgument(raw);
            builder.header(name, value);
        }

        const dir = this.getString(args, 'dir');
        if (dir !== undefined) {
            builder.saveDir(dir);
        }

        const result = builder.build();
        if (!result.ok) {
            result.errors.forEach(error => this.logger.debug(error.message, { field: error.field }));
            throw new ValidationError(result.errors.map(error => error.message).join('; '));
        }

        const reporter = new ProgressReporter(this.showProgress);
        let summary: DownloadSummary;
        try {
            summary = await this.downloadUseCase.execute(result.request, reporter.callback);
        } finally {
            reporter.stop();
        }

        this.printSummary(summary);

        // Playback reads the segments that the merge cleanup deletes
        if (this.getBoolean(args, 'play')) {
            await this.videoTool.play(summary.indexPath);
        }

        const mergeOutput = this.getString(args, 'merge');
        if (mergeOutput !== undefined) {
            await this.videoTool.merge(summary.indexPath, mergeOutput);
            const removed = await this.videoTool.cleanSegments(summary.indexPath);
            console.log(`🎬 Merged into ${mergeOutput}, removed ${removed.length} file(s)`);
        }
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'dir',
                alias: 'D',
                description: 'Directory to save the playlist into',
                type: 'string',
                required: true
            },
            {
                name: 'header',
                alias: 'H',
                description: "Request header as 'Name: value', repeatable",
                type: 'array'
            },
            {
                name: 'concurrency',
                alias: 'c',
                description: 'Maximum number of parallel segment downloads',
                type: 'number'
            },
            {
                name: 'index-name',
                alias: 'i',
                description: 'File name of the local playlist',
                type: 'string'
            },
            {
                name: 'merge',
                alias: 'm',
                description: 'Merge into this file with ffmpeg, then delete the segments',
                type: 'string'
            },
            {
                name: 'play',
                alias: 'p',
                description: 'Play the local playlist when done',
                type: 'boolean',
                default: false
            }
        ];
    }

    private printSummary(summary: DownloadSummary): void {
        console.log('\n📊 Download Summary:');
        console.log(`📁 ${summary.indexPath}`);
        console.log(`✅ Segments: ${summary.total} (fetched ${summary.fetched}, already present ${summary.skipped})`);
        if (summary.resumed) {
            console.log('♻️  Resumed an earlier download');
        }
    }
}
