import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { IVideoTool } from '../../../domain/interfaces/IVideoTool';
import { Logger } from '../../../shared/logging/Logger';

export class MergeCommand extends BaseCommand {
    name = 'merge <index> <output>';
    description = 'Merge a downloaded playlist into one video file';

    constructor(
        logger: Logger,
        private videoTool: IVideoTool
    ) {
        super(logger);
    }

    async execute(args: CommandArgs): Promise<void> {
        this.validateArgs(args);

        const index = this.getPositional(args, 'index');
        const output = this.getPositional(args, 'output');

        await this.videoTool.merge(index, output);
        console.log(`🎬 Merged into ${output}`);

        if (!this.getBoolean(args, 'keep-segments')) {
            const removed = await this.videoTool.cleanSegments(index);
            console.log(`🧹 Removed ${removed.length} file(s)`);
        }
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'keep-segments',
                description: 'Keep the segment files after merging',
                type: 'boolean',
                default: false
            }
        ];
    }
}
