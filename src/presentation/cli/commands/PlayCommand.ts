import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { IVideoTool } from '../../../domain/interfaces/IVideoTool';
import { Logger } from '../../../shared/logging/Logger';

export class PlayCommand extends BaseCommand {
    name = 'play <index>';
    description = 'Play a downloaded playlist with mpv or ffplay';

    constructor(
        logger: Logger,
        private videoTool: IVideoTool
    ) {
        super(logger);
    }

    async execute(args: CommandArgs): Promise<void> {
        await this.videoTool.play(this.getPositional(args, 'index'));
    }

    getOptions(): CommandOption[] {
        return [];
    }
}
