import yargs, { Argv, Options } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ICommand, CommandOption } from './commands/ICommand';
import { Logger } from '../../shared/logging/Logger';
import { ValidationError } from '../../shared/errors/AppError';

export class CliApplication {
    private commands: Map<string, ICommand> = new Map();

    constructor(
        private logger: Logger,
        private appName: string = 'm3u8-archiver',
        private version: string = '1.0.0',
        private onVerbose: () => void = () => undefined
    ) {}

    /**
     * Register a command
     */
    registerCommand(command: ICommand): void {
        this.commands.set(commandName(command), command);
        this.logger.debug(`Registered command: ${commandName(command)}`);
    }

    /**
     * Run the CLI application. Errors from commands propagate to the caller.
     */
    async run(argv: string[] = process.argv): Promise<void> {
        const args = hideBin(argv);

        const yargsInstance = yargs(args)
            .scriptName(this.appName)
            .version(this.version)
            .help()
            .alias('h', 'help')
            .option('verbose', {
                alias: 'v',
                type: 'boolean',
                describe: 'Enable debug logging',
                global: true
            })
            .middleware(parsed => {
                if (parsed.verbose) {
                    this.onVerbose();
                }
            })
            .strict()
            .wrap(100)
            .fail((message, error, instance) => {
                if (error) {
                    throw error;
                }
                instance.showHelp();
                throw new ValidationError(message);
            });

        this.commands.forEach(command => {
            yargsInstance.command(
                commandSpecs(command),
                command.description,
                (builder: Argv) => this.configureCommand(builder, command),
                async parsed => {
                    await command.execute(parsed);
                }
            );
        });

        await yargsInstance.parseAsync();
    }

    private configureCommand(builder: Argv, command: ICommand): Argv {
        command.getOptions().forEach(option => {
            builder.option(option.name, toYargsOption(option));
        });
        return builder;
    }

    /**
     * Get registered commands
     */
    getCommands(): ICommand[] {
        return Array.from(this.commands.values());
    }
}

function commandName(command: ICommand): string {
    return command.name.split(' ')[0];
}

/**
 * yargs command strings: the command itself, its aliases and, for the
 * default command, `$0` with the same positionals
 */
function commandSpecs(command: ICommand): string[] {
    const name = commandName(command);
    const positionals = command.name.slice(name.length);
    const specs = [command.name, ...(command.aliases ?? []).map(alias => `${alias}${positionals}`)];
    if (command.isDefault) {
        specs.push(`$0${positionals}`);
    }
    return specs;
}

function toYargsOption(option: CommandOption): Options {
    const config: Options = {
        describe: option.description,
        type: option.type,
        demandOption: option.required
    };

    if (option.default !== undefined) {
        config.default = option.default;
    }

    if (option.type === 'array') {
        config.string = true;
    }

    if (option.choices) {
        config.choices = option.choices;
    }

    if (option.alias) {
        config.alias = option.alias;
    }

    return config;
}
