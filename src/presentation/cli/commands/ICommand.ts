import { Logger } from '../../../shared/logging/Logger';
import { ValidationError } from '../../../shared/errors/AppError';

/**
 * Base interface for CLI commands
 */
export interface ICommand {
    /**
     * Command name with its positionals, in yargs syntax (e.g. 'play <index>')
     */
    name: string;

    /**
     * Command description for help text
     */
    description: string;

    aliases?: string[];

    /**
     * Also runs when no command name is given
     */
    isDefault?: boolean;

    /**
     * Execute the command
     */
    execute(args: CommandArgs): Promise<void>;

    /**
     * Get command-specific options
     */
    getOptions(): CommandOption[];
}

/**
 * Command arguments passed from CLI
 */
export interface CommandArgs {
    /**
     * Positional arguments left over after the declared ones
     */
    _: Array<string | number>;

    /**
     * Named options, flags and declared positionals
     */
    [key: string]: unknown;
}

/**
 * Command option definition
 */
export interface CommandOption {
    name: string;
    alias?: string;
    description: string;
    type: 'string' | 'number' | 'boolean' | 'array';
    default?: string | number | boolean | string[];
    required?: boolean;
    choices?: string[];
}

/**
 * Base command class with common functionality
 */
export abstract class BaseCommand implements ICommand {
    abstract name: string;
    abstract description: string;
    aliases?: string[];

    constructor(protected logger: Logger) {}

    abstract execute(args: CommandArgs): Promise<void>;

    abstract getOptions(): CommandOption[];

    /**
     * Validate command arguments
     */
    protected validateArgs(args: CommandArgs): void {
        const options = this.getOptions();

        for (const option of options) {
            const value = args[option.name];
            if (option.required && value === undefined) {
                throw new ValidationError(`Missing required option: --${option.name}`, option.name);
            }

            if (option.choices && typeof value === 'string' && !option.choices.includes(value)) {
                throw new ValidationError(
                    `Invalid value for --${option.name}: ${value}. ` +
                    `Valid choices are: ${option.choices.join(', ')}`,
                    option.name
                );
            }
        }
    }

    protected getString(args: CommandArgs, name: string): string | undefined {
        const value = args[name];
        if (value === undefined) {
            return undefined;
        }
        if (typeof value === 'string') {
            return value;
        }
        if (typeof value === 'number') {
            return String(value);
        }
        throw new ValidationError(`--${name} expects a single value`, name);
    }

    protected getNumber(args: CommandArgs, name: string): number | undefined {
        const value = args[name];
        if (value === undefined) {
            return undefined;
        }
        if (typeof value !== 'number' || Number.isNaN(value)) {
            throw new ValidationError(`--${name} expects a number`, name);
        }
        return value;
    }

    protected getBoolean(args: CommandArgs, name: string): boolean {
        return args[name] === true;
    }

    protected getStrings(args: CommandArgs, name: string): string[] {
        const value = args[name];
        if (value === undefined) {
            return [];
        }
        const values: unknown[] = Array.isArray(value) ? value : [value];
        return values.filter(item => item !== undefined && item !== null).map(item => String(item));
    }

    /**
     * Required positional argument
     */
    protected getPositional(args: CommandArgs, name: string): string {
        const value = this.getString(args, name);
        if (value === undefined || value.trim() === '') {
            throw new ValidationError(`Missing argument: <${name}>`, name);
        }
        return value;
    }
}
