import * as os from 'os';
import { cosmiconfigSync } from 'cosmiconfig';
import { ILogger } from '../../shared/logging/Logger';
import { ConfigurationError } from '../../shared/errors/AppError';
import { PlayerChoice } from '../../infrastructure/media/FfmpegVideoTool';

export const CONFIG_MODULE_NAME = 'm3u8archiver';
const ENV_PREFIX = 'M3U8_ARCHIVER_';
const PLAYERS: readonly PlayerChoice[] = ['auto', 'mpv', 'ffplay'];

export interface AppConfig {
    concurrency: number;
    indexName: string;
    /** Per-request timeout in milliseconds */
    timeout: number;
    retries: number;
    maxRedirects: number;
    headers: Record<string, string>;
    player: PlayerChoice;
    ffmpegPath: string;
    verbose: boolean;
}

/**
 * Minimal view of a cosmiconfig explorer
 */
export interface ConfigExplorer {
    search(searchFrom?: string): { config: unknown; filepath: string } | null;
}

export type Environment = Record<string, string | undefined>;

const DEFAULTS: AppConfig = {
    concurrency: 10,
    indexName: 'index.m3u8',
    timeout: 30000,
    retries: 3,
    maxRedirects: 8,
    headers: {},
    player: 'auto',
    ffmpegPath: 'ffmpeg',
    verbose: false
};

export function getDefaults(): AppConfig {
    return { ...DEFAULTS, headers: {} };
}

export class ConfigLoader {
    private config: AppConfig = getDefaults();
    private sources: string[] = [];

    constructor(
        private logger: ILogger,
        private explorer: ConfigExplorer = createExplorer(),
        private env: Environment = process.env,
        private homeDir: string = os.homedir(),
        private cwd: string = process.cwd()
    ) {}

    /**
     * Load configuration: defaults < home dir file < working dir file < environment
     */
    load(): AppConfig {
        this.sources = [];

        const homeConfig = this.loadFromDirectory(this.homeDir);
        const localConfig = this.cwd === this.homeDir ? {} : this.loadFromDirectory(this.cwd);
        const envConfig = this.loadFromEnvironment();

        this.config = this.mergeConfigs(getDefaults(), homeConfig, localConfig, envConfig);
        this.validateConfig(this.config);

        this.logger.debug('Configuration loaded', { sources: this.sources });
        return this.getConfig();
    }

    /**
     * Get current configuration
     */
    getConfig(): AppConfig {
        return { ...this.config, headers: { ...this.config.headers } };
    }

    private loadFromDirectory(dir: string): Partial<AppConfig> {
        let result: { config: unknown; filepath: string } | null;
        try {
            result = this.explorer.search(dir);
        } catch (error) {
            throw new ConfigurationError(
                `Failed to read configuration in ${dir}: ${error instanceof Error ? error.message : String(error)}`
            );
        }
        if (!result) {
            return {};
        }

        this.logger.debug(`Loaded config from ${result.filepath}`);
        this.sources.push(result.filepath);
        return parseFileConfig(result.config, result.filepath);
    }

    private loadFromEnvironment(): Partial<AppConfig> {
        const config: Partial<AppConfig> = {};
        const read = (name: string): string | undefined => {
            const value = this.env[`${ENV_PREFIX}${name}`];
            return value === undefined || value.trim() === '' ? undefined : value.trim();
        };

        const concurrency = read('CONCURRENCY');
        if (concurrency !== undefined) config.concurrency = parseNumber(concurrency, `${ENV_PREFIX}CONCURRENCY`);
        const timeout = read('TIMEOUT');
        if (timeout !== undefined) config.timeout = parseNumber(timeout, `${ENV_PREFIX}TIMEOUT`);
        const retries = read('RETRIES');
        if (retries !== undefined) config.retries = parseNumber(retries, `${ENV_PREFIX}RETRIES`);
        const maxRedirects = read('MAX_REDIRECTS');
        if (maxRedirects !== undefined) config.maxRedirects = parseNumber(maxRedirects, `${ENV_PREFIX}MAX_REDIRECTS`);
        const indexName = read('INDEX_NAME');
        if (indexName !== undefined) config.indexName = indexName;
        const player = read('PLAYER');
        if (player !== undefined) config.player = parsePlayer(player);
        const ffmpegPath = read('FFMPEG_PATH');
        if (ffmpegPath !== undefined) config.ffmpegPath = ffmpegPath;
        const verbose = read('VERBOSE');
        if (verbose !== undefined) config.verbose = verbose === 'true' || verbose === '1';
        const userAgent = read('USER_AGENT');
        if (userAgent !== undefined) config.headers = { 'User-Agent': userAgent };

        if (Object.keys(config).length > 0) {
            this.sources.push('environment');
        }
        return config;
    }

    private mergeConfigs(...configs: Partial<AppConfig>[]): AppConfig {
        const result = getDefaults();

        for (const config of configs) {
            result.concurrency = config.concurrency ?? result.concurrency;
            result.indexName = config.indexName ?? result.indexName;
            result.timeout = config.timeout ?? result.timeout;
            result.retries = config.retries ?? result.retries;
            result.maxRedirects = config.maxRedirects ?? result.maxRedirects;
            result.player = config.player ?? result.player;
            result.ffmpegPath = config.ffmpegPath ?? result.ffmpegPath;
            result.verbose = config.verbose ?? result.verbose;
            // headers merge key by key
            result.headers = { ...result.headers, ...config.headers };
        }

        return result;
    }

    private validateConfig(config: AppConfig): void {
        if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
            throw new ConfigurationError(`Concurrency must be a positive integer, got ${config.concurrency}`);
        }
        if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
            throw new ConfigurationError('Timeout must be a positive number');
        }
        if (!Number.isInteger(config.retries) || config.retries < 0) {
            throw new ConfigurationError(`Retries must be a non-negative integer, got ${config.retries}`);
        }
        if (!Number.isInteger(config.maxRedirects) || config.maxRedirects < 0) {
            throw new ConfigurationError(`maxRedirects must be a non-negative integer, got ${config.maxRedirects}`);
        }
        if (config.indexName.trim() === '' || /[/\\]/.test(config.indexName)) {
            throw new ConfigurationError(`Invalid index file name: '${config.indexName}'`);
        }
    }
}

function createExplorer(): ConfigExplorer {
    return cosmiconfigSync(CONFIG_MODULE_NAME, {
        searchPlaces: [
            'package.json',
            `${CONFIG_MODULE_NAME}.config.json`,
            `.${CONFIG_MODULE_NAME}rc.json`,
            `.${CONFIG_MODULE_NAME}rc`
        ],
        packageProp: CONFIG_MODULE_NAME
    });
}

/**
 * Narrow a config file's content to the known fields
 */
function parseFileConfig(raw: unknown, source: string): Partial<AppConfig> {
    if (raw === null || raw === undefined) {
        return {};
    }
    if (typeof raw !== 'object' || Array.isArray(raw)) {
        throw new ConfigurationError(`Configuration in ${source} must be an object`);
    }

    const field = (name: string): unknown => (name in raw ? Reflect.get(raw, name) : undefined);
    const numberField = (name: string): number | undefined => {
        const value = field(name);
        if (value === undefined) return undefined;
        if (typeof value !== 'number') {
            throw new ConfigurationError(`'${name}' in ${source} must be a number`);
        }
        return value;
    };
    const stringField = (name: string): string | undefined => {
        const value = field(name);
        if (value === undefined) return undefined;
        if (typeof value !== 'string') {
            throw new ConfigurationError(`'${name}' in ${source} must be a string`);
        }
        return value;
    };
    const booleanField = (name: string): boolean | undefined => {
        const value = field(name);
        if (value === undefined) return undefined;
        if (typeof value !== 'boolean') {
            throw new ConfigurationError(`'${name}' in ${source} must be a boolean`);
        }
        return value;
    };

    const verbose = booleanField('verbose');
    const player = stringField('player');

    const config: Partial<AppConfig> = {
        concurrency: numberField('concurrency'),
        timeout: numberField('timeout'),
        retries: numberField('retries'),
        maxRedirects: numberField('maxRedirects'),
        indexName: stringField('indexName'),
        ffmpegPath: stringField('ffmpegPath'),
        verbose,
        player: player === undefined ? undefined : parsePlayer(player)
    };

    const headers = field('headers');
    if (headers !== undefined) {
        if (typeof headers !== 'object' || headers === null || Array.isArray(headers)) {
            throw new ConfigurationError(`'headers' in ${source} must be an object`);
        }
        const parsed: Record<string, string> = {};
        for (const [name, value] of Object.entries(headers)) {
            if (typeof value !== 'string') {
                throw new ConfigurationError(`Header '${name}' in ${source} must be a string`);
            }
            parsed[name] = value;
        }
        config.headers = parsed;
    }

    return config;
}

function parseNumber(value: string, name: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new ConfigurationError(`${name} must be a number, got '${value}'`);
    }
    return parsed;
}

function parsePlayer(value: string): PlayerChoice {
    const player = PLAYERS.find(candidate => candidate === value);
    if (!player) {
        throw new ConfigurationError(`Invalid player: ${value}. Must be one of: ${PLAYERS.join(', ')}`);
    }
    return player;
}
