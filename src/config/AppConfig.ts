/**
 * Run configuration: built-in defaults, overlaid by an optional JSON file,
 * then by environment variables (loaded through dotenv by the CLI), then by
 * CLI flags.
 */

import { ConfigLoadError } from '../shared/errors.js';
import type { RunLogger } from '../shared/logging/Logger.js';
import { ErrorHandler, ErrorSeverity, FileSystemHelper, JsonValidator, Validators, createObjectValidator } from '../shared/utils/index.js';

export interface AppConfig {
    username: string;
    password: string;
    headless: boolean;
    baseUrl: string;
    debugDir: string;
    outputFile: string;
    /** Set from the environment or CLI only; the logger exists before the config file is read */
    logFile: string;
    /** Playwright browser channel, e.g. "msedge"; bundled Chromium when unset */
    browserChannel?: string;
    /** Page that renders the device table */
    deviceListPath: string;
    deviceTableSelector: string;
    /** In-page variable holding the firmware's device list */
    stateVariable: string;
}

export type ConfigOverrides = Partial<AppConfig>;

export const DEFAULT_CONFIG_FILE = 'tracker.config.json';

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
    username: 'admin',
    password: '',
    headless: false,
    baseUrl: 'http://192.168.10.254',
    debugDir: 'debug',
    outputFile: 'device_report.json',
    logFile: 'device_tracker.log',
    deviceListPath: '/device_status.cgi',
    deviceTableSelector: 'tbody#devicelist',
    stateVariable: 'device_cfg',
};

type ConfigFile = {
    username?: string;
    password?: string;
    headless?: boolean;
    baseUrl?: string;
    debugDir?: string;
    outputFile?: string;
    browserChannel?: string;
    deviceListPath?: string;
    deviceTableSelector?: string;
    stateVariable?: string;
};

const optionalString = Validators.optional(Validators.string);

const CONFIG_FILE_FIELDS = {
    username: optionalString,
    password: optionalString,
    headless: Validators.optional(Validators.boolean),
    baseUrl: optionalString,
    debugDir: optionalString,
    outputFile: optionalString,
    browserChannel: optionalString,
    deviceListPath: optionalString,
    deviceTableSelector: optionalString,
    stateVariable: optionalString,
} satisfies { [K in keyof ConfigFile]-?: (value: unknown) => boolean };

const isConfigFile = createObjectValidator<ConfigFile>(CONFIG_FILE_FIELDS);

function pickConfigFields(file: ConfigFile): ConfigOverrides {
    const picked: ConfigOverrides = {};
    for (const key of Object.keys(CONFIG_FILE_FIELDS)) {
        const value: unknown = Reflect.get(file, key);
        if (value !== undefined) {
            Object.assign(picked, { [key]: value });
        }
    }
    return picked;
}

/**
 * Read the JSON config file. A missing or malformed file is reported as a
 * ConfigLoadError warning and yields no overrides.
 */
export function loadConfigFile(filePath: string, logger: RunLogger): ConfigOverrides {
    const errors = new ErrorHandler(logger);
    const content = new FileSystemHelper(errors).readText(filePath);
    const context = { component: 'Config', operation: 'loadConfigFile' };
    if (content === null) {
        errors.handle(
            new ConfigLoadError(`Config file ${filePath} not found. Using defaults`, filePath),
            context,
            ErrorSeverity.WARNING
        );
        return {};
    }

    const result = JsonValidator.parse(content, isConfigFile);
    if (!result.success) {
        errors.handle(
            new ConfigLoadError(`Malformed config file ${filePath}: ${result.error}. Using defaults`, filePath),
            context,
            ErrorSeverity.WARNING
        );
        return {};
    }

    logger.info(`[Config] Loaded ${filePath}`);
    return pickConfigFields(result.data);
}

function parseBoolean(value: string | undefined): boolean | undefined {
    if (value === undefined) return undefined;
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return undefined;
}

/**
 * Overrides from ROUTER_* environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
    return dropUndefined({
        username: env.ROUTER_USERNAME,
        password: env.ROUTER_PASSWORD,
        baseUrl: env.ROUTER_BASE_URL,
        headless: parseBoolean(env.ROUTER_HEADLESS),
        logFile: env.ROUTER_LOG_FILE,
    });
}

function dropUndefined(overrides: ConfigOverrides): ConfigOverrides {
    const result: ConfigOverrides = {};
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            Object.assign(result, { [key]: value });
        }
    }
    return result;
}

export function resolveConfig(...layers: ConfigOverrides[]): AppConfig {
    let config: AppConfig = { ...DEFAULT_CONFIG };
    for (const layer of layers) {
        config = { ...config, ...dropUndefined(layer) };
    }
    config.baseUrl = config.baseUrl.replace(/\/+$/, '');
    return config;
}
