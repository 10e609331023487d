import { Command } from 'commander';
import { ConfigOverrides, DEFAULT_CONFIG_FILE } from '../config/AppConfig.js';
import { RunMode } from '../tracker/runner.js';

export type CliOptions = {
    config: string;
    offline?: string;
    username?: string;
    password?: string;
    baseUrl?: string;
    headless?: boolean;
    channel?: string;
    output?: string;
    debugDir?: string;
    logFile?: string;
};

export function createProgram(): Command {
    return new Command()
        .name('router-device-tracker')
        .description('Sign in to the router admin UI and report connected devices')
        .version('1.0.0')
        .option('-c, --config <path>', 'JSON config file', DEFAULT_CONFIG_FILE)
        .option('--offline <html>', 'Parse a saved device-list page instead of signing in')
        .option('--username <user>', 'Admin username')
        .option('--password <pass>', 'Admin password')
        .option('--base-url <url>', 'Router admin base URL')
        .option('--headless', 'Run the browser headless')
        .option('--no-headless', 'Run the browser visibly')
        .option('--channel <name>', 'Browser channel, e.g. msedge')
        .option('-o, --output <file>', 'JSON report path')
        .option('--debug-dir <dir>', 'Directory for failure artifacts')
        .option('--log-file <file>', 'Log file path');
}

export function cliOverrides(options: CliOptions): ConfigOverrides {
    return {
        username: options.username,
        password: options.password,
        baseUrl: options.baseUrl,
        headless: options.headless,
        browserChannel: options.channel,
        outputFile: options.output,
        debugDir: options.debugDir,
        logFile: options.logFile,
    };
}

export function runMode(options: CliOptions): RunMode {
    return options.offline ? { kind: 'offline', htmlFile: options.offline } : { kind: 'live' };
}

export function parseCli(argv: readonly string[]): CliOptions {
    const program = createProgram().parse([...argv]);
    return program.opts<CliOptions>();
}
