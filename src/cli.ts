#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { configFromEnv, DEFAULT_CONFIG, loadConfigFile, resolveConfig } from './config/AppConfig.js';
import { cliOverrides, parseCli, runMode } from './cli/program.js';
import { closeRunLogger, createRunLogger } from './shared/logging/Logger.js';
import { ExitCode, TrackerRunner } from './tracker/runner.js';

dotenv.config();

async function main(): Promise<ExitCode> {
    const options = parseCli(process.argv);
    const fromEnv = configFromEnv(process.env);
    const fromCli = cliOverrides(options);

    const logger = createRunLogger({ logFile: fromCli.logFile ?? fromEnv.logFile ?? DEFAULT_CONFIG.logFile });
    try {
        const config = resolveConfig(loadConfigFile(options.config, logger), fromEnv, fromCli);
        return await new TrackerRunner({ config, logger }).run(runMode(options));
    } finally {
        await closeRunLogger(logger);
    }
}

main().then(
    code => { process.exitCode = code; },
    error => {
        console.error('[router-device-tracker] Fatal:', error);
        process.exitCode = ExitCode.FATAL;
    }
);
