/**
 * TrackerRunner
 *
 * One pass: sign in (or read a saved page), extract, report. The browser
 * session is released in a finally block whichever stage fails.
 */

import { AppConfig } from '../config/AppConfig.js';
import { AuthenticationError } from '../shared/errors.js';
import type { RunLogger } from '../shared/logging/Logger.js';
import { ErrorHandler, FileSystemHelper } from '../shared/utils/index.js';
import { BrowserLauncher } from './adapters/BrowserContext.js';
import { DebugCapture } from './debug/DebugCapture.js';
import { DeviceListExtractor } from './extract/DeviceListExtractor.js';
import { ReportSink } from './report/ReportSink.js';
import { RandomSource } from './session/HumanInput.js';
import { RouterSession } from './session/RouterSession.js';
import { ExtractionResult } from './types.js';

export interface RunContext {
    config: AppConfig;
    logger: RunLogger;
}

export type RunMode =
    | { kind: 'live' }
    | { kind: 'offline'; htmlFile: string };

export enum ExitCode {
    SUCCESS = 0,
    FAILURE = 1,
    FATAL = 2
}

export interface RunnerDependencies {
    launcher?: BrowserLauncher;
    random?: RandomSource;
    reportSink?: ReportSink;
}

export class TrackerRunner {
    private readonly errors: ErrorHandler;
    private readonly debug: DebugCapture;
    private readonly extractor: DeviceListExtractor;
    private readonly sink: ReportSink;

    constructor(
        private readonly ctx: RunContext,
        private readonly deps: RunnerDependencies = {}
    ) {
        const { config, logger } = ctx;
        this.errors = new ErrorHandler(logger);
        this.debug = new DebugCapture(config.debugDir, logger, config.stateVariable);
        this.extractor = DeviceListExtractor.create({
            baseUrl: config.baseUrl,
            deviceListPath: config.deviceListPath,
            tableSelector: config.deviceTableSelector,
            stateVariable: config.stateVariable
        }, logger, this.debug);
        this.sink = deps.reportSink ?? new ReportSink(logger);
    }

    async run(mode: RunMode): Promise<ExitCode> {
        try {
            const result = mode.kind === 'offline'
                ? this.runOffline(mode.htmlFile)
                : await this.runLive();
            return this.report(result);
        } catch (error) {
            if (error instanceof AuthenticationError) {
                this.ctx.logger.error('[TrackerRunner] Login failed, see log and debug artifacts');
                return ExitCode.FAILURE;
            }
            const err = error instanceof Error ? error : new Error(String(error));
            this.ctx.logger.critical(`[TrackerRunner.${mode.kind}] Unhandled failure: ${err.message}`);
            this.ctx.logger.critical(`[TrackerRunner.${mode.kind}] Stack: ${err.stack ?? '(no stack)'}`);
            return ExitCode.FATAL;
        }
    }

    private async runLive(): Promise<ExtractionResult | null> {
        const { config, logger } = this.ctx;
        const session = new RouterSession({
            baseUrl: config.baseUrl,
            headless: config.headless,
            browserChannel: config.browserChannel,
            launcher: this.deps.launcher,
            random: this.deps.random
        }, logger, this.debug);

        try {
            const page = await session.login(config.username, config.password);
            return await this.extractor.extract(page);
        } finally {
            await this.errors.safeExecute(
                () => session.close(),
                { component: 'TrackerRunner', operation: 'closeSession' },
                undefined
            );
        }
    }

    private runOffline(htmlFile: string): ExtractionResult | null {
        this.ctx.logger.info(`[TrackerRunner] Parsing saved page ${htmlFile}`);
        const html = new FileSystemHelper(this.errors).readText(htmlFile);
        if (html === null) {
            this.ctx.logger.error(`[TrackerRunner] Cannot read ${htmlFile}`);
            return null;
        }
        return this.extractor.extractFromHtml(html);
    }

    private report(result: ExtractionResult | null): ExitCode {
        if (!result || result.devices.length === 0) {
            this.ctx.logger.warn('[TrackerRunner] No valid device data retrieved');
            return ExitCode.FAILURE;
        }

        this.sink.print(result.devices);
        return this.sink.writeJson(result.devices, this.ctx.config.outputFile)
            ? ExitCode.SUCCESS
            : ExitCode.FAILURE;
    }
}
