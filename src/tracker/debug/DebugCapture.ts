import * as path from 'path';
import { DEBUG_SCENARIOS, type DebugScenario } from '../../config/constants.js';
import type { RunLogger } from '../../shared/logging/Logger.js';
import { ErrorHandler, ErrorSeverity, FileSystemHelper } from '../../shared/utils/index.js';
import { BrowserPage } from '../adapters/BrowserPage.js';

export interface DebugArtifacts {
    screenshot?: string;
    html?: string;
    state?: string;
}

/** `YYYYMMDD_HHMMSS` in local time */
export function debugTimestamp(date: Date = new Date()): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Saves what the page looked like when a stage failed. Nothing here throws;
 * each artifact is attempted on its own.
 */
export class DebugCapture {
    private readonly errors: ErrorHandler;
    private readonly files: FileSystemHelper;

    constructor(
        private readonly debugDir: string,
        private readonly logger: RunLogger,
        private readonly stateVariable?: string,
        private readonly now: () => Date = () => new Date()
    ) {
        this.errors = new ErrorHandler(logger);
        this.files = new FileSystemHelper(this.errors);
    }

    async capture(page: BrowserPage, scenario: DebugScenario): Promise<DebugArtifacts> {
        const base = path.join(this.debugDir, `${scenario}_${debugTimestamp(this.now())}`);
        const artifacts: DebugArtifacts = {};
        const context = { component: 'DebugCapture', data: { scenario } };

        const png = await this.errors.safeExecute<Buffer | null>(
            () => page.screenshot({ fullPage: true, type: 'png' }),
            { ...context, operation: 'screenshot' },
            null
        );
        if (png && this.files.writeBuffer(`${base}.png`, png)) {
            artifacts.screenshot = `${base}.png`;
        }

        const html = await this.errors.safeExecute<string | null>(
            () => page.content(),
            { ...context, operation: 'pageSource' },
            null
        );
        if (html !== null && this.files.writeText(`${base}.html`, html)) {
            artifacts.html = `${base}.html`;
        }

        // Firmware state only exists once the session reaches the device pages
        if (this.stateVariable && scenario === DEBUG_SCENARIOS.DEVICE_LIST_FAILURE) {
            const expression = `JSON.stringify(typeof ${this.stateVariable} === 'undefined' ? null : ${this.stateVariable}, null, 2)`;
            const state = await this.errors.safeExecute<unknown>(
                () => page.evaluate(expression),
                { ...context, operation: 'stateSnapshot' },
                null,
                ErrorSeverity.WARNING
            );
            if (typeof state === 'string' && state !== 'null' && this.files.writeText(`${base}.state.json`, state)) {
                artifacts.state = `${base}.state.json`;
            }
        }

        this.logger.info(`[DebugCapture] Saved ${Object.keys(artifacts).length} artifact(s) for ${scenario} under ${base}.*`);
        return artifacts;
    }
}
