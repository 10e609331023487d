/**
 * DeviceListExtractor
 *
 * Tries the firmware's in-page state first and falls back to the rendered
 * device table. Each strategy runs at most once per extraction. When both
 * fail, debug artifacts are saved and the extractor returns null.
 */

import { DEBUG_SCENARIOS } from '../../config/constants.js';
import type { RunLogger } from '../../shared/logging/Logger.js';
import { ErrorHandler, ErrorSeverity } from '../../shared/utils/index.js';
import { BrowserPage } from '../adapters/BrowserPage.js';
import { DebugCapture } from '../debug/DebugCapture.js';
import { parseDeviceRecords } from '../normalize/DeviceRowParser.js';
import { ExtractionResult } from '../types.js';
import { readTableRows } from './HtmlTableParser.js';
import { HtmlTableOptions, HtmlTableStrategy } from './HtmlTableStrategy.js';
import { IExtractionStrategy } from './IExtractionStrategy.js';
import { JsStateStrategy } from './JsStateStrategy.js';

export interface ExtractorOptions extends HtmlTableOptions {
    stateVariable: string;
}

export class DeviceListExtractor {
    private readonly errors: ErrorHandler;

    constructor(
        private readonly strategies: readonly IExtractionStrategy[],
        private readonly tableSelector: string,
        private readonly logger: RunLogger,
        private readonly debug?: DebugCapture
    ) {
        this.errors = new ErrorHandler(logger);
    }

    static create(options: ExtractorOptions, logger: RunLogger, debug?: DebugCapture): DeviceListExtractor {
        return new DeviceListExtractor(
            [
                new JsStateStrategy(options.stateVariable, logger),
                new HtmlTableStrategy(options, logger)
            ],
            options.tableSelector,
            logger,
            debug
        );
    }

    async extract(page: BrowserPage): Promise<ExtractionResult | null> {
        for (const [index, strategy] of this.strategies.entries()) {
            try {
                const result = await strategy.extract(page);
                this.logger.info(`[DeviceListExtractor] ${result.devices.length} device(s) via ${strategy.name}` +
                    (result.skipped > 0 ? `, ${result.skipped} row(s) skipped` : ''));
                return result;
            } catch (error) {
                const isLast = index === this.strategies.length - 1;
                this.errors.handle(
                    error,
                    { component: 'DeviceListExtractor', operation: strategy.name },
                    isLast ? ErrorSeverity.ERROR : ErrorSeverity.WARNING
                );
                if (!isLast) {
                    this.logger.info(`[DeviceListExtractor] Falling back from ${strategy.name}`);
                }
            }
        }

        this.logger.error('[DeviceListExtractor] All extraction strategies failed');
        if (this.debug) {
            await this.debug.capture(page, DEBUG_SCENARIOS.DEVICE_LIST_FAILURE);
        }
        return null;
    }

    /**
     * Offline mode: parse a previously saved device-list page with the same
     * row contract as the live table.
     */
    extractFromHtml(html: string): ExtractionResult | null {
        const rows = readTableRows(html, this.tableSelector);
        if (rows === null) {
            this.logger.error(`[DeviceListExtractor] Device table ${this.tableSelector} not found in saved page`);
            return null;
        }

        this.logger.info(`[DeviceListExtractor] Found ${rows.length} device rows in saved page`);
        const { devices, skipped } = parseDeviceRecords(
            rows.map(cells => ({ kind: 'cells' as const, cells })),
            this.logger
        );
        return { source: 'offline-html', devices, skipped };
    }
}
