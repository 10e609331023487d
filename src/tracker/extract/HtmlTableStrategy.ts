import { TIMING } from '../../config/constants.js';
import { ExtractionError } from '../../shared/errors.js';
import type { RunLogger } from '../../shared/logging/Logger.js';
import { BrowserPage } from '../adapters/BrowserPage.js';
import { parseDeviceRecords } from '../normalize/DeviceRowParser.js';
import { ExtractionResult } from '../types.js';
import { readTableRows } from './HtmlTableParser.js';
import { IExtractionStrategy } from './IExtractionStrategy.js';

export interface HtmlTableOptions {
    baseUrl: string;
    deviceListPath: string;
    tableSelector: string;
}

/**
 * Opens the device-list page, waits for the table and parses the rendered
 * rows.
 */
export class HtmlTableStrategy implements IExtractionStrategy {
    readonly name = 'html-table';

    constructor(
        private readonly options: HtmlTableOptions,
        private readonly logger: RunLogger
    ) { }

    get url(): string {
        return `${this.options.baseUrl}${this.options.deviceListPath}`;
    }

    async extract(page: BrowserPage): Promise<ExtractionResult> {
        this.logger.info(`[HtmlTableStrategy] Loading ${this.url}...`);
        await page.goto(this.url, { waitUntil: 'domcontentloaded', timeout: TIMING.NAVIGATION_TIMEOUT });

        const table = await page.waitForSelector(this.options.tableSelector, {
            state: 'attached',
            timeout: TIMING.DEVICE_TABLE_TIMEOUT
        });
        if (!table) {
            throw new ExtractionError(`Device table ${this.options.tableSelector} not found within ${TIMING.DEVICE_TABLE_TIMEOUT}ms`);
        }

        const rows = readTableRows(await page.content(), this.options.tableSelector);
        if (rows === null) {
            throw new ExtractionError(`Device table ${this.options.tableSelector} missing from page source`);
        }

        this.logger.info(`[HtmlTableStrategy] Found ${rows.length} device rows`);
        const { devices, skipped } = parseDeviceRecords(
            rows.map(cells => ({ kind: 'cells' as const, cells })),
            this.logger
        );
        return { source: this.name, devices, skipped };
    }
}
