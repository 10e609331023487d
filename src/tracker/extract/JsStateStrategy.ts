import { ExtractionError } from '../../shared/errors.js';
import type { RunLogger } from '../../shared/logging/Logger.js';
import { JsonValidator, Validators } from '../../shared/utils/index.js';
import { BrowserPage } from '../adapters/BrowserPage.js';
import { parseDeviceRecords } from '../normalize/DeviceRowParser.js';
import { ExtractionResult } from '../types.js';
import { IExtractionStrategy } from './IExtractionStrategy.js';

/**
 * Reads the firmware's in-page device list directly, without waiting for
 * the table to render.
 */
export class JsStateStrategy implements IExtractionStrategy {
    readonly name = 'js-state';

    constructor(
        private readonly stateVariable: string,
        private readonly logger: RunLogger
    ) { }

    get expression(): string {
        return `JSON.stringify(${this.stateVariable})`;
    }

    async extract(page: BrowserPage): Promise<ExtractionResult> {
        this.logger.info(`[JsStateStrategy] Reading ${this.stateVariable} from page state...`);
        const serialized = await page.evaluate(this.expression);
        if (typeof serialized !== 'string') {
            throw new ExtractionError(`${this.stateVariable} did not serialize to JSON (got ${typeof serialized})`);
        }

        const parsed = JsonValidator.parse(serialized, Validators.array());
        if (!parsed.success) {
            throw new ExtractionError(`${this.stateVariable} is not a device array: ${parsed.error}`);
        }

        const { devices, skipped } = parseDeviceRecords(
            parsed.data.map(entry => ({ kind: 'firmware' as const, entry })),
            this.logger
        );
        this.logger.info(`[JsStateStrategy] Found ${parsed.data.length} device entries`);
        return { source: this.name, devices, skipped };
    }
}
