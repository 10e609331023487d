import { BrowserPage } from '../adapters/BrowserPage.js';
import { ExtractionResult, ExtractionSource } from '../types.js';

/**
 * One way of reading the device list from a live page (Strategy Pattern).
 * Implementations throw when their source is unavailable.
 */
export interface IExtractionStrategy {
    readonly name: ExtractionSource;
    extract(page: BrowserPage): Promise<ExtractionResult>;
}
