import { Locator } from 'playwright';
import { BrowserElement, ClickOptions } from '../BrowserElement.js';

export class PlaywrightElement implements BrowserElement {
    constructor(private locator: Locator) { }

    async click(options?: ClickOptions): Promise<void> {
        await this.locator.click(options);
    }

    async fill(value: string): Promise<void> {
        await this.locator.fill(value);
    }
}
