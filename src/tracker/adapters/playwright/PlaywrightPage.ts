import { Page } from 'playwright';
import { BrowserCookie, BrowserPage, NavigationOptions, ScreenshotOptions, WaitOptions } from '../BrowserPage.js';
import { BrowserElement } from '../BrowserElement.js';
import { PlaywrightElement } from './PlaywrightElement.js';

export class PlaywrightPage implements BrowserPage {
    constructor(private page: Page) { }

    url(): string {
        return this.page.url();
    }

    async goto(url: string, options?: NavigationOptions): Promise<void> {
        await this.page.goto(url, options);
    }

    async content(): Promise<string> {
        return await this.page.content();
    }

    async evaluate(expression: string): Promise<unknown> {
        return await this.page.evaluate(expression);
    }

    async screenshot(options?: ScreenshotOptions): Promise<Buffer> {
        return await this.page.screenshot(options);
    }

    async waitForSelector(selector: string, options?: WaitOptions): Promise<BrowserElement | null> {
        const locator = this.page.locator(selector).first();
        try {
            await locator.waitFor(options);
            return new PlaywrightElement(locator);
        } catch {
            return null;
        }
    }

    async waitForTimeout(timeout: number): Promise<void> {
        await this.page.waitForTimeout(timeout);
    }

    async keyboardType(text: string, options?: { delay?: number }): Promise<void> {
        await this.page.keyboard.type(text, options);
    }

    async cookies(): Promise<BrowserCookie[]> {
        const cookies = await this.page.context().cookies();
        return cookies.map(({ name, value, domain, path }) => ({ name, value, domain, path }));
    }
}
