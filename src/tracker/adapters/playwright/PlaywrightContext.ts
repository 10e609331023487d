import { chromium, Browser, BrowserContext as PWContext } from 'playwright';
import { BrowserContext, LaunchOptions } from '../BrowserContext.js';
import { BrowserPage } from '../BrowserPage.js';
import { PlaywrightPage } from './PlaywrightPage.js';

export class PlaywrightContext implements BrowserContext {
    constructor(private browser: Browser, private context: PWContext) { }

    static async launch(options: LaunchOptions): Promise<PlaywrightContext> {
        const browser = await chromium.launch({
            headless: options.headless,
            channel: options.channel,
            args: options.args
        });

        try {
            const context = await browser.newContext({ viewport: options.viewport });
            if (options.initScript) {
                await context.addInitScript(options.initScript);
            }
            return new PlaywrightContext(browser, context);
        } catch (error) {
            await browser.close();
            throw error;
        }
    }

    async newPage(): Promise<BrowserPage> {
        const page = await this.context.newPage();
        return new PlaywrightPage(page);
    }

    async close(): Promise<void> {
        await this.context.close();
        await this.browser.close();
    }
}
