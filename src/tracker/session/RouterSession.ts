/**
 * RouterSession
 *
 * Owns the single browser session for a run: launches it, signs in to the
 * router's admin UI and hands the authenticated page to the extractor.
 * close() is safe to call on every exit path.
 */

import { DEBUG_SCENARIOS, SELECTORS, SESSION_COOKIE, TIMING, VIEWPORT } from '../../config/constants.js';
import { AuthenticationError } from '../../shared/errors.js';
import type { RunLogger } from '../../shared/logging/Logger.js';
import { BrowserContext, BrowserLauncher } from '../adapters/BrowserContext.js';
import { BrowserPage } from '../adapters/BrowserPage.js';
import { PlaywrightContext } from '../adapters/playwright/PlaywrightContext.js';
import { DebugCapture } from '../debug/DebugCapture.js';
import { HumanInput, RandomSource } from './HumanInput.js';

/** Hides the automation flag some firmware login scripts check */
export const STEALTH_INIT_SCRIPT = `Object.defineProperty(navigator, 'webdriver', { get: () => undefined });`;

export const LAUNCH_ARGS = [
    '--disable-gpu',
    `--window-size=${VIEWPORT.width},${VIEWPORT.height}`,
    '--disable-blink-features=AutomationControlled'
];

export interface RouterSessionOptions {
    baseUrl: string;
    headless: boolean;
    browserChannel?: string;
    launcher?: BrowserLauncher;
    random?: RandomSource;
}

export class RouterSession {
    private context: BrowserContext | null = null;
    private page: BrowserPage | null = null;

    constructor(
        private readonly options: RouterSessionOptions,
        private readonly logger: RunLogger,
        private readonly debug: DebugCapture
    ) { }

    get baseUrl(): string {
        return this.options.baseUrl;
    }

    async open(): Promise<BrowserPage> {
        if (this.page) return this.page;

        const launch = this.options.launcher ?? PlaywrightContext.launch;
        this.logger.info(`[RouterSession] Launching browser (headless: ${this.options.headless})...`);
        this.context = await launch({
            headless: this.options.headless,
            channel: this.options.browserChannel,
            args: LAUNCH_ARGS,
            viewport: { ...VIEWPORT },
            initScript: STEALTH_INIT_SCRIPT
        });
        this.page = await this.context.newPage();
        return this.page;
    }

    /**
     * Fill and submit the login form, then wait for the session cookie.
     * Throws AuthenticationError after saving debug artifacts.
     */
    async login(username: string, password: string): Promise<BrowserPage> {
        const page = await this.open();

        try {
            this.logger.info(`[RouterSession] Navigating to ${this.options.baseUrl}/ ...`);
            await page.goto(`${this.options.baseUrl}/`, { waitUntil: 'domcontentloaded', timeout: TIMING.NAVIGATION_TIMEOUT });

            const form = await page.waitForSelector(SELECTORS.LOGIN_FORM, { state: 'attached', timeout: TIMING.LOGIN_FORM_TIMEOUT });
            if (!form) {
                throw new AuthenticationError(`Login form not found within ${TIMING.LOGIN_FORM_TIMEOUT}ms`);
            }

            const usernameField = await page.waitForSelector(SELECTORS.USERNAME_INPUT, { timeout: TIMING.LOGIN_FORM_TIMEOUT });
            const passwordField = await page.waitForSelector(SELECTORS.PASSWORD_INPUT, { timeout: TIMING.LOGIN_FORM_TIMEOUT });
            const submit = await page.waitForSelector(SELECTORS.LOGIN_BUTTON, { timeout: TIMING.LOGIN_FORM_TIMEOUT });
            if (!usernameField || !passwordField || !submit) {
                throw new AuthenticationError('Login form is missing the username, password or submit control');
            }

            this.logger.info('[RouterSession] Entering credentials...');
            const input = new HumanInput(page, this.options.random);
            await input.type(usernameField, username);
            await input.type(passwordField, password);
            await submit.click();

            await this.waitForSessionCookie(page);
            this.logger.info('[RouterSession] Login successful');
            return page;
        } catch (error) {
            const failure = error instanceof AuthenticationError
                ? error
                : new AuthenticationError(`Login failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
            this.logger.error(`[RouterSession] ${failure.message}`);
            await this.debug.capture(page, DEBUG_SCENARIOS.LOGIN_FAILURE);
            throw failure;
        }
    }

    private async waitForSessionCookie(page: BrowserPage): Promise<void> {
        const deadline = Date.now() + TIMING.SESSION_COOKIE_TIMEOUT;
        for (;;) {
            const cookies = await page.cookies();
            if (cookies.some(cookie => cookie.name === SESSION_COOKIE)) return;
            if (Date.now() >= deadline) {
                throw new AuthenticationError(`Session cookie "${SESSION_COOKIE}" not set within ${TIMING.SESSION_COOKIE_TIMEOUT}ms`);
            }
            await page.waitForTimeout(TIMING.COOKIE_POLL_INTERVAL);
        }
    }

    async close(): Promise<void> {
        const context = this.context;
        this.context = null;
        this.page = null;
        if (context) {
            await context.close();
            this.logger.info('[RouterSession] Browser closed');
        }
    }
}
