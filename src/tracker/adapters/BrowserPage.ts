import { BrowserElement } from './BrowserElement.js';

export interface NavigationOptions {
    waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit';
    timeout?: number;
}

export interface WaitOptions {
    timeout?: number;
    state?: 'attached' | 'detached' | 'visible' | 'hidden';
}

export interface ScreenshotOptions {
    fullPage?: boolean;
    type?: 'png' | 'jpeg';
}

export interface BrowserCookie {
    name: string;
    value: string;
    domain: string;
    path: string;
}

export interface BrowserPage {
    url(): string;
    goto(url: string, options?: NavigationOptions): Promise<void>;
    content(): Promise<string>;
    /** Evaluate a script expression in the page and return its result */
    evaluate(expression: string): Promise<unknown>;
    screenshot(options?: ScreenshotOptions): Promise<Buffer>;
    /** Resolves null when the selector does not appear in time */
    waitForSelector(selector: string, options?: WaitOptions): Promise<BrowserElement | null>;
    waitForTimeout(timeout: number): Promise<void>;
    keyboardType(text: string, options?: { delay?: number }): Promise<void>;
    cookies(): Promise<BrowserCookie[]>;
}
