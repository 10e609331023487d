import { BrowserPage } from './BrowserPage.js';

export interface LaunchOptions {
    headless: boolean;
    /** Browser channel such as "msedge"; bundled Chromium when unset */
    channel?: string;
    args?: string[];
    viewport?: { width: number; height: number };
    /** Script run in every page before its own scripts */
    initScript?: string;
}

export interface BrowserContext {
    newPage(): Promise<BrowserPage>;
    close(): Promise<void>;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<BrowserContext>;
