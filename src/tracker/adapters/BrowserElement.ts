export interface ClickOptions {
    noWaitAfter?: boolean;
    timeout?: number;
}

export interface BrowserElement {
    click(options?: ClickOptions): Promise<void>;
    fill(value: string): Promise<void>;
}
