/**
 * A single headless browser session with one open page.
 */
export interface IBrowserSession {
    goto(url: string): Promise<void>;
    fill(selector: string, value: string): Promise<void>;
    click(selector: string): Promise<void>;
    wait(ms: number): Promise<void>;
    /**
     * @returns Text content of the first match, or null when nothing matches
     */
    textOf(selector: string): Promise<string | null>;
    close(): Promise<void>;
}

export interface BrowserLaunchOptions {
    userAgent: string;
    timeoutMs: number;
}

/**
 * Port for the headless browser engine.
 * Each launch yields a fresh, unshared session.
 */
export interface IBrowserLauncher {
    launch(options: BrowserLaunchOptions): Promise<IBrowserSession>;
}
