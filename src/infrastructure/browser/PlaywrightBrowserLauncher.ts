import { Browser, BrowserContext, Page, chromium } from 'playwright-core';
import { BrowserLaunchOptions, IBrowserLauncher, IBrowserSession } from '../../domain/ports/IBrowserLauncher';

/**
 * One headless Chromium with a single page. Closing it closes the whole browser.
 */
class PlaywrightBrowserSession implements IBrowserSession {
    private closed = false;

    constructor(
        private readonly browser: Browser,
        private readonly context: BrowserContext,
        private readonly page: Page
    ) { }

    async goto(url: string): Promise<void> {
        await this.page.goto(url, { waitUntil: 'domcontentloaded' });
    }

    async fill(selector: string, value: string): Promise<void> {
        await this.page.fill(selector, value);
    }

    async click(selector: string): Promise<void> {
        await this.page.click(selector);
    }

    async wait(ms: number): Promise<void> {
        await this.page.waitForTimeout(ms);
    }

    async textOf(selector: string): Promise<string | null> {
        const element = await this.page.$(selector);
        return element ? element.textContent() : null;
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.context.close();
        await this.browser.close();
    }
}

/**
 * Launches Chromium through playwright-core. The browser binary comes from the host
 * (executablePath) or from a prior `playwright install chromium`.
 */
export class PlaywrightBrowserLauncher implements IBrowserLauncher {
    constructor(private readonly executablePath?: string) { }

    async launch(options: BrowserLaunchOptions): Promise<IBrowserSession> {
        const browser = await chromium.launch({
            headless: true,
            executablePath: this.executablePath,
            timeout: options.timeoutMs,
            args: ['--no-sandbox', '--disable-setuid-sandbox'],
        });

        try {
            const context = await browser.newContext({
                userAgent: options.userAgent,
                viewport: { width: 1920, height: 1080 },
            });
            const page = await context.newPage();
            page.setDefaultTimeout(options.timeoutMs);
            return new PlaywrightBrowserSession(browser, context, page);
        } catch (error) {
            await browser.close();
            throw error;
        }
    }
}
