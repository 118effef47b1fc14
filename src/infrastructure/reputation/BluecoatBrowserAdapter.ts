import { SourceQueryResult, fromCategories } from '../../domain/entities/SourceQueryResult';
import { IBrowserLauncher, IBrowserSession } from '../../domain/ports/IBrowserLauncher';
import { AdapterOptions, LookupOutcome, ReputationSourceAdapter } from './ReputationSourceAdapter';

export interface BluecoatBrowserAdapterOptions extends AdapterOptions {
    launcher: IBrowserLauncher;
    userAgent: string;
    /** Pause between the two submit clicks */
    submitDelayMs: number;
    /** Fixed wait for the asynchronous result to render */
    settleDelayMs: number;
}

/**
 * Holds the browser session of one invocation and closes it exactly once.
 */
class ScopedBrowserSession {
    private pending: Promise<IBrowserSession> | null = null;
    private closing: Promise<void> | null = null;

    constructor(private readonly open: () => Promise<IBrowserSession>) { }

    acquire(): Promise<IBrowserSession> {
        if (this.closing) {
            return Promise.reject(new Error('browser session already released'));
        }
        if (!this.pending) {
            this.pending = this.open();
        }
        return this.pending;
    }

    /**
     * Idempotent; every caller waits for the same close. Never rejects.
     */
    release(): Promise<void> {
        if (!this.closing) {
            this.closing = this.closePending();
        }
        return this.closing;
    }

    private async closePending(): Promise<void> {
        if (!this.pending) return;
        try {
            const session = await this.pending;
            await session.close();
        } catch (error) {
            console.warn('[Bluecoat] Failed to close browser session:', error);
        }
    }
}

/**
 * Symantec (Bluecoat) Site Review, driven through a real browser.
 * Completion of the lookup is not observable from outside the page, hence the fixed settle delay.
 */
export class BluecoatBrowserAdapter extends ReputationSourceAdapter {
    readonly source = 'bluecoat' as const;
    protected readonly label = 'Bluecoat';
    private readonly launcher: IBrowserLauncher;
    private readonly userAgent: string;
    private readonly submitDelayMs: number;
    private readonly settleDelayMs: number;

    constructor(options: BluecoatBrowserAdapterOptions) {
        super(options);
        this.launcher = options.launcher;
        this.userAgent = options.userAgent;
        this.submitDelayMs = options.submitDelayMs;
        this.settleDelayMs = options.settleDelayMs;
    }

    async query(domain: string, signal?: AbortSignal): Promise<SourceQueryResult> {
        const scope = new ScopedBrowserSession(() =>
            this.launcher.launch({ userAgent: this.userAgent, timeoutMs: this.timeoutMs })
        );
        try {
            return await this.run(domain, signal, (bounded) => this.readCategory(scope, domain, bounded));
        } finally {
            // Also runs after a timeout, so no browser outlives the invocation
            await scope.release();
        }
    }

    private async readCategory(scope: ScopedBrowserSession, domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        const onAbort = () => {
            void scope.release();
        };
        signal.addEventListener('abort', onAbort, { once: true });

        try {
            const session = await scope.acquire();
            await session.goto(`${this.baseUrl}/#/`);
            await session.fill('#txtSearch', domain);
            // The first click only gets past the acceptable-use interstitial
            await session.click('#btnLookupSubmit');
            await session.wait(this.submitDelayMs);
            await session.click('#btnLookupSubmit');
            await session.wait(this.settleDelayMs);

            const text = await session.textOf('.clickable-category');
            return { outcome: fromCategories(text ? [text] : []) };
        } finally {
            signal.removeEventListener('abort', onAbort);
        }
    }
}
