import { failed, fromCategories, uncategorized } from '../../domain/entities/SourceQueryResult';
import { CaptchaSolver } from '../captcha/CaptchaSolver';
import { SessionContext } from '../http/SessionContext';
import { HttpAdapterOptions, HttpSourceAdapter, LookupOutcome } from './ReputationSourceAdapter';

interface SiteReviewResponse {
    errorType?: string;
    unrated?: boolean;
    categorization?: Array<{ name?: string }>;
}

export interface BluecoatApiAdapterOptions extends HttpAdapterOptions {
    captchaSolver: CaptchaSolver;
}

/**
 * Symantec (Bluecoat) Site Review through its JSON lookup endpoint.
 * Past a few lookups the endpoint demands an image CAPTCHA, which is solved by OCR
 * on the same session and the lookup is submitted again.
 */
export class BluecoatApiAdapter extends HttpSourceAdapter {
    readonly source = 'bluecoat' as const;
    protected readonly label = 'Bluecoat';
    private readonly captchaSolver: CaptchaSolver;

    constructor(options: BluecoatApiAdapterOptions) {
        super(options);
        this.captchaSolver = options.captchaSolver;
    }

    protected async lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        const session = new SessionContext();

        let response = await this.submit(session, domain, '', signal);
        if (response.errorType === 'captcha') {
            console.log(`[Bluecoat] ${domain}: CAPTCHA requested, solving...`);
            const solution = await this.captchaSolver.solveFromUrl(
                `${this.baseUrl}/resource/captcha.jpg?${Date.now()}`,
                session,
                signal
            );
            if (!solution.ok) {
                return { outcome: failed(`captcha: ${solution.reason}`) };
            }
            response = await this.submit(session, domain, solution.text, signal);
            if (response.errorType === 'captcha') {
                return { outcome: failed('captcha: answer rejected') };
            }
        }

        if (response.errorType) {
            throw new Error(`Site Review error: ${response.errorType}`);
        }
        if (response.unrated) {
            return { outcome: uncategorized() };
        }
        const names = (response.categorization ?? []).map((category) => category.name ?? '');
        return { outcome: fromCategories(names) };
    }

    private async submit(
        session: SessionContext,
        domain: string,
        captcha: string,
        signal: AbortSignal
    ): Promise<SiteReviewResponse> {
        const response = await this.http.post<SiteReviewResponse>(
            `${this.baseUrl}/resource/lookup`,
            { url: domain, captcha },
            {
                headers: session.headers({
                    'Content-Type': 'application/json; charset=UTF-8',
                    Referer: `${this.baseUrl}/`,
                }),
                signal,
            }
        );
        session.absorb(response.headers['set-cookie']);
        return response.data ?? {};
    }
}
