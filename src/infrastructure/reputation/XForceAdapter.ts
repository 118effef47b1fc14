import { fromCategories, unknown } from '../../domain/entities/SourceQueryResult';
import { HttpAdapterOptions, LookupOutcome, HttpSourceAdapter } from './ReputationSourceAdapter';

interface XForceUrlResponse {
    result?: {
        cats?: Record<string, boolean>;
    };
}

export interface XForceAdapterOptions extends HttpAdapterOptions {
    /** Public UI origin the API expects in Origin/Referer */
    exchangeUrl: string;
}

/**
 * IBM X-Force Exchange URL categories.
 */
export class XForceAdapter extends HttpSourceAdapter {
    readonly source = 'xforce' as const;
    protected readonly label = 'X-Force';
    private readonly exchangeUrl: string;

    constructor(options: XForceAdapterOptions) {
        super(options);
        this.exchangeUrl = options.exchangeUrl.replace(/\/+$/, '');
    }

    protected async lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        const uiUrl = `${this.exchangeUrl}/url/${domain}`;
        const response = await this.http.get<XForceUrlResponse>(`${this.baseUrl}/url/${domain}`, {
            headers: {
                Accept: 'application/json, text/plain, */*',
                'x-ui': 'XFE',
                Origin: uiUrl,
                Referer: uiUrl,
            },
            // 404 {"error":"Not found."} means X-Force has never seen the domain
            validateStatus: (status) => (status >= 200 && status < 300) || status === 404,
            signal,
        });

        if (response.status === 404) {
            return { outcome: unknown(), detail: 'Not found' };
        }
        return { outcome: fromCategories(Object.keys(response.data?.result?.cats ?? {})) };
    }
}
