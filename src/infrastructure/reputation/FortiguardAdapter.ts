import { success, uncategorized } from '../../domain/entities/SourceQueryResult';
import { LookupOutcome, HttpSourceAdapter } from './ReputationSourceAdapter';

// <meta property="description" content="Category: Education" />
const CATEGORY_PATTERN = /Category: (.*?)" \/>/s;

/**
 * Fortiguard web filter category, scraped from the lookup page.
 */
export class FortiguardAdapter extends HttpSourceAdapter {
    readonly source = 'fortiguard' as const;
    protected readonly label = 'Fortiguard';

    protected async lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        const response = await this.http.get<string>(`${this.baseUrl}/webfilter`, {
            params: { q: domain },
            headers: {
                Origin: this.baseUrl,
                Referer: `${this.baseUrl}/webfilter`,
            },
            responseType: 'text',
            signal,
        });

        return parseFortiguardPage(String(response.data));
    }
}

export function parseFortiguardPage(html: string): LookupOutcome {
    const match = CATEGORY_PATTERN.exec(html);
    const category = match?.[1]?.trim();
    return category ? { outcome: success([category]) } : { outcome: uncategorized() };
}
