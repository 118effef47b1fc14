import { fromCategories, uncategorized } from '../../domain/entities/SourceQueryResult';
import { LookupOutcome, HttpSourceAdapter } from './ReputationSourceAdapter';

interface TalosLookupResponse {
    category?: { description?: string } | null;
}

/**
 * Cisco Talos web reputation category, read from the JSON endpoint behind the lookup page.
 */
export class TalosAdapter extends HttpSourceAdapter {
    readonly source = 'talos' as const;
    protected readonly label = 'Talos';

    protected async lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        const response = await this.http.get<TalosLookupResponse>(`${this.baseUrl}/sb_api/query_lookup`, {
            params: {
                query: '/api/v2/details/domain/',
                query_entry: domain,
                offset: 0,
                order: 'ip asc',
            },
            headers: {
                Referer: `${this.baseUrl}/reputation_center/lookup?search=${encodeURIComponent(domain)}`,
            },
            signal,
        });

        const category = response.data?.category;
        if (!category) {
            return { outcome: uncategorized() };
        }
        return { outcome: fromCategories([category.description ?? '']) };
    }
}
