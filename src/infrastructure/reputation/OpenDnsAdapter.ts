import * as cheerio from 'cheerio';
import { fromCategories, uncategorized } from '../../domain/entities/SourceQueryResult';
import { LookupOutcome, HttpSourceAdapter } from './ReputationSourceAdapter';

/**
 * OpenDNS community tags from the public domain page.
 */
export class OpenDnsAdapter extends HttpSourceAdapter {
    readonly source = 'opendns' as const;
    protected readonly label = 'OpenDNS';

    protected async lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        const response = await this.http.get<string>(`${this.baseUrl}/${encodeURIComponent(domain)}`, {
            responseType: 'text',
            signal,
        });

        const $ = cheerio.load(String(response.data));
        const tags = $('span.normal').first();
        if (tags.length === 0) {
            return { outcome: uncategorized(), detail: 'No Tags' };
        }
        return { outcome: fromCategories(tags.text().trim().split(', ')) };
    }
}
