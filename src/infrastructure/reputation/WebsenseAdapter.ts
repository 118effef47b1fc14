import * as cheerio from 'cheerio';
import { failed, fromCategories } from '../../domain/entities/SourceQueryResult';
import { UnexpectedPageStructureError } from '../../domain/errors/ReviewErrors';
import { SessionContext } from '../http/SessionContext';
import { LookupOutcome, HttpSourceAdapter } from './ReputationSourceAdapter';

// <span class="reports">5 reports left today</span>
const QUOTA_PATTERN = /reports">(.*?) report/s;

// Fifth classAction cell of the report table holds the category
const CATEGORY_CELL_INDEX = 4;

/**
 * Forcepoint (Websense) CSI lookup.
 *
 * The service grants a small number of reports per source address and day;
 * the landing page shows what is left. A lookup is only submitted while some remain.
 */
export class WebsenseAdapter extends HttpSourceAdapter {
    readonly source = 'websense' as const;
    protected readonly label = 'Websense';

    protected async lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        const session = new SessionContext();
        const landing = await this.http.get<string>(`${this.baseUrl}/`, {
            headers: session.headers(),
            responseType: 'text',
            signal,
        });
        session.absorb(landing.headers['set-cookie']);

        const remaining = parseRemainingReports(String(landing.data));
        console.log(`[${this.label}] ${remaining} reports left for today`);
        if (remaining <= 0) {
            return { outcome: failed('daily quota exhausted') };
        }

        const report = await this.http.post<string>(
            `${this.baseUrl}/`,
            new URLSearchParams({ LookupUrl: domain }).toString(),
            {
                headers: session.headers({
                    Referer: `${this.baseUrl}/`,
                    'Content-Type': 'application/x-www-form-urlencoded',
                }),
                responseType: 'text',
                signal,
            }
        );

        return parseWebsenseReport(String(report.data));
    }
}

/**
 * @throws UnexpectedPageStructureError when the quota counter is missing or not a number
 */
export function parseRemainingReports(html: string): number {
    const raw = QUOTA_PATTERN.exec(html)?.[1]?.trim();
    const remaining = raw === undefined ? NaN : Number.parseInt(raw, 10);
    if (Number.isNaN(remaining)) {
        throw new UnexpectedPageStructureError('remaining report count');
    }
    return remaining;
}

export function parseWebsenseReport(html: string): LookupOutcome {
    const $ = cheerio.load(html);
    const cell = $('td.classAction').eq(CATEGORY_CELL_INDEX);
    if (cell.length === 0) {
        throw new UnexpectedPageStructureError('category cell');
    }
    return { outcome: fromCategories([cell.text()]) };
}
