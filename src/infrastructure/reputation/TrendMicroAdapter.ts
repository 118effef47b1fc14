import * as cheerio from 'cheerio';
import { AxiosResponse } from 'axios';
import { fromCategories, uncategorized } from '../../domain/entities/SourceQueryResult';
import { AntiBotChallengeError } from '../../domain/errors/ReviewErrors';
import { SessionContext } from '../http/SessionContext';
import { LookupOutcome, HttpSourceAdapter } from './ReputationSourceAdapter';

/**
 * Trend Micro Site Safety Center.
 *
 * Three steps on one session: load the index (sets the session cookie),
 * register the URL with lib/idn.php, then submit result.php.
 * A redirect to captcha.php means the service wants a human.
 */
export class TrendMicroAdapter extends HttpSourceAdapter {
    readonly source = 'trendmicro' as const;
    protected readonly label = 'TrendMicro';

    protected async lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        const session = new SessionContext();

        await this.step(session, 'GET', '/', undefined, {}, signal);

        await this.step(session, 'POST', '/lib/idn.php', { url: domain }, {
            Accept: '*/*',
            Origin: this.baseUrl,
            'X-Requested-With': 'XMLHttpRequest',
            Referer: `${this.baseUrl}/index.php`,
        }, signal);

        const result = await this.step(session, 'POST', '/result.php', { urlname: domain, getinfo: 'Check Now' }, {
            Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
            Origin: this.baseUrl,
            Referer: `${this.baseUrl}/index.php`,
        }, signal);

        return parseTrendMicroResult(String(result.data));
    }

    private async step(
        session: SessionContext,
        method: 'GET' | 'POST',
        path: string,
        form: Record<string, string> | undefined,
        headers: Record<string, string>,
        signal: AbortSignal
    ): Promise<AxiosResponse<string>> {
        const response = await this.http.request<string>({
            method,
            url: `${this.baseUrl}${path}`,
            data: form ? new URLSearchParams(form).toString() : undefined,
            headers: session.headers(
                form ? { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' } : headers
            ),
            responseType: 'text',
            // Redirects are inspected here, not followed, so cookies and challenges are not lost
            maxRedirects: 0,
            validateStatus: (status) => status >= 200 && status < 400,
            signal,
        });
        session.absorb(response.headers['set-cookie']);

        if (response.status >= 300) {
            const location = String(response.headers['location'] ?? '');
            if (location.toLowerCase().includes('captcha')) {
                throw new AntiBotChallengeError(`redirected to ${location}`);
            }
            throw new Error(`unexpected redirect to ${location || 'nowhere'}`);
        }
        return response;
    }
}

export function parseTrendMicroResult(html: string): LookupOutcome {
    const $ = cheerio.load(html);
    const label = $('div.labeltitlesmallresult').first();
    if (label.length === 0) {
        return { outcome: uncategorized() };
    }
    return { outcome: fromCategories(label.text().trim().split(', ')) };
}
