import { AxiosInstance } from 'axios';
import { IMalwareDomainFeed, MalwareDomainList } from '../../domain/ports/IMalwareDomainFeed';
import { describeHttpError } from '../http/HttpClient';
import { RetryOptions, isRetryableHttpError, withRetry } from '../resilience/RetryUtils';

/**
 * Plaintext feed parsed into a set: one domain per line, blank and # lines ignored.
 */
export class MalwareDomainSet implements MalwareDomainList {
    private readonly domains: ReadonlySet<string>;

    constructor(text: string) {
        this.domains = new Set(
            text
                .split(/\r?\n/)
                .map((line) => line.trim())
                .filter((line) => line.length > 0 && !line.startsWith('#'))
        );
    }

    contains(domain: string): boolean {
        return this.domains.has(domain.trim());
    }

    get size(): number {
        return this.domains.size;
    }
}

/**
 * Downloads the malwaredomains.com "justdomains" list.
 */
export class MalwareDomainFeedClient implements IMalwareDomainFeed {
    constructor(
        private readonly http: AxiosInstance,
        private readonly url: string,
        private readonly retry: RetryOptions = {}
    ) { }

    async fetch(signal?: AbortSignal): Promise<MalwareDomainList | null> {
        try {
            const response = await withRetry(
                () => this.http.get<string>(this.url, { responseType: 'text', signal }),
                {
                    isRetryable: isRetryableHttpError,
                    onRetry: (attempt, error, nextDelayMs) =>
                        console.warn(
                            `[MalwareFeed] Attempt ${attempt} failed (${describeHttpError(error)}), retrying in ${Math.round(nextDelayMs)}ms`
                        ),
                    ...this.retry,
                    signal,
                }
            );
            const list = new MalwareDomainSet(String(response.data));
            console.log(`[MalwareFeed] Loaded ${list.size} domains`);
            return list;
        } catch (error) {
            console.error(`[MalwareFeed] Error reaching ${this.url}: ${describeHttpError(error)}`);
            return null;
        }
    }
}
