import { MissingCredentialError } from '../../domain/errors/ReviewErrors';
import {
    IPrimarySourceAdapter,
    PassiveDnsResolution,
    PrimaryDetections,
    PrimaryLookup,
} from '../../domain/ports/IPrimarySourceAdapter';
import { failed, fromCategories, unknown } from '../../domain/entities/SourceQueryResult';
import { HttpAdapterOptions, LookupOutcome, HttpSourceAdapter } from './ReputationSourceAdapter';

/**
 * Fields of the v2 /domain/report response the review depends on.
 * See https://developers.virustotal.com/v2.0/reference#domain-report
 */
export interface VirusTotalDomainReport {
    response_code?: number;
    verbose_msg?: string;
    /** A list in older responses, a provider -> category mapping in newer ones */
    categories?: string[] | Record<string, string>;
    detected_downloaded_samples?: unknown[];
    detected_urls?: unknown[];
    resolutions?: Array<{ ip_address?: string; last_resolved?: string }>;
}

interface ParsedReport extends LookupOutcome {
    detections: PrimaryDetections;
    resolutions: PassiveDnsResolution[];
}

const NO_DETECTIONS: PrimaryDetections = { downloadedSamples: 0, urls: 0 };

export interface VirusTotalAdapterOptions extends HttpAdapterOptions {
    apiKey: string;
}

/**
 * Primary detection source: VirusTotal's public domain report API.
 * Supplies categories, detection counts and passive DNS history.
 */
export class VirusTotalAdapter extends HttpSourceAdapter implements IPrimarySourceAdapter {
    readonly source = 'virustotal' as const;
    protected readonly label = 'VirusTotal';
    private readonly apiKey: string;

    constructor(options: VirusTotalAdapterOptions) {
        super(options);
        this.apiKey = options.apiKey.trim();
    }

    ensureConfigured(): void {
        if (!this.apiKey) {
            throw new MissingCredentialError('VIRUSTOTAL_API_KEY');
        }
    }

    async lookup(domain: string, signal?: AbortSignal): Promise<PrimaryLookup> {
        const holder: { report?: ParsedReport } = {};
        const result = await this.run(domain, signal, async (bounded) => {
            holder.report = await this.fetchReport(domain, bounded);
            return holder.report;
        });

        if (result.outcome.kind === 'failed' || !holder.report) {
            return { result, detections: NO_DETECTIONS, resolutions: [] };
        }
        return { result, detections: holder.report.detections, resolutions: holder.report.resolutions };
    }

    protected lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        return this.fetchReport(domain, signal);
    }

    private async fetchReport(domain: string, signal: AbortSignal): Promise<ParsedReport> {
        this.ensureConfigured();

        // The API is case sensitive
        const response = await this.http.get<VirusTotalDomainReport | string>(
            `${this.baseUrl}/vtapi/v2/domain/report`,
            {
                params: { apikey: this.apiKey, domain: domain.toLowerCase() },
                signal,
            }
        );

        // Public API answers 204 with an empty body once the quota is used up
        if (response.status === 204) {
            return { outcome: failed('rate limited'), detections: NO_DETECTIONS, resolutions: [] };
        }

        return parseDomainReport(response.data);
    }
}

/**
 * Converts a raw domain report into outcome, detections and passive DNS history.
 * @throws Error when the body is not a report object
 */
export function parseDomainReport(data: unknown): ParsedReport {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        throw new Error('unexpected response schema');
    }
    const report: VirusTotalDomainReport = data;

    if (report.response_code === 0) {
        return {
            outcome: unknown(),
            detail: report.verbose_msg,
            detections: NO_DETECTIONS,
            resolutions: [],
        };
    }

    return {
        outcome: fromCategories(extractCategories(report.categories)),
        detections: {
            downloadedSamples: Array.isArray(report.detected_downloaded_samples)
                ? report.detected_downloaded_samples.length
                : 0,
            urls: Array.isArray(report.detected_urls) ? report.detected_urls.length : 0,
        },
        resolutions: extractResolutions(report.resolutions),
    };
}

function extractCategories(categories: VirusTotalDomainReport['categories']): string[] {
    if (!categories) return [];
    const values: unknown[] = Array.isArray(categories) ? categories : Object.values(categories);
    const unique = new Set<string>();
    for (const value of values) {
        if (typeof value === 'string' && value.trim()) {
            unique.add(value.trim());
        }
    }
    return [...unique];
}

function extractResolutions(resolutions: VirusTotalDomainReport['resolutions']): PassiveDnsResolution[] {
    if (!Array.isArray(resolutions)) return [];
    const parsed: PassiveDnsResolution[] = [];
    for (const entry of resolutions) {
        if (typeof entry?.ip_address !== 'string') continue;
        const lastResolved = typeof entry.last_resolved === 'string' ? entry.last_resolved.split(' ')[0] : '';
        parsed.push({ ipAddress: entry.ip_address, lastResolved });
    }
    return parsed;
}
