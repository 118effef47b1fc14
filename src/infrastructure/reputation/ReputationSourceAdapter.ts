import { AxiosInstance } from 'axios';
import { ISourceAdapter } from '../../domain/ports/ISourceAdapter';
import {
    SourceId,
    SourceOutcome,
    SourceQueryResult,
    describeOutcome,
    failed,
} from '../../domain/entities/SourceQueryResult';
import {
    AntiBotChallengeError,
    CancelledError,
    TimeoutError,
    UnexpectedPageStructureError,
} from '../../domain/errors/ReviewErrors';
import { describeHttpError } from '../http/HttpClient';
import { withTimeout } from '../resilience/Timeout';

/**
 * What a concrete lookup produces before it is stamped with source and domain.
 */
export interface LookupOutcome {
    outcome: SourceOutcome;
    detail?: string;
}

export interface AdapterOptions {
    /** Bound on one whole lookup, every step included */
    timeoutMs: number;
    baseUrl: string;
}

export interface HttpAdapterOptions extends AdapterOptions {
    /** Shared connection pool */
    http: AxiosInstance;
}

/**
 * Base for all reputation sources.
 *
 * run() bounds a lookup in time and turns every fault into a failed result,
 * so nothing crosses the adapter boundary.
 */
export abstract class ReputationSourceAdapter implements ISourceAdapter {
    abstract readonly source: SourceId;
    /** Prefix for log lines */
    protected abstract readonly label: string;

    protected readonly timeoutMs: number;
    protected readonly baseUrl: string;

    constructor(options: AdapterOptions) {
        this.timeoutMs = options.timeoutMs;
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    }

    abstract query(domain: string, signal?: AbortSignal): Promise<SourceQueryResult>;

    /**
     * Runs one bounded lookup and converts its result or failure into a SourceQueryResult.
     */
    protected async run(
        domain: string,
        signal: AbortSignal | undefined,
        lookup: (signal: AbortSignal) => Promise<LookupOutcome>
    ): Promise<SourceQueryResult> {
        try {
            const { outcome, detail } = await withTimeout(lookup, this.timeoutMs, signal);
            console.log(`[${this.label}] ${domain}: ${describeOutcome(outcome)}`);
            return this.result(domain, outcome, detail);
        } catch (error) {
            const reason = this.reasonFor(error);
            console.warn(`[${this.label}] ${domain}: lookup failed (${reason})`);
            const detail = error instanceof Error && error.message !== reason ? error.message : undefined;
            return this.result(domain, failed(reason), detail);
        }
    }

    protected result(domain: string, outcome: SourceOutcome, detail?: string): SourceQueryResult {
        return detail === undefined
            ? { source: this.source, domain, outcome }
            : { source: this.source, domain, outcome, detail };
    }

    private reasonFor(error: unknown): string {
        if (error instanceof TimeoutError) return 'timeout';
        if (error instanceof CancelledError) return 'cancelled';
        if (error instanceof UnexpectedPageStructureError) return 'unexpected page structure';
        if (error instanceof AntiBotChallengeError) return error.message;
        return describeHttpError(error);
    }
}

/**
 * Base for sources reached over the shared HTTP client.
 * Subclasses implement the protocol in lookupOutcome() and may throw freely.
 */
export abstract class HttpSourceAdapter extends ReputationSourceAdapter {
    protected readonly http: AxiosInstance;

    constructor(options: HttpAdapterOptions) {
        super(options);
        this.http = options.http;
    }

    async query(domain: string, signal?: AbortSignal): Promise<SourceQueryResult> {
        return this.run(domain, signal, (bounded) => this.lookupOutcome(domain, bounded));
    }

    protected abstract lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome>;
}
