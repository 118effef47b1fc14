import { DomainRecord, requiresReview } from '../domain/entities/Domain';
import { DomainReport, describeDnsHealth } from '../domain/entities/DomainReport';
import { describeOutcome } from '../domain/entities/SourceQueryResult';
import { IDomainInventory } from '../domain/ports/IDomainInventory';
import { IMalwareDomainFeed, MalwareDomainList } from '../domain/ports/IMalwareDomainFeed';
import { IPrimarySourceAdapter } from '../domain/ports/IPrimarySourceAdapter';
import { ISourceAdapter } from '../domain/ports/ISourceAdapter';
import { BurnDecisionEngine } from '../domain/services/BurnDecisionEngine';
import { RateLimiter } from './RateLimiter';

export interface ReviewDependencies {
    inventory: IDomainInventory;
    primarySource: IPrimarySourceAdapter;
    /** Every other source, queried alongside the primary one */
    sources: ISourceAdapter[];
    malwareFeed: IMalwareDomainFeed;
    decisionEngine: BurnDecisionEngine;
    rateLimiter: RateLimiter;
}

export interface ReviewRunOptions {
    /** Operator abort; observed between domains and passed down to in-flight lookups */
    signal?: AbortSignal;
}

export interface ReviewPassOutcome {
    /** Reports keyed by domain name, in review order */
    reports: Map<string, DomainReport>;
    /** Domains left alone because they are marked Healthy */
    skipped: string[];
    cancelled: boolean;
}

/**
 * ReviewOrchestrator drives one pass over the inventory.
 *
 * Domains are reviewed one at a time, with the rate limiter between them; the sources
 * for one domain run concurrently. Nothing a source does can abort the pass; the only
 * fatal condition is a primary source that is not configured.
 */
export class ReviewOrchestrator {
    constructor(private readonly deps: ReviewDependencies) { }

    /**
     * @throws MissingCredentialError before any network activity if the primary source has no key
     */
    async run(options: ReviewRunOptions = {}): Promise<ReviewPassOutcome> {
        const { signal } = options;
        this.deps.primarySource.ensureConfigured();

        const domains = await this.deps.inventory.listDomains();
        const outcome: ReviewPassOutcome = { reports: new Map(), skipped: [], cancelled: false };
        console.log(`[ReviewOrchestrator] Starting review of ${domains.length} domains`);

        const malwareFeed = await this.deps.malwareFeed.fetch(signal);

        for (const [index, domain] of domains.entries()) {
            if (signal?.aborted) {
                console.warn('[ReviewOrchestrator] Review cancelled; remaining domains not evaluated');
                outcome.cancelled = true;
                break;
            }

            if (!requiresReview(domain)) {
                console.log(`[ReviewOrchestrator] Skipping ${domain.name} (marked Healthy)`);
                outcome.skipped.push(domain.name);
                continue;
            }

            const report = await this.reviewDomain(domain, malwareFeed, signal);

            // Lookups cut short by the abort carry no verdict worth keeping
            if (signal?.aborted) {
                console.warn(`[ReviewOrchestrator] Review cancelled during ${domain.name}; its report is discarded`);
                outcome.cancelled = true;
                break;
            }
            outcome.reports.set(domain.name, report);

            if (domains.slice(index + 1).some(requiresReview)) {
                await this.deps.rateLimiter.pace(signal);
            }
        }

        console.log(
            `[ReviewOrchestrator] Review finished: ${outcome.reports.size} evaluated, ${outcome.skipped.length} skipped`
        );
        return outcome;
    }

    /**
     * Evaluates one domain with every registered source.
     */
    async reviewDomain(
        domain: DomainRecord,
        malwareFeed: MalwareDomainList | null,
        signal?: AbortSignal
    ): Promise<DomainReport> {
        console.log(`[ReviewOrchestrator] Starting update of ${domain.name}`);

        // Adapters never reject, so one slow or broken source cannot take the others down
        const [primary, ...sources] = await Promise.all([
            this.deps.primarySource.lookup(domain.name, signal),
            ...this.deps.sources.map((source) => source.query(domain.name, signal)),
        ]);

        const report = await this.deps.decisionEngine.evaluate(
            { domain: domain.name, malwareFeed, primary, sources },
            signal
        );

        for (const result of report.sources) {
            console.log(`[ReviewOrchestrator]   ${result.source}: ${describeOutcome(result.outcome)}`);
        }
        console.log(
            `[ReviewOrchestrator] ${domain.name}: ${report.verdict.burned ? 'BURNED' : 'healthy'}` +
            ` | DNS ${describeDnsHealth(report.verdict.dnsHealth)}`
        );
        return report;
    }
}
