import { BurnVerdict, DnsHealth, DomainReport, FlaggedAddress } from '../entities/DomainReport';
import { SourceId, SourceQueryResult, categoriesOf } from '../entities/SourceQueryResult';
import { IIpReputationClient } from '../ports/IIpReputationClient';
import { MalwareDomainList } from '../ports/IMalwareDomainFeed';
import { PassiveDnsResolution, PrimaryLookup } from '../ports/IPrimarySourceAdapter';
import { BlacklistPolicy, aggregateCategories } from './BlacklistPolicy';

export const EXPLANATIONS = {
    MALWARE_LIST: 'Flagged by malware domain list',
    DOWNLOADED_SAMPLE: 'Tied to a VirusTotal detected malware sample',
    DETECTED_URL: 'Tied to a VirusTotal detected URL',
    BAD_CATEGORY: 'Tagged with a bad category',
} as const;

interface PassiveDnsCheck {
    dnsHealth: DnsHealth;
    uncheckedAddresses: string[];
}

export interface BurnDecisionInput {
    domain: string;
    malwareFeed: MalwareDomainList | null;
    primary: PrimaryLookup;
    /** Results of every other source */
    sources: SourceQueryResult[];
}

/**
 * Accumulates a verdict. Burning is the only transition on offer,
 * so nothing can clear the flag once a rule has set it.
 */
export class VerdictBuilder {
    private burned = false;
    private readonly explanations: string[] = [];

    burn(explanation: string): this {
        this.burned = true;
        this.explanations.push(explanation);
        return this;
    }

    get isBurned(): boolean {
        return this.burned;
    }

    build(dnsHealth: DnsHealth): BurnVerdict {
        return {
            burned: this.burned,
            explanations: [...this.explanations],
            dnsHealth,
        };
    }
}

/**
 * Combines malware-list membership, primary-source detections, passive DNS
 * reputation and category flags into one report per domain.
 */
export class BurnDecisionEngine {
    constructor(
        private readonly policy: BlacklistPolicy,
        private readonly ipReputation: IIpReputationClient,
        private readonly now: () => Date = () => new Date()
    ) { }

    async evaluate(input: BurnDecisionInput, signal?: AbortSignal): Promise<DomainReport> {
        const { domain, malwareFeed, primary } = input;
        const verdict = new VerdictBuilder();

        if (malwareFeed?.contains(domain)) {
            console.log(`[BurnDecision] ${domain}: identified as a known malware domain`);
            verdict.burn(EXPLANATIONS.MALWARE_LIST);
        }

        if (primary.detections.downloadedSamples > 0) {
            console.log(`[BurnDecision] ${domain}: has a detected downloaded sample`);
            verdict.burn(EXPLANATIONS.DOWNLOADED_SAMPLE);
        }
        if (primary.detections.urls > 0) {
            console.log(`[BurnDecision] ${domain}: has a URL detection`);
            verdict.burn(EXPLANATIONS.DETECTED_URL);
        }

        // Reported next to the verdict; does not burn on its own
        const { dnsHealth, uncheckedAddresses } = await this.checkPassiveDns(domain, primary.resolutions, signal);

        const allResults = [primary.result, ...input.sources];
        const categories = aggregateCategories(allResults);
        const badCategories = this.policy.badCategories(categories);
        if (badCategories.length > 0) {
            console.log(`[BurnDecision] ${domain}: tagged with ${badCategories.join(', ')}`);
            verdict.burn(EXPLANATIONS.BAD_CATEGORY);
        }

        return {
            domain,
            verdict: verdict.build(dnsHealth),
            categories,
            badCategories,
            categoryBreakdown: buildBreakdown(allResults),
            sources: allResults,
            uncheckedAddresses,
            evaluatedAt: this.now(),
        };
    }

    /**
     * Checks resolutions one at a time; a domain can carry hundreds of them
     * and the reputation service is a public page.
     */
    private async checkPassiveDns(
        domain: string,
        resolutions: PassiveDnsResolution[],
        signal?: AbortSignal
    ): Promise<PassiveDnsCheck> {
        const addresses: FlaggedAddress[] = [];
        const uncheckedAddresses: string[] = [];

        for (const resolution of resolutions) {
            try {
                if (await this.ipReputation.isFlagged(resolution.ipAddress, signal)) {
                    addresses.push({ address: resolution.ipAddress, lastSeen: resolution.lastResolved });
                }
            } catch (error) {
                console.warn(`[BurnDecision] IP reputation check failed for ${resolution.ipAddress}:`, error);
                uncheckedAddresses.push(resolution.ipAddress);
            }
        }

        if (addresses.length === 0) {
            return { dnsHealth: { status: 'Healthy' }, uncheckedAddresses };
        }

        console.log(`[BurnDecision] ${domain}: points to suspect IP addresses (passive DNS)`);
        return { dnsHealth: { status: 'FlaggedDNS', addresses }, uncheckedAddresses };
    }
}

function buildBreakdown(results: SourceQueryResult[]): Partial<Record<SourceId, string[]>> {
    const breakdown: Partial<Record<SourceId, string[]>> = {};
    for (const result of results) {
        const categories = categoriesOf(result);
        if (categories.length > 0) {
            breakdown[result.source] = categories;
        }
    }
    return breakdown;
}
