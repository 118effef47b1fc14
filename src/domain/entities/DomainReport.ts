import { SourceId, SourceQueryResult } from './SourceQueryResult';

/**
 * An address from the domain's passive DNS history that the IP reputation source flagged.
 */
export interface FlaggedAddress {
    address: string;
    /** Date part of the passive DNS last_resolved timestamp (YYYY-MM-DD) */
    lastSeen: string;
}

export type DnsHealth =
    | { status: 'Healthy' }
    | { status: 'FlaggedDNS'; addresses: FlaggedAddress[] };

/**
 * Outcome of the burn decision for one domain.
 */
export interface BurnVerdict {
    burned: boolean;
    /** Reasons in the order the rules fired */
    explanations: string[];
    dnsHealth: DnsHealth;
}

/**
 * Everything the engine learned about one domain during a pass.
 * Handed to the caller, who owns persistence.
 */
export interface DomainReport {
    domain: string;
    verdict: BurnVerdict;
    /** Duplicate-free union of every source's categories */
    categories: string[];
    /** Subset of categories that hit the blacklist, capitalized for display */
    badCategories: string[];
    /** Raw categories per source that returned any */
    categoryBreakdown: Partial<Record<SourceId, string[]>>;
    /** Every source's result, including failures, for audit */
    sources: SourceQueryResult[];
    /** Passive DNS addresses whose reputation could not be checked; not counted in dnsHealth */
    uncheckedAddresses: string[];
    evaluatedAt: Date;
}

export function formatFlaggedAddress(flagged: FlaggedAddress): string {
    return `${flagged.address}/${flagged.lastSeen}`;
}

export function describeDnsHealth(health: DnsHealth): string {
    if (health.status === 'Healthy') {
        return 'Healthy';
    }
    return `Flagged DNS (${health.addresses.map(formatFlaggedAddress).join(', ')})`;
}
