/**
 * Last-known health status of a domain, as recorded by the inventory.
 */
export type HealthStatus = 'Healthy' | 'Burned' | 'FlaggedDNS' | 'Unknown';

export const HEALTH_STATUSES: readonly HealthStatus[] = ['Healthy', 'Burned', 'FlaggedDNS', 'Unknown'];

/**
 * A domain as handed over by the inventory collaborator.
 * The review engine reads it but never mutates it.
 */
export interface DomainRecord {
    /** Fully qualified domain name, e.g. "example.com" */
    name: string;
    healthStatus: HealthStatus;
    /** Addresses recorded by an earlier review when status is FlaggedDNS */
    flaggedAddresses?: string[];
}

export function isHealthStatus(value: unknown): value is HealthStatus {
    return HEALTH_STATUSES.some((status) => status === value);
}

/**
 * Operators mark a domain Healthy by hand to clear a false positive.
 * Those domains stay out of the pass so the engine does not re-flag them straight away.
 */
export function requiresReview(domain: DomainRecord): boolean {
    return domain.healthStatus !== 'Healthy';
}
