/**
 * Identifiers of the reputation sources the engine knows how to query.
 */
export type SourceId =
    | 'virustotal'
    | 'talos'
    | 'xforce'
    | 'fortiguard'
    | 'opendns'
    | 'trendmicro'
    | 'mxtoolbox'
    | 'bluecoat'
    | 'websense';

export const SECONDARY_SOURCES: readonly SourceId[] = [
    'talos',
    'xforce',
    'fortiguard',
    'opendns',
    'trendmicro',
    'mxtoolbox',
    'bluecoat',
    'websense',
];

/**
 * Terminal outcome of one lookup.
 * - success: the source returned one or more categories
 * - uncategorized: the source knows the domain but has no category for it
 * - unknown: the source has never seen the domain (404-style)
 * - failed: network, protocol, parsing or anti-bot fault
 */
export type SourceOutcome =
    | { kind: 'success'; categories: string[] }
    | { kind: 'uncategorized' }
    | { kind: 'unknown' }
    | { kind: 'failed'; reason: string };

/**
 * Result of querying one source for one domain.
 */
export interface SourceQueryResult {
    source: SourceId;
    domain: string;
    outcome: SourceOutcome;
    /** Free-form diagnostic text for the audit trail */
    detail?: string;
}

export const success = (categories: string[]): SourceOutcome => ({ kind: 'success', categories });
export const uncategorized = (): SourceOutcome => ({ kind: 'uncategorized' });
export const unknown = (): SourceOutcome => ({ kind: 'unknown' });
export const failed = (reason: string): SourceOutcome => ({ kind: 'failed', reason });

/**
 * Builds a success outcome, falling back to uncategorized when nothing usable came back.
 */
export function fromCategories(categories: string[]): SourceOutcome {
    const cleaned = categories.map((c) => c.trim()).filter((c) => c.length > 0);
    return cleaned.length > 0 ? success(cleaned) : uncategorized();
}

/**
 * Categories a result contributes. Anything but success contributes nothing.
 */
export function categoriesOf(result: SourceQueryResult): string[] {
    switch (result.outcome.kind) {
        case 'success':
            return result.outcome.categories;
        case 'uncategorized':
        case 'unknown':
        case 'failed':
            return [];
    }
}

export function isFailed(result: SourceQueryResult): boolean {
    return result.outcome.kind === 'failed';
}

/**
 * One-line rendering used in logs and the CLI output.
 */
export function describeOutcome(outcome: SourceOutcome): string {
    switch (outcome.kind) {
        case 'success':
            return outcome.categories.join(', ');
        case 'uncategorized':
            return 'Uncategorized';
        case 'unknown':
            return 'Unknown';
        case 'failed':
            return `Failed (${outcome.reason})`;
    }
}
