import { SourceQueryResult, categoriesOf } from '../entities/SourceQueryResult';

/**
 * Categories that make a domain unusable.
 * Lowercase because every source spells its labels differently.
 */
export const DEFAULT_BLACKLISTED_CATEGORIES: readonly string[] = [
    'phishing',
    'web ads/analytics',
    'suspicious',
    'shopping',
    'placeholders',
    'pornography',
    'adult content',
    'spam',
    'gambling',
    'scam/questionable/illegal',
    'malicious sources/malnets',
    'malware',
    'malicious websites',
    'scam',
];

const normalize = (category: string): string => category.trim().toLowerCase();

/**
 * First letter upper case, the rest lower case.
 */
export function capitalize(category: string): string {
    const lowered = normalize(category);
    return lowered.charAt(0).toUpperCase() + lowered.slice(1);
}

/**
 * Union of every source's categories for one domain.
 * Duplicates are detected case-insensitively; the first spelling wins.
 */
export function aggregateCategories(results: SourceQueryResult[]): string[] {
    const seen = new Map<string, string>();
    for (const result of results) {
        for (const raw of categoriesOf(result)) {
            const category = raw.trim();
            const key = normalize(category);
            if (key && !seen.has(key)) {
                seen.set(key, category);
            }
        }
    }
    return [...seen.values()];
}

/**
 * Static denylist of categories.
 */
export class BlacklistPolicy {
    private readonly denylist: ReadonlySet<string>;

    constructor(extraCategories: string[] = [], base: readonly string[] = DEFAULT_BLACKLISTED_CATEGORIES) {
        this.denylist = new Set([...base, ...extraCategories].map(normalize).filter((c) => c.length > 0));
    }

    matches(category: string): boolean {
        return this.denylist.has(normalize(category));
    }

    /**
     * Matching categories, capitalized for display and deduplicated.
     */
    badCategories(categories: string[]): string[] {
        const bad = new Set<string>();
        for (const category of categories) {
            if (this.matches(category)) {
                bad.add(capitalize(category));
            }
        }
        return [...bad];
    }

    get entries(): string[] {
        return [...this.denylist];
    }
}
