/**
 * A downloaded list of known malware domains.
 */
export interface MalwareDomainList {
    contains(domain: string): boolean;
    readonly size: number;
}

/**
 * Port for the malware domain feed, fetched once per pass.
 */
export interface IMalwareDomainFeed {
    /**
     * @returns The list, or null when the feed could not be downloaded
     */
    fetch(signal?: AbortSignal): Promise<MalwareDomainList | null>;
}
