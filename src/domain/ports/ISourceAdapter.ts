import { SourceId, SourceQueryResult } from '../entities/SourceQueryResult';

/**
 * Port for one external reputation or categorization service.
 * Implementations translate their own protocol into a SourceQueryResult.
 */
export interface ISourceAdapter {
    readonly source: SourceId;

    /**
     * Looks up a domain.
     * Never rejects: network, protocol and parsing faults come back as a failed outcome.
     * @param signal Aborts the lookup when the pass is cancelled
     */
    query(domain: string, signal?: AbortSignal): Promise<SourceQueryResult>;
}
