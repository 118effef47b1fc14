import { SourceQueryResult } from '../entities/SourceQueryResult';
import { ISourceAdapter } from './ISourceAdapter';

/**
 * One historical resolution from the primary source's passive DNS data.
 */
export interface PassiveDnsResolution {
    ipAddress: string;
    /** Date part of the last resolution, YYYY-MM-DD */
    lastResolved: string;
}

export interface PrimaryDetections {
    /** Number of detected malware samples downloaded from the domain */
    downloadedSamples: number;
    /** Number of detected URLs on the domain */
    urls: number;
}

/**
 * Everything the burn decision needs from the primary source.
 * A failed lookup carries zero detections and no resolutions.
 */
export interface PrimaryLookup {
    result: SourceQueryResult;
    detections: PrimaryDetections;
    resolutions: PassiveDnsResolution[];
}

/**
 * The primary detection source. Without it a review pass is meaningless.
 */
export interface IPrimarySourceAdapter extends ISourceAdapter {
    /**
     * Throws MissingCredentialError when the source cannot be used at all.
     */
    ensureConfigured(): void;

    lookup(domain: string, signal?: AbortSignal): Promise<PrimaryLookup>;
}
