/**
 * Port for the secondary source that rates individual IP addresses.
 */
export interface IIpReputationClient {
    /**
     * @returns true when the address has a bad reputation
     */
    isFlagged(ipAddress: string, signal?: AbortSignal): Promise<boolean>;
}
