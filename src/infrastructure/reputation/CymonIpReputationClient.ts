import { AxiosInstance } from 'axios';
import { IIpReputationClient } from '../../domain/ports/IIpReputationClient';

/**
 * IP reputation from Cymon's public address pages.
 * An address counts as flagged when the page exists and reports activity for it.
 */
export class CymonIpReputationClient implements IIpReputationClient {
    private readonly baseUrl: string;

    constructor(
        private readonly http: AxiosInstance,
        baseUrl: string,
        private readonly timeoutMs: number
    ) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
    }

    async isFlagged(ipAddress: string, signal?: AbortSignal): Promise<boolean> {
        const response = await this.http.get<string>(`${this.baseUrl}/${encodeURIComponent(ipAddress)}`, {
            responseType: 'text',
            timeout: this.timeoutMs,
            validateStatus: () => true,
            signal,
        });
        return response.status === 200 && !String(response.data).includes('IP Not Found');
    }
}
