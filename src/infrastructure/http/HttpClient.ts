import axios, { AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';

export interface HttpClientOptions {
    userAgent: string;
    /** Socket-level ceiling; adapters apply their own tighter deadline */
    timeoutMs: number;
}

/**
 * Creates the connection pool shared by every HTTP-based adapter.
 * Defaults are set once here; adapters only ever pass request-scoped headers.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
    return axios.create({
        timeout: options.timeoutMs,
        httpAgent: new http.Agent({ keepAlive: true }),
        httpsAgent: new https.Agent({ keepAlive: true }),
        headers: {
            'User-Agent': options.userAgent,
        },
    });
}

/**
 * Short reason string for a failed HTTP call.
 */
export function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            return `HTTP ${error.response.status}`;
        }
        if (error.code === 'ECONNABORTED') {
            return 'timeout';
        }
        return error.code ? `${error.code}: ${error.message}` : error.message;
    }
    return error instanceof Error ? error.message : String(error);
}
