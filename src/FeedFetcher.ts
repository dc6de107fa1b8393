import * as http from 'http';
import * as https from 'https';
import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { describeError } from './Errors';
import { Failure, RawPayload } from './types';

export type FetchResult = { ok: true; payload: RawPayload } | { ok: false; failure: Failure };

// What the ingestor needs from a fetcher
export interface FeedSource {
    fetch(url: string): Promise<FetchResult>;
}

export interface FeedFetcherOptions {
    timeoutMs: number;
    userAgent: string;
    apiKeyHeader?: string;
    apiKey?: string;
    adapter?: AxiosRequestConfig['adapter'];
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

/**
 * One keep-alive axios session shared by every fetch. Create it once at startup and
 * call close() on shutdown so the pooled sockets are released.
 *
 * axios's own `timeout` only measures socket inactivity, so each request is also
 * aborted once timeoutMs has passed since it started.
 */
export class FeedFetcher implements FeedSource {
    private readonly httpAgent = new http.Agent({ keepAlive: true });
    private readonly httpsAgent = new https.Agent({ keepAlive: true });
    private readonly client: AxiosInstance;
    private readonly timeoutMs: number;
    private closed = false;

    constructor(options: FeedFetcherOptions) {
        const headers: Record<string, string> = { 'User-Agent': options.userAgent };
        if (options.apiKey && options.apiKeyHeader) {
            headers[options.apiKeyHeader] = options.apiKey;
        }

        this.timeoutMs = options.timeoutMs;
        this.client = axios.create({
            timeout: options.timeoutMs,
            responseType: 'arraybuffer',
            headers,
            httpAgent: this.httpAgent,
            httpsAgent: this.httpsAgent,
            // Status codes are inspected below rather than thrown
            validateStatus: () => true,
            adapter: options.adapter,
        });
    }

    async fetch(url: string): Promise<FetchResult> {
        if (this.closed) {
            return { ok: false, failure: { kind: 'network', message: 'Fetcher has been closed' } };
        }

        const capturedAt = new Date();
        const controller = new AbortController();
        const deadline = setTimeout(() => controller.abort(), this.timeoutMs);
        try {
            const response = await this.client.get<ArrayBuffer>(url, { signal: controller.signal });
            if (response.status !== 200) {
                return {
                    ok: false,
                    failure: {
                        kind: 'http_status',
                        status: response.status,
                        message: `Unexpected HTTP status ${response.status} from ${url}`,
                    },
                };
            }

            const bytes = Buffer.from(response.data);
            const declaredLength = Number(response.headers['content-length']);
            if (Number.isFinite(declaredLength) && declaredLength > bytes.length) {
                return {
                    ok: false,
                    failure: {
                        kind: 'network',
                        message: `Short read from ${url}: ${bytes.length} of ${declaredLength} bytes`,
                    },
                };
            }

            return { ok: true, payload: { bytes, capturedAt } };
        } catch (error) {
            const timedOut =
                axios.isCancel(error) || (axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code));
            if (timedOut) {
                return {
                    ok: false,
                    failure: { kind: 'timeout', message: `Timed out after ${this.timeoutMs}ms fetching ${url}` },
                };
            }
            return { ok: false, failure: { kind: 'network', message: describeError(error) } };
        } finally {
            clearTimeout(deadline);
        }
    }

    close(): void {
        this.closed = true;
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
    }
}
