import { AuthorizationError, TransientSyncError } from './errors';
import { assertSecureUrl, DEFAULT_TIMEOUT_MS, fetchWithTimeout } from './http-utils';
import type { RemotePushEntry, RemoteSyncBackend } from './sync-targets';
import type { AuthorizationState } from './types';

export interface HttpSyncBackendOptions {
    baseUrl: string;
    token?: string;
    headers?: Record<string, string>;
    timeoutMs?: number;
    fetcher?: typeof fetch;
    allowPrivateIpRanges?: boolean;
}

function buildHeaders(options: HttpSyncBackendOptions): Record<string, string> {
    const headers: Record<string, string> = { ...(options.headers || {}) };
    if (options.token) {
        headers.Authorization = `Bearer ${options.token}`;
    }
    return headers;
}

const trimSlash = (value: string) => value.replace(/\/+$/, '');

/**
 * JSON-over-HTTP transport for the sync backend.
 *
 * GET  {baseUrl}/changes?cursor=&limit=  -> { changes, cursor, hasMore }
 * POST {baseUrl}/changes { changes }     -> { results }
 */
export class HttpSyncBackend implements RemoteSyncBackend {
    private readonly options: HttpSyncBackendOptions;
    private denied = false;

    constructor(options: HttpSyncBackendOptions) {
        assertSecureUrl(options.baseUrl, 'Remote sync requires HTTPS (except localhost).', {
            allowPrivateIpRanges: options.allowPrivateIpRanges,
        });
        this.options = { ...options, baseUrl: trimSlash(options.baseUrl) };
    }

    async authorization(): Promise<AuthorizationState> {
        if (!this.options.token) return 'not-requested';
        return this.denied ? 'denied' : 'read-write';
    }

    async authorize(): Promise<AuthorizationState> {
        this.denied = false;
        return this.authorization();
    }

    async pull(cursor: string | null, limit: number, signal: AbortSignal): Promise<unknown> {
        const params = new URLSearchParams({ limit: String(limit) });
        if (cursor) params.set('cursor', cursor);
        const res = await this.request(`${this.options.baseUrl}/changes?${params.toString()}`, {
            method: 'GET',
            headers: buildHeaders(this.options),
            signal,
        });
        return this.readJson(res, 'GET');
    }

    async push(entries: RemotePushEntry[], signal: AbortSignal): Promise<unknown> {
        const headers = buildHeaders(this.options);
        headers['Content-Type'] = headers['Content-Type'] || 'application/json';
        const res = await this.request(`${this.options.baseUrl}/changes`, {
            method: 'POST',
            headers,
            body: JSON.stringify({ changes: entries }),
            signal,
        });
        return this.readJson(res, 'POST');
    }

    private async request(url: string, init: RequestInit): Promise<Response> {
        const res = await fetchWithTimeout(
            url,
            init,
            this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            this.options.fetcher ?? fetch,
            'Sync request timed out',
        );
        if (res.status === 401 || res.status === 403) {
            this.denied = true;
            throw new AuthorizationError('remote-backend', `${init.method ?? 'GET'} rejected (${res.status})`);
        }
        if (!res.ok) {
            throw new TransientSyncError(`Sync ${init.method ?? 'GET'} failed (${res.status}): ${res.statusText}`, res.status);
        }
        return res;
    }

    private async readJson(res: Response, method: string): Promise<unknown> {
        const text = await res.text();
        try {
            return JSON.parse(text);
        } catch (error) {
            throw new Error(`Sync ${method} failed: invalid JSON (${error instanceof Error ? error.message : String(error)})`);
        }
    }
}
