import { AuthorizationError, SyncAbortedError, TransientSyncError } from './errors';

export type RetryOptions = {
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    signal?: AbortSignal;
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_MAX_DELAY_MS = 30_000;

const sleep = (ms: number, signal?: AbortSignal) =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new SyncAbortedError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new SyncAbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

export const getErrorStatus = (error: unknown): number | null => {
    if (!error || typeof error !== 'object') return null;
    const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
    return typeof status === 'number' ? status : null;
};

export const isRetryableError = (error: unknown): boolean => {
    if (error instanceof AuthorizationError || error instanceof SyncAbortedError) return false;
    if (error instanceof TransientSyncError) return true;
    const status = getErrorStatus(error);
    if (status === 401 || status === 403 || status === 404) return false;
    if (status === 408 || status === 429) return true;
    if (status && status >= 500) return true;

    const message = error instanceof Error ? error.message : String(error || '');
    const normalized = message.toLowerCase();
    if (normalized.includes('validation') || normalized.includes('invalid')) return false;
    return (
        normalized.includes('timeout') ||
        normalized.includes('timed out') ||
        normalized.includes('network') ||
        normalized.includes('failed to fetch') ||
        normalized.includes('econnrefused') ||
        normalized.includes('econnreset') ||
        normalized.includes('enotfound') ||
        normalized.includes('socket hang up')
    );
};

/**
 * Runs `operation` with its own abort signal that fires after `timeoutMs`
 * or when `parent` aborts. A parent abort surfaces as SyncAbortedError.
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    parent?: AbortSignal
): Promise<T> {
    if (parent?.aborted) throw new SyncAbortedError();
    const controller = new AbortController();
    let rejectRace: ((error: Error) => void) | null = null;
    const race = new Promise<never>((_, reject) => {
        rejectRace = reject;
    });
    const timer = setTimeout(() => {
        controller.abort();
        rejectRace?.(new TransientSyncError(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const onParentAbort = () => {
        controller.abort();
        rejectRace?.(new SyncAbortedError());
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });
    try {
        return await Promise.race([operation(controller.signal), race]);
    } finally {
        clearTimeout(timer);
        parent?.removeEventListener('abort', onParentAbort);
    }
}

export async function withRetry<T>(
    operation: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
    const maxDelayMs = Math.max(baseDelayMs, options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS);
    const shouldRetry = options.shouldRetry ?? isRetryableError;

    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
        if (options.signal?.aborted) throw new SyncAbortedError();
        try {
            return await operation();
        } catch (error) {
            lastError = error;
            const canRetry = attempt < maxAttempts && shouldRetry(error, attempt);
            if (!canRetry) break;
            const delayMs = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
            options.onRetry?.(error, attempt, delayMs);
            if (delayMs > 0) {
                await sleep(delayMs, options.signal);
            }
        }
    }

    throw lastError;
}
