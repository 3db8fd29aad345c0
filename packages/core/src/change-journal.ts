import { JournalWriteError } from './errors';
import type { LocalStore, StoreWriter } from './sqlite-store';
import type { ChangeOperation, PendingChange, SyncableRecord, SyncTargetId } from './types';
import { generateUUID } from './uuid';

export type ChangeJournalOptions = {
    maxRetries: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
};

export type AppendInput = {
    target: SyncTargetId;
    op: ChangeOperation;
    record: SyncableRecord;
};

export type RequeueResult = {
    requeued: PendingChange[];
    failed: PendingChange[];
};

export const retryDelayMs = (retryCount: number, baseDelayMs: number, maxDelayMs: number): number =>
    Math.min(maxDelayMs, baseDelayMs * Math.pow(2, Math.max(0, retryCount - 1)));

/**
 * Outbox of local mutations not yet confirmed by a target.
 *
 * Entries are appended inside the mutation's own transaction and leave the
 * journal only through `ack`. Each target has its own queue.
 */
export class ChangeJournal {
    private readonly store: LocalStore;
    private options: ChangeJournalOptions;

    constructor(store: LocalStore, options: ChangeJournalOptions) {
        this.store = store;
        this.options = { ...options };
    }

    configure(options: ChangeJournalOptions): void {
        this.options = { ...options };
    }

    async append(tx: StoreWriter, input: AppendInput, now: Date = new Date()): Promise<PendingChange> {
        const change: PendingChange = {
            id: generateUUID(),
            target: input.target,
            op: input.op,
            recordId: input.record.id,
            record: input.record,
            createdAt: now.toISOString(),
            retryCount: 0,
        };
        try {
            await tx.insertPendingChange(change);
        } catch (error) {
            throw new JournalWriteError(error);
        }
        return change;
    }

    /**
     * Next entries to push, oldest first. An entry that is backing off or has
     * failed holds back every newer entry for the same record.
     */
    async pendingBatch(target: SyncTargetId, maxSize: number, now: Date = new Date()): Promise<PendingChange[]> {
        const entries = await this.store.listPendingChanges(target);
        const blocked = new Set<string>();
        const batch: PendingChange[] = [];
        for (const entry of entries) {
            if (batch.length >= maxSize) break;
            if (blocked.has(entry.recordId)) continue;
            const waiting = !!entry.nextAttemptAt && new Date(entry.nextAttemptAt).getTime() > now.getTime();
            if (entry.failedAt || waiting) {
                blocked.add(entry.recordId);
                continue;
            }
            batch.push(entry);
        }
        return batch;
    }

    /** Removes confirmed entries; unknown or already-acked ids are ignored. */
    async ack(ids: readonly string[]): Promise<number> {
        if (ids.length === 0) return 0;
        return this.store.transaction((tx) => this.ackIn(tx, ids));
    }

    ackIn(tx: StoreWriter, ids: readonly string[]): Promise<number> {
        return tx.deletePendingChanges(ids);
    }

    /**
     * Puts entries back with an exponential backoff. `permanent` marks them
     * failed at once, for rejections a retry cannot fix.
     */
    async requeue(
        ids: readonly string[],
        error: string,
        now: Date = new Date(),
        options: { permanent?: boolean } = {}
    ): Promise<RequeueResult> {
        if (ids.length === 0) return { requeued: [], failed: [] };
        const wanted = new Set(ids);
        return this.store.transaction(async (tx) => {
            const result: RequeueResult = { requeued: [], failed: [] };
            const entries = (await tx.listPendingChanges()).filter((entry) => wanted.has(entry.id));
            for (const entry of entries) {
                const retryCount = entry.retryCount + 1;
                if (options.permanent || retryCount >= this.options.maxRetries) {
                    const failed: PendingChange = {
                        ...entry,
                        retryCount,
                        lastError: error,
                        nextAttemptAt: undefined,
                        failedAt: now.toISOString(),
                    };
                    await tx.updatePendingChange(failed);
                    result.failed.push(failed);
                    continue;
                }
                const delay = retryDelayMs(retryCount, this.options.retryBaseDelayMs, this.options.retryMaxDelayMs);
                const requeued: PendingChange = {
                    ...entry,
                    retryCount,
                    lastError: error,
                    nextAttemptAt: new Date(now.getTime() + delay).toISOString(),
                };
                await tx.updatePendingChange(requeued);
                result.requeued.push(requeued);
            }
            return result;
        });
    }

    hasPending(target: SyncTargetId, recordId: string): Promise<boolean> {
        return this.store.hasPendingChange(target, recordId);
    }

    async listFailed(target?: SyncTargetId): Promise<PendingChange[]> {
        const entries = await this.store.listPendingChanges(target);
        return entries.filter((entry) => !!entry.failedAt);
    }

    /** User-initiated retry of entries that exhausted their attempts. */
    async retryFailed(ids: readonly string[]): Promise<number> {
        const wanted = new Set(ids);
        return this.store.transaction(async (tx) => {
            const entries = (await tx.listPendingChanges()).filter((entry) => wanted.has(entry.id) && !!entry.failedAt);
            for (const entry of entries) {
                await tx.updatePendingChange({
                    ...entry,
                    retryCount: 0,
                    nextAttemptAt: undefined,
                    failedAt: undefined,
                });
            }
            return entries.length;
        });
    }

    async counts(target: SyncTargetId): Promise<{ pending: number; failed: number }> {
        const entries = await this.store.listPendingChanges(target);
        const failed = entries.filter((entry) => !!entry.failedAt).length;
        return { pending: entries.length - failed, failed };
    }

    /** Earliest instant a backing-off entry becomes eligible again. */
    async nextAttemptAt(target: SyncTargetId, now: Date = new Date()): Promise<Date | null> {
        const entries = await this.store.listPendingChanges(target);
        let earliest: number | null = null;
        for (const entry of entries) {
            if (entry.failedAt || !entry.nextAttemptAt) continue;
            const at = new Date(entry.nextAttemptAt).getTime();
            if (at <= now.getTime()) continue;
            earliest = earliest === null ? at : Math.min(earliest, at);
        }
        return earliest === null ? null : new Date(earliest);
    }
}
