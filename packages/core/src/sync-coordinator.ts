import type { ChangeJournal } from './change-journal';
import { resolveConflict, type ConflictCandidates } from './conflict-resolver';
import { AuthorizationError, errorMessage, SyncAbortedError } from './errors';
import { logInfo, logSyncError, logWarn } from './logger';
import { withRetry, withTimeout } from './retry-utils';
import type { CoreSettings } from './settings';
import type { LocalStore, StoreWriter } from './sqlite-store';
import type { CoreStatusStore } from './status-store';
import type { PushOutcome, SyncTarget } from './sync-targets';
import type {
    ChangeOperation,
    PendingChange,
    SyncableRecord,
    SyncTargetId,
    TargetSyncStatus,
} from './types';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_PUSH_BATCHES_PER_CYCLE = 20;
const MAX_FAILURE_BACKOFF_FACTOR = 16;

export type SyncCycleResult = {
    target: SyncTargetId;
    success: boolean;
    /** Incoming records written to the local store. */
    applied: number;
    pushed: number;
    conflicts: number;
    skipped?: 'disabled' | 'suspended' | 'not-authorized' | 'disposed';
    error?: string;
};

export type SyncCoordinatorOptions = {
    store: LocalStore;
    journal: ChangeJournal;
    targets: SyncTarget[];
    status: CoreStatusStore;
    getSettings: () => CoreSettings;
    now?: () => Date;
    /** Runs after incoming records were committed, e.g. to refresh reminders. */
    onRecordsApplied?: (records: SyncableRecord[]) => Promise<void>;
};

type TargetRunner = {
    target: SyncTarget;
    inFlight: Promise<SyncCycleResult> | null;
    queued: boolean;
    suspended: boolean;
    consecutiveFailures: number;
    controller: AbortController | null;
    recoveryTimer: ReturnType<typeof setTimeout> | null;
    retryTimer: ReturnType<typeof setTimeout> | null;
};

type ReconcileStats = {
    applied: SyncableRecord[];
    conflicts: number;
};

const operationFor = (record: SyncableRecord, existed: boolean): ChangeOperation => {
    if (record.deletedAt) return 'delete';
    return existed ? 'update' : 'create';
};

const candidatesFor = (
    origin: SyncTargetId,
    local: SyncableRecord,
    incoming: SyncableRecord
): ConflictCandidates =>
    origin === 'remote-backend' ? { local, remote: incoming } : { local, external: incoming };

/**
 * Keeps the local store in step with every enabled sync target.
 *
 * Each target runs its own cycle (pull, reconcile, push); at most one cycle
 * per target is in flight and triggers arriving meanwhile collapse into a
 * single follow-up cycle. A failing target never blocks the others.
 */
export class SyncCoordinator {
    private readonly store: LocalStore;
    private readonly journal: ChangeJournal;
    private readonly status: CoreStatusStore;
    private readonly getSettings: () => CoreSettings;
    private readonly now: () => Date;
    private readonly onRecordsApplied?: (records: SyncableRecord[]) => Promise<void>;
    private readonly runners = new Map<SyncTargetId, TargetRunner>();
    private intervalTimer: ReturnType<typeof setInterval> | null = null;
    private intervalMs: number | null = null;
    private disposed = false;

    constructor(options: SyncCoordinatorOptions) {
        this.store = options.store;
        this.journal = options.journal;
        this.status = options.status;
        this.getSettings = options.getSettings;
        this.now = options.now ?? (() => new Date());
        this.onRecordsApplied = options.onRecordsApplied;
        for (const target of options.targets) {
            this.runners.set(target.id, {
                target,
                inFlight: null,
                queued: false,
                suspended: false,
                consecutiveFailures: 0,
                controller: null,
                recoveryTimer: null,
                retryTimer: null,
            });
        }
    }

    /** Starts the periodic trigger. Calling it again applies a changed interval. */
    start(): void {
        if (this.disposed) return;
        const { intervalMs } = this.getSettings().sync;
        if (this.intervalTimer && this.intervalMs === intervalMs) return;
        this.stopTimer();
        this.intervalMs = intervalMs;
        this.intervalTimer = setInterval(() => this.requestSync(), intervalMs);
    }

    private stopTimer(): void {
        if (this.intervalTimer) clearInterval(this.intervalTimer);
        this.intervalTimer = null;
        this.intervalMs = null;
    }

    isEnabled(id: SyncTargetId): boolean {
        if (!this.runners.has(id)) return false;
        const { sync } = this.getSettings();
        return id === 'remote-backend' ? sync.remoteBackend.enabled : sync.externalCalendar.enabled;
    }

    /** Enabled targets that take this record, minus `exclude`. */
    targetsFor(record: SyncableRecord, exclude?: SyncTargetId): SyncTargetId[] {
        const ids: SyncTargetId[] = [];
        for (const [id, runner] of this.runners) {
            if (id === exclude || !this.isEnabled(id)) continue;
            if (runner.target.accepts(record)) ids.push(id);
        }
        return ids;
    }

    /** Journals `record` for every target that should receive it, inside the caller's transaction. */
    async enqueueForTargets(
        tx: StoreWriter,
        record: SyncableRecord,
        op: ChangeOperation,
        exclude?: SyncTargetId
    ): Promise<SyncTargetId[]> {
        const targets = this.targetsFor(record, exclude);
        const now = this.now();
        for (const target of targets) {
            await this.journal.append(tx, { target, op, record }, now);
        }
        return targets;
    }

    /** Fire-and-forget trigger for every enabled target. */
    requestSync(): void {
        if (this.disposed) return;
        for (const id of this.runners.keys()) {
            if (!this.isEnabled(id)) continue;
            void this.syncTarget(id).catch((error) => {
                void logSyncError(error, { target: id, step: 'trigger' });
            });
        }
    }

    /** Runs (or joins) a cycle on every enabled target and waits for all of them. */
    async syncNow(): Promise<SyncCycleResult[]> {
        const ids = [...this.runners.keys()].filter((id) => this.isEnabled(id));
        return Promise.all(ids.map((id) => this.syncTarget(id)));
    }

    syncTarget(id: SyncTargetId): Promise<SyncCycleResult> {
        const runner = this.runners.get(id);
        if (!runner) return Promise.resolve(this.skipped(id, 'disabled'));
        if (runner.inFlight) {
            runner.queued = true;
            this.updateStatus(id, { queued: true });
            return runner.inFlight;
        }
        const cycle = this.runCycle(runner).finally(() => {
            runner.inFlight = null;
            if (runner.queued && !this.disposed) {
                runner.queued = false;
                this.updateStatus(id, { queued: false });
                void this.syncTarget(id).catch((error) => {
                    void logSyncError(error, { target: id, step: 'queued' });
                });
            }
        });
        runner.inFlight = cycle;
        return cycle;
    }

    /** Asks the target for access again and lifts a suspension when granted. */
    async reauthorize(id: SyncTargetId): Promise<boolean> {
        const runner = this.runners.get(id);
        if (!runner || this.disposed) return false;
        const state = await runner.target.authorize();
        if (state === 'denied' || state === 'not-requested') {
            this.updateStatus(id, { state: 'failed', suspended: true, failureReason: `Authorization ${state}` });
            runner.suspended = true;
            return false;
        }
        runner.suspended = false;
        runner.consecutiveFailures = 0;
        this.updateStatus(id, { state: 'idle', suspended: false, failureReason: undefined });
        void this.syncTarget(id).catch((error) => {
            void logSyncError(error, { target: id, step: 'reauthorize' });
        });
        return true;
    }

    /** Retries journal entries that exhausted their attempts. */
    async retryFailedChanges(id: SyncTargetId): Promise<number> {
        const failed = await this.journal.listFailed(id);
        const count = await this.journal.retryFailed(failed.map((entry) => entry.id));
        await this.refreshCounts(id);
        if (count > 0) {
            void this.syncTarget(id).catch((error) => {
                void logSyncError(error, { target: id, step: 'retry-failed' });
            });
        }
        return count;
    }

    /** Stops timers, aborts in-flight requests and waits for running cycles to settle. */
    async dispose(): Promise<void> {
        this.disposed = true;
        this.stopTimer();
        const pending: Promise<SyncCycleResult>[] = [];
        for (const runner of this.runners.values()) {
            if (runner.recoveryTimer) clearTimeout(runner.recoveryTimer);
            if (runner.retryTimer) clearTimeout(runner.retryTimer);
            runner.recoveryTimer = null;
            runner.retryTimer = null;
            runner.queued = false;
            runner.controller?.abort();
            if (runner.inFlight) pending.push(runner.inFlight);
        }
        await Promise.all(pending);
    }

    private skipped(id: SyncTargetId, reason: NonNullable<SyncCycleResult['skipped']>): SyncCycleResult {
        return { target: id, success: false, applied: 0, pushed: 0, conflicts: 0, skipped: reason };
    }

    private updateStatus(id: SyncTargetId, updates: Partial<TargetSyncStatus>): void {
        this.status.getState().updateTargetStatus(id, updates);
    }

    private async refreshCounts(id: SyncTargetId): Promise<void> {
        const counts = await this.journal.counts(id);
        this.updateStatus(id, { pendingChanges: counts.pending, failedChanges: counts.failed });
    }

    private call<T>(operation: (signal: AbortSignal) => Promise<T>, signal: AbortSignal): Promise<T> {
        const { sync } = this.getSettings();
        return withRetry(() => withTimeout(operation, sync.requestTimeoutMs, signal), {
            maxAttempts: sync.requestAttempts,
            baseDelayMs: sync.retryBaseDelayMs,
            maxDelayMs: sync.retryMaxDelayMs,
            signal,
        });
    }

    private async runCycle(runner: TargetRunner): Promise<SyncCycleResult> {
        const { target } = runner;
        const id = target.id;
        if (this.disposed) return this.skipped(id, 'disposed');
        if (!this.isEnabled(id)) return this.skipped(id, 'disabled');
        if (runner.suspended) return this.skipped(id, 'suspended');

        if (runner.recoveryTimer) {
            clearTimeout(runner.recoveryTimer);
            runner.recoveryTimer = null;
        }
        const controller = new AbortController();
        runner.controller = controller;
        const { signal } = controller;
        const stats: ReconcileStats = { applied: [], conflicts: 0 };
        let pushed = 0;
        let step = 'authorize';

        try {
            const authorization = await target.authorization();
            if (authorization === 'denied') throw new AuthorizationError(id);
            if (authorization === 'not-requested') {
                this.updateStatus(id, { state: 'idle', failureReason: 'Access has not been requested' });
                return this.skipped(id, 'not-authorized');
            }

            if (authorization === 'read-write') {
                step = 'pull';
                await this.pull(runner, signal, stats);
            }

            step = 'push';
            this.updateStatus(id, { state: 'pushing' });
            pushed = await this.push(runner, signal, stats);

            step = 'purge';
            await this.purgeTombstones();

            runner.consecutiveFailures = 0;
            this.updateStatus(id, {
                state: 'idle',
                failureReason: undefined,
                lastSyncAt: this.now().toISOString(),
                lastResult: 'success',
                conflictsResolved: this.status.getState().sync[id].conflictsResolved + stats.conflicts,
            });
            return { target: id, success: true, applied: stats.applied.length, pushed, conflicts: stats.conflicts };
        } catch (error) {
            return this.handleCycleError(runner, error, step, {
                target: id,
                success: false,
                applied: stats.applied.length,
                pushed,
                conflicts: stats.conflicts,
            });
        } finally {
            runner.controller = null;
            await this.afterCycle(runner, stats.applied);
        }
    }

    private handleCycleError(
        runner: TargetRunner,
        error: unknown,
        step: string,
        partial: SyncCycleResult
    ): SyncCycleResult {
        const id = runner.target.id;
        const message = errorMessage(error);
        if (error instanceof SyncAbortedError || this.disposed) {
            this.updateStatus(id, { state: 'idle' });
            return { ...partial, error: message };
        }
        void logSyncError(error, { target: id, step });
        if (error instanceof AuthorizationError) {
            runner.suspended = true;
            this.updateStatus(id, {
                state: 'failed',
                suspended: true,
                failureReason: message,
                lastResult: 'error',
            });
            return { ...partial, error: message };
        }

        runner.consecutiveFailures += 1;
        const { failureBackoffMs } = this.getSettings().sync;
        const delay = Math.min(
            failureBackoffMs * MAX_FAILURE_BACKOFF_FACTOR,
            failureBackoffMs * Math.pow(2, runner.consecutiveFailures - 1)
        );
        this.updateStatus(id, { state: 'failed', failureReason: message, lastResult: 'error' });
        runner.recoveryTimer = setTimeout(() => {
            runner.recoveryTimer = null;
            if (this.disposed || runner.suspended) return;
            this.updateStatus(id, { state: 'idle' });
            void this.syncTarget(id).catch((retryError) => {
                void logSyncError(retryError, { target: id, step: 'recover' });
            });
        }, delay);
        return { ...partial, error: message };
    }

    private async afterCycle(runner: TargetRunner, applied: SyncableRecord[]): Promise<void> {
        const id = runner.target.id;
        try {
            await this.refreshCounts(id);
            if (applied.length > 0 && this.onRecordsApplied) {
                await this.onRecordsApplied(applied);
            }
            this.scheduleRetry(runner);
        } catch (error) {
            void logSyncError(error, { target: id, step: 'after-cycle' });
        }
    }

    /** Wakes the target when its earliest backing-off entry becomes eligible. */
    private scheduleRetry(runner: TargetRunner): void {
        if (this.disposed) return;
        if (runner.retryTimer) {
            clearTimeout(runner.retryTimer);
            runner.retryTimer = null;
        }
        const id = runner.target.id;
        void this.journal
            .nextAttemptAt(id, this.now())
            .then((at) => {
                if (!at || this.disposed) return;
                const delay = Math.max(0, at.getTime() - this.now().getTime());
                runner.retryTimer = setTimeout(() => {
                    runner.retryTimer = null;
                    void this.syncTarget(id).catch((error) => {
                        void logSyncError(error, { target: id, step: 'retry' });
                    });
                }, delay);
            })
            .catch((error) => {
                void logSyncError(error, { target: id, step: 'schedule-retry' });
            });
    }

    private async pull(runner: TargetRunner, signal: AbortSignal, stats: ReconcileStats): Promise<void> {
        const { target } = runner;
        const { pullPageLimit } = this.getSettings().sync;
        let cursor = await this.store.getCursor(target.id);
        for (let page = 0; page < pullPageLimit; page += 1) {
            this.updateStatus(target.id, { state: 'pulling' });
            const pageCursor = cursor;
            const result = await this.call((callSignal) => target.pull(pageCursor, callSignal), signal);
            if (signal.aborted) throw new SyncAbortedError();

            this.updateStatus(target.id, { state: 'reconciling' });
            const now = this.now().toISOString();
            const pageStats = await this.store.transaction(async (tx) => {
                const local: ReconcileStats = { applied: [], conflicts: 0 };
                for (const record of result.records) {
                    await this.reconcileIncoming(tx, target.id, record, local);
                }
                await tx.setCursor(target.id, result.cursor, now);
                return local;
            });
            stats.applied.push(...pageStats.applied);
            stats.conflicts += pageStats.conflicts;
            cursor = result.cursor;
            if (!result.hasMore) return;
        }
        // Page budget spent with more to fetch; continue in a follow-up cycle.
        runner.queued = true;
    }

    /**
     * Applies one record delivered by `source`.
     *
     * Absent locally: adopted. Not newer than the local copy: ignored. Newer,
     * and the local copy has nothing unsent for `source`: fast-forwarded.
     * Otherwise both sides changed and the resolver decides.
     */
    private async reconcileIncoming(
        tx: StoreWriter,
        source: SyncTargetId,
        incoming: SyncableRecord,
        stats: ReconcileStats
    ): Promise<void> {
        const local = await tx.getRecord(incoming.id);
        if (local && incoming.version <= local.version) return;

        const dirty = local ? await tx.hasPendingChange(source, incoming.id) : false;
        if (!local || !dirty) {
            const adopted: SyncableRecord = { ...incoming, origin: source };
            await tx.putRecord(adopted);
            await this.enqueueForTargets(tx, adopted, operationFor(adopted, !!local), source);
            stats.applied.push(adopted);
            return;
        }
        await this.resolveAndStore(tx, source, local, incoming, stats);
    }

    private async resolveAndStore(
        tx: StoreWriter,
        source: SyncTargetId,
        local: SyncableRecord,
        incoming: SyncableRecord,
        stats: ReconcileStats
    ): Promise<void> {
        const policy = this.getSettings().conflictPolicy;
        const resolution = resolveConflict(candidatesFor(source, local, incoming), policy);
        if (!resolution.ok) {
            void logWarn('Conflict could not be resolved; keeping local copy', {
                scope: 'sync',
                extra: { target: source, recordId: local.id, reason: resolution.error.message },
            });
            return;
        }
        const { winner, conflicted, winnerOrigin, repush } = resolution.value;
        await tx.putRecord(winner);

        // Queued entries for the source are superseded by the resolved version journaled below.
        const superseded = (await tx.listPendingChanges(source)).filter((entry) => entry.recordId === winner.id);
        await this.journal.ackIn(tx, superseded.map((entry) => entry.id));
        await this.enqueueForTargets(tx, winner, operationFor(winner, true));

        // Only a lost local copy changes what the user sees.
        if (repush.some((entry) => entry.origin === 'local')) stats.applied.push(winner);
        if (conflicted) stats.conflicts += 1;
        void logInfo('Resolved sync conflict', {
            scope: 'sync',
            extra: {
                target: source,
                recordId: winner.id,
                policy,
                winner: winnerOrigin,
                version: String(winner.version),
                repushTo: repush.map((entry) => entry.origin).join(','),
                superseded: String(superseded.length),
                supersededFailed: String(superseded.filter((entry) => !!entry.failedAt).length),
            },
        });
    }

    private async push(runner: TargetRunner, signal: AbortSignal, stats: ReconcileStats): Promise<number> {
        const { target } = runner;
        const { pushBatchSize } = this.getSettings().sync;
        let pushed = 0;
        for (let round = 0; round < MAX_PUSH_BATCHES_PER_CYCLE; round += 1) {
            const batch = await this.journal.pendingBatch(target.id, pushBatchSize, this.now());
            if (batch.length === 0) return pushed;
            if (signal.aborted) throw new SyncAbortedError();

            let outcomes: PushOutcome[];
            try {
                outcomes = await this.call((callSignal) => target.push(batch, callSignal), signal);
            } catch (error) {
                // Entries wait out a backoff only for request failures; auth and abort leave them untouched.
                if (!(error instanceof SyncAbortedError) && !(error instanceof AuthorizationError)) {
                    await this.journal.requeue(
                        batch.map((entry) => entry.id),
                        errorMessage(error),
                        this.now()
                    );
                }
                throw error;
            }
            pushed += await this.applyPushOutcomes(target.id, batch, outcomes, stats);
        }
        runner.queued = true;
        return pushed;
    }

    private async applyPushOutcomes(
        id: SyncTargetId,
        batch: readonly PendingChange[],
        outcomes: readonly PushOutcome[],
        stats: ReconcileStats
    ): Promise<number> {
        const byId = new Map(outcomes.map((outcome) => [outcome.changeId, outcome]));
        const acked: string[] = [];
        const conflicts: Array<{ change: PendingChange; record: SyncableRecord }> = [];
        const retry: Array<{ change: PendingChange; message: string }> = [];
        const rejected: Array<{ change: PendingChange; message: string }> = [];
        // Records with an earlier unconfirmed entry in this batch; their later entries stay queued as they are.
        const held = new Set<string>();
        let heldBack = 0;

        for (const change of batch) {
            const outcome = byId.get(change.id);
            if (held.has(change.recordId)) {
                heldBack += 1;
                continue;
            }
            if (!outcome || outcome.status === 'error') held.add(change.recordId);
            if (!outcome) {
                retry.push({ change, message: 'No result returned for change' });
            } else if (outcome.status === 'ack') {
                acked.push(change.id);
            } else if (outcome.status === 'conflict') {
                conflicts.push({ change, record: outcome.record });
            } else if (outcome.retryable) {
                retry.push({ change, message: outcome.message });
            } else {
                rejected.push({ change, message: outcome.message });
            }
        }

        if (acked.length > 0 || conflicts.length > 0) {
            await this.store.transaction(async (tx) => {
                await this.journal.ackIn(tx, acked);
                for (const { change, record } of conflicts) {
                    await this.journal.ackIn(tx, [change.id]);
                    await this.reconcilePushConflict(tx, id, record, stats);
                }
            });
        }

        const now = this.now();
        for (const { change, message } of retry) {
            await this.journal.requeue([change.id], message, now);
        }
        for (const { change, message } of rejected) {
            await this.journal.requeue([change.id], message, now, { permanent: true });
        }
        if (retry.length + rejected.length > 0) {
            void logWarn('Some changes were not accepted', {
                scope: 'sync',
                extra: {
                    target: id,
                    retrying: String(retry.length),
                    rejected: String(rejected.length),
                    heldBack: String(heldBack),
                },
            });
        }
        return acked.length;
    }

    /** A conflict response is the target's definitive answer: the resolver decides regardless of versions. */
    private async reconcilePushConflict(
        tx: StoreWriter,
        id: SyncTargetId,
        remote: SyncableRecord,
        stats: ReconcileStats
    ): Promise<void> {
        const local = await tx.getRecord(remote.id);
        if (!local) {
            const adopted: SyncableRecord = { ...remote, origin: id };
            await tx.putRecord(adopted);
            await this.enqueueForTargets(tx, adopted, operationFor(adopted, false), id);
            stats.applied.push(adopted);
            return;
        }
        await this.resolveAndStore(tx, id, local, remote, stats);
    }

    private async purgeTombstones(): Promise<void> {
        const { tombstoneRetentionDays } = this.getSettings().sync;
        const cutoff = new Date(this.now().getTime() - tombstoneRetentionDays * DAY_MS).toISOString();
        const purged = await this.store.transaction((tx) => tx.purgeConfirmedTombstones(cutoff));
        if (purged > 0) {
            void logInfo('Purged confirmed tombstones', { scope: 'sync', extra: { count: String(purged) } });
        }
    }
}
