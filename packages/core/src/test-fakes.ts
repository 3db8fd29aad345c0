import Database from 'better-sqlite3';

import { NotificationSchedulingError } from './errors';
import type { NotificationPayload, NotificationService } from './notification-scheduler';
import { DEFAULT_SETTINGS, mergeSettings, type CoreSettings, type CoreSettingsInput } from './settings';
import { createBetterSqliteClient, SqliteStore, type SqliteClient } from './sqlite-store';
import type {
    ExternalCalendarEvent,
    ExternalCalendarService,
    ExternalEventInput,
    RemotePushEntry,
    RemoteSyncBackend,
} from './sync-targets';
import type { AuthorizationState, ExceptionRecord, SeriesPayload, SeriesRecord, SyncableRecord } from './types';

// In-process stand-ins for the store, the sync backends and the OS notification
// facility. Used by tests only.

export async function createMemoryStore(): Promise<{ db: Database.Database; client: SqliteClient; store: SqliteStore }> {
    const db = new Database(':memory:');
    const client = createBetterSqliteClient(db);
    const store = new SqliteStore(client);
    await store.ensureSchema();
    return { db, client, store };
}

/** Settings with fast, single-attempt requests. */
export function testSettings(overrides: CoreSettingsInput = {}): CoreSettings {
    const fast = mergeSettings(DEFAULT_SETTINGS, {
        sync: {
            requestAttempts: 1,
            retryBaseDelayMs: 1000,
            retryMaxDelayMs: 8000,
            failureBackoffMs: 60_000,
        },
    });
    return mergeSettings(fast, overrides);
}

export function createClock(start: string): { now: () => Date; advance: (ms: number) => void; set: (iso: string) => void } {
    let current = new Date(start).getTime();
    return {
        now: () => new Date(current),
        advance: (ms) => {
            current += ms;
        },
        set: (iso) => {
            current = new Date(iso).getTime();
        },
    };
}

export function seriesRecord(
    id: string,
    overrides: Partial<Omit<SeriesRecord, 'payload'>> & { payload?: Partial<SeriesPayload> } = {}
): SeriesRecord {
    const { payload, ...rest } = overrides;
    return {
        id,
        kind: 'series',
        origin: 'local',
        version: 1,
        updatedAt: '2025-01-01T08:00:00.000Z',
        ...rest,
        payload: {
            title: 'Team sync',
            itemKind: 'event',
            anchor: '2025-01-06T10:00:00.000Z',
            durationMs: 30 * 60 * 1000,
            rule: { frequency: 'weekly', interval: 1, end: { type: 'never' } },
            ...payload,
        },
    };
}

export function cancelRecord(seriesId: string, originalDate: string, version = 1): ExceptionRecord {
    return {
        id: `exc:${seriesId}:${originalDate}`,
        kind: 'exception',
        origin: 'local',
        version,
        updatedAt: '2025-01-01T08:00:00.000Z',
        payload: { seriesId, itemKind: 'event', originalDate, kind: 'cancel' },
    };
}

type PushResult =
    | { changeId: string; status: 'ack' }
    | { changeId: string; status: 'conflict'; record: SyncableRecord }
    | { changeId: string; status: 'error'; message: string; retryable: boolean };

/**
 * Multi-device backend kept in memory. A push with a higher version is
 * accepted, an exact re-delivery is acknowledged again, anything else is
 * answered with the stored record as a conflict.
 */
export class FakeRemoteBackend implements RemoteSyncBackend {
    authState: AuthorizationState = 'read-write';
    readonly records = new Map<string, SyncableRecord>();
    /** Accepted writes in arrival order; the pull cursor indexes into it. */
    readonly feed: SyncableRecord[] = [];
    pullCalls = 0;
    pushCalls = 0;
    failPullWith: Error | null = null;
    failPushWith: Error | null = null;
    rejectNext = 0;
    /** When set, pulls wait for it before answering. */
    pullGate: Promise<void> | null = null;

    async authorization(): Promise<AuthorizationState> {
        return this.authState;
    }

    async authorize(): Promise<AuthorizationState> {
        return this.authState;
    }

    /** Simulates a write from another device. */
    seed(record: SyncableRecord): void {
        this.records.set(record.id, record);
        this.feed.push(record);
    }

    async pull(cursor: string | null, limit: number): Promise<unknown> {
        this.pullCalls += 1;
        if (this.pullGate) await this.pullGate;
        if (this.failPullWith) throw this.failPullWith;
        const start = cursor ? Number(cursor) : 0;
        const page = this.feed.slice(start, start + limit);
        const next = start + page.length;
        return {
            changes: page.map((record) => structuredClone(record)),
            cursor: String(next),
            hasMore: next < this.feed.length,
        };
    }

    async push(entries: RemotePushEntry[]): Promise<unknown> {
        this.pushCalls += 1;
        if (this.failPushWith) throw this.failPushWith;
        const results = entries.map((entry): PushResult => {
            if (this.rejectNext > 0) {
                this.rejectNext -= 1;
                return { changeId: entry.changeId, status: 'error', message: 'Payload rejected', retryable: false };
            }
            const stored = this.records.get(entry.record.id);
            if (!stored || entry.record.version > stored.version) {
                const accepted = structuredClone(entry.record);
                this.records.set(accepted.id, accepted);
                this.feed.push(accepted);
                return { changeId: entry.changeId, status: 'ack' };
            }
            if (stored.version === entry.record.version && stored.updatedAt === entry.record.updatedAt) {
                return { changeId: entry.changeId, status: 'ack' };
            }
            return { changeId: entry.changeId, status: 'conflict', record: structuredClone(stored) };
        });
        return { results };
    }
}

export class FakeCalendarService implements ExternalCalendarService {
    authState: AuthorizationState = 'read-write';
    readonly events = new Map<string, ExternalEventInput & { externalId: string }>();
    readonly deleted: string[] = [];
    /** Events the next `listChangedEvents` call reports. */
    incoming: ExternalCalendarEvent[] = [];
    failUpsertWith: Error | null = null;
    /** One-shot failures, consumed by the next upserts in order. */
    upsertFailures: Error[] = [];
    private cursor = 0;

    async authorizationStatus(): Promise<AuthorizationState> {
        return this.authState;
    }

    async requestAccess(): Promise<AuthorizationState> {
        return this.authState;
    }

    async listChangedEvents(): Promise<{ events: ExternalCalendarEvent[]; cursor: string }> {
        const events = this.incoming;
        this.incoming = [];
        this.cursor += 1;
        return { events, cursor: `cal-${this.cursor}` };
    }

    async upsertEvent(event: ExternalEventInput): Promise<{ externalId: string }> {
        const failure = this.failUpsertWith ?? this.upsertFailures.shift();
        if (failure) throw failure;
        const externalId = this.events.get(event.metadata.recordId)?.externalId ?? `evt-${this.events.size + 1}`;
        this.events.set(event.metadata.recordId, { ...event, externalId });
        return { externalId };
    }

    async deleteEvent(recordId: string): Promise<void> {
        this.events.delete(recordId);
        this.deleted.push(recordId);
    }
}

export class FakeNotificationService implements NotificationService {
    readonly pending = new Map<string, { triggerAt: Date; payload: NotificationPayload }>();
    readonly cancelled: string[] = [];
    /** Maximum pending notifications before `schedule` reports a full quota. */
    quota = Number.POSITIVE_INFINITY;

    async schedule(id: string, triggerAt: Date, payload: NotificationPayload): Promise<void> {
        if (!this.pending.has(id) && this.pending.size >= this.quota) {
            throw new NotificationSchedulingError(id, 'Notification quota exceeded', true);
        }
        this.pending.set(id, { triggerAt, payload });
    }

    async cancel(id: string): Promise<void> {
        this.pending.delete(id);
        this.cancelled.push(id);
    }

    async listPending(): Promise<string[]> {
        return [...this.pending.keys()];
    }
}
