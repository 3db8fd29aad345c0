import type BetterSqlite3 from 'better-sqlite3';

import { logWarn } from './logger';
import { parseSyncableRecord } from './record-schema';
import { SQLITE_SCHEMA } from './sqlite-schema';
import type {
    ChangeOperation,
    ExceptionRecord,
    NotificationKind,
    PendingChange,
    RecordKind,
    ScheduledNotification,
    SyncableRecord,
    SyncTargetId,
} from './types';

export interface SqliteClient {
    run(sql: string, params?: unknown[]): Promise<{ changes: number }>;
    all<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T[]>;
    get<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T | undefined>;
    exec?(sql: string): Promise<void>;
}

export function createBetterSqliteClient(db: BetterSqlite3.Database): SqliteClient {
    return {
        run: async (sql: string, params: unknown[] = []) => {
            const info = db.prepare(sql).run(...params);
            return { changes: info.changes };
        },
        all: async <T = Record<string, unknown>>(sql: string, params: unknown[] = []) =>
            db.prepare(sql).all(...params) as T[],
        get: async <T = Record<string, unknown>>(sql: string, params: unknown[] = []) =>
            db.prepare(sql).get(...params) as T | undefined,
        exec: async (sql: string) => {
            db.exec(sql);
        },
    };
}

export type ListRecordsOptions = {
    kind?: RecordKind;
    includeDeleted?: boolean;
};

export interface StoreReader {
    getRecord(id: string): Promise<SyncableRecord | null>;
    listRecords(options?: ListRecordsOptions): Promise<SyncableRecord[]>;
    listExceptions(seriesId: string, options?: { includeDeleted?: boolean }): Promise<ExceptionRecord[]>;
    getCursor(target: SyncTargetId): Promise<string | null>;
    /** Entries in creation order. */
    listPendingChanges(target?: SyncTargetId): Promise<PendingChange[]>;
    hasPendingChange(target: SyncTargetId, recordId: string): Promise<boolean>;
    listScheduledNotifications(): Promise<ScheduledNotification[]>;
    loadSettings(): Promise<unknown>;
}

export interface StoreWriter extends StoreReader {
    putRecord(record: SyncableRecord): Promise<void>;
    purgeConfirmedTombstones(deletedBefore: string): Promise<number>;
    setCursor(target: SyncTargetId, cursor: string, now: string): Promise<void>;
    insertPendingChange(change: PendingChange): Promise<void>;
    updatePendingChange(change: PendingChange): Promise<void>;
    deletePendingChanges(ids: readonly string[]): Promise<number>;
    putScheduledNotification(notification: ScheduledNotification): Promise<void>;
    deleteScheduledNotifications(ids: readonly string[]): Promise<void>;
    saveSettings(data: unknown): Promise<void>;
}

/**
 * Local persistent store. Every public call is serialized; writes only happen
 * inside `transaction`, which commits all of them or none.
 * Calling public methods from inside a transaction callback deadlocks: use the
 * callback's `tx` instead.
 */
export interface LocalStore extends StoreReader {
    transaction<T>(fn: (tx: StoreWriter) => Promise<T>): Promise<T>;
}

type RecordRow = {
    id: string;
    kind: string;
    origin: string;
    version: number;
    updatedAt: string;
    deletedAt: string | null;
    payload: string;
};

type PendingRow = {
    id: string;
    target: string;
    op: string;
    recordId: string;
    record: string;
    createdAt: string;
    retryCount: number;
    nextAttemptAt: string | null;
    lastError: string | null;
    failedAt: string | null;
};

type NotificationRow = {
    id: string;
    occurrenceId: string;
    offsetMinutes: number;
    triggerAt: string;
    channel: string;
    kind: string;
};

const READ_PAGE_SIZE = 1000;

const fromJson = (value: string, context: string): unknown => {
    try {
        return JSON.parse(value);
    } catch (error) {
        void logWarn(`[SQLite] Failed to parse ${context}`, {
            scope: 'store',
            extra: { error: error instanceof Error ? error.message : String(error) },
        });
        return null;
    }
};

const isTarget = (value: string): value is SyncTargetId => value === 'remote-backend' || value === 'external-calendar';

const isOperation = (value: string): value is ChangeOperation => value === 'create' || value === 'update' || value === 'delete';

const isNotificationKind = (value: string): value is NotificationKind =>
    value === 'event-reminder' || value === 'task-due' || value === 'task-overdue' || value === 'daily-summary';

function rowToRecord(row: RecordRow): SyncableRecord | null {
    const record = parseSyncableRecord({
        id: row.id,
        kind: row.kind,
        origin: row.origin,
        version: row.version,
        updatedAt: row.updatedAt,
        deletedAt: row.deletedAt ?? undefined,
        payload: fromJson(row.payload, `payload of ${row.id}`),
    });
    if (!record) {
        void logWarn('[SQLite] Skipping unreadable record row', { scope: 'store', extra: { recordId: row.id } });
    }
    return record;
}

function rowToPendingChange(row: PendingRow): PendingChange | null {
    const record = parseSyncableRecord(fromJson(row.record, `pending change ${row.id}`));
    if (!record || !isTarget(row.target) || !isOperation(row.op)) {
        void logWarn('[SQLite] Skipping unreadable pending change', { scope: 'store', extra: { changeId: row.id } });
        return null;
    }
    return {
        id: row.id,
        target: row.target,
        op: row.op,
        recordId: row.recordId,
        record,
        createdAt: row.createdAt,
        retryCount: row.retryCount,
        nextAttemptAt: row.nextAttemptAt ?? undefined,
        lastError: row.lastError ?? undefined,
        failedAt: row.failedAt ?? undefined,
    };
}

function rowToNotification(row: NotificationRow): ScheduledNotification | null {
    if (!isNotificationKind(row.kind)) return null;
    return {
        id: row.id,
        occurrenceId: row.occurrenceId,
        offsetMinutes: row.offsetMinutes,
        triggerAt: row.triggerAt,
        channel: row.channel,
        kind: row.kind,
    };
}

const present = <T>(value: T | null): value is T => value !== null;

class SqliteOperations implements StoreWriter {
    constructor(private readonly client: SqliteClient) {}

    private async loadAllRows<T>(sql: string, params: unknown[] = []): Promise<T[]> {
        const rows: T[] = [];
        let offset = 0;
        while (true) {
            const page = await this.client.all<T>(`${sql} LIMIT ? OFFSET ?`, [...params, READ_PAGE_SIZE, offset]);
            rows.push(...page);
            if (page.length < READ_PAGE_SIZE) break;
            offset += READ_PAGE_SIZE;
        }
        return rows;
    }

    async getRecord(id: string): Promise<SyncableRecord | null> {
        const row = await this.client.get<RecordRow>('SELECT * FROM records WHERE id = ?', [id]);
        return row ? rowToRecord(row) : null;
    }

    async listRecords(options: ListRecordsOptions = {}): Promise<SyncableRecord[]> {
        const clauses: string[] = [];
        const params: unknown[] = [];
        if (options.kind) {
            clauses.push('kind = ?');
            params.push(options.kind);
        }
        if (!options.includeDeleted) clauses.push('deletedAt IS NULL');
        const where = clauses.length ? ` WHERE ${clauses.join(' AND ')}` : '';
        const rows = await this.loadAllRows<RecordRow>(`SELECT * FROM records${where} ORDER BY rowid`, params);
        return rows.map(rowToRecord).filter(present);
    }

    async listExceptions(seriesId: string, options: { includeDeleted?: boolean } = {}): Promise<ExceptionRecord[]> {
        const deletedClause = options.includeDeleted ? '' : ' AND deletedAt IS NULL';
        const rows = await this.client.all<RecordRow>(
            `SELECT * FROM records WHERE kind = 'exception' AND seriesId = ?${deletedClause} ORDER BY rowid`,
            [seriesId]
        );
        return rows
            .map(rowToRecord)
            .filter(present)
            .filter((record): record is ExceptionRecord => record.kind === 'exception');
    }

    async getCursor(target: SyncTargetId): Promise<string | null> {
        const row = await this.client.get<{ cursor: string }>('SELECT cursor FROM sync_cursors WHERE target = ?', [target]);
        return row?.cursor ?? null;
    }

    async listPendingChanges(target?: SyncTargetId): Promise<PendingChange[]> {
        const rows = target
            ? await this.loadAllRows<PendingRow>('SELECT * FROM pending_changes WHERE target = ? ORDER BY seq', [target])
            : await this.loadAllRows<PendingRow>('SELECT * FROM pending_changes ORDER BY seq');
        return rows.map(rowToPendingChange).filter(present);
    }

    async hasPendingChange(target: SyncTargetId, recordId: string): Promise<boolean> {
        const row = await this.client.get<{ found: number }>(
            'SELECT 1 AS found FROM pending_changes WHERE target = ? AND recordId = ? LIMIT 1',
            [target, recordId]
        );
        return !!row;
    }

    async listScheduledNotifications(): Promise<ScheduledNotification[]> {
        const rows = await this.client.all<NotificationRow>('SELECT * FROM scheduled_notifications ORDER BY triggerAt, id');
        return rows.map(rowToNotification).filter(present);
    }

    async loadSettings(): Promise<unknown> {
        const row = await this.client.get<{ data: string }>('SELECT data FROM settings WHERE id = 1');
        return row ? fromJson(row.data, 'settings') : null;
    }

    async putRecord(record: SyncableRecord): Promise<void> {
        await this.client.run(
            `INSERT INTO records (id, kind, seriesId, origin, version, updatedAt, deletedAt, payload)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)
             ON CONFLICT(id) DO UPDATE SET
               kind = excluded.kind,
               seriesId = excluded.seriesId,
               origin = excluded.origin,
               version = excluded.version,
               updatedAt = excluded.updatedAt,
               deletedAt = excluded.deletedAt,
               payload = excluded.payload`,
            [
                record.id,
                record.kind,
                record.kind === 'exception' ? record.payload.seriesId : null,
                record.origin,
                record.version,
                record.updatedAt,
                record.deletedAt ?? null,
                JSON.stringify(record.payload),
            ]
        );
    }

    async purgeConfirmedTombstones(deletedBefore: string): Promise<number> {
        const result = await this.client.run(
            `DELETE FROM records
             WHERE deletedAt IS NOT NULL
               AND deletedAt < ?
               AND id NOT IN (SELECT recordId FROM pending_changes)`,
            [deletedBefore]
        );
        return result.changes;
    }

    async setCursor(target: SyncTargetId, cursor: string, now: string): Promise<void> {
        await this.client.run(
            `INSERT INTO sync_cursors (target, cursor, updatedAt) VALUES (?, ?, ?)
             ON CONFLICT(target) DO UPDATE SET cursor = excluded.cursor, updatedAt = excluded.updatedAt`,
            [target, cursor, now]
        );
    }

    async insertPendingChange(change: PendingChange): Promise<void> {
        await this.client.run(
            `INSERT INTO pending_changes
               (id, target, op, recordId, record, createdAt, retryCount, nextAttemptAt, lastError, failedAt)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                change.id,
                change.target,
                change.op,
                change.recordId,
                JSON.stringify(change.record),
                change.createdAt,
                change.retryCount,
                change.nextAttemptAt ?? null,
                change.lastError ?? null,
                change.failedAt ?? null,
            ]
        );
    }

    async updatePendingChange(change: PendingChange): Promise<void> {
        await this.client.run(
            `UPDATE pending_changes
             SET retryCount = ?, nextAttemptAt = ?, lastError = ?, failedAt = ?
             WHERE id = ?`,
            [change.retryCount, change.nextAttemptAt ?? null, change.lastError ?? null, change.failedAt ?? null, change.id]
        );
    }

    async deletePendingChanges(ids: readonly string[]): Promise<number> {
        let removed = 0;
        for (const id of ids) {
            const result = await this.client.run('DELETE FROM pending_changes WHERE id = ?', [id]);
            removed += result.changes;
        }
        return removed;
    }

    async putScheduledNotification(notification: ScheduledNotification): Promise<void> {
        await this.client.run(
            `INSERT INTO scheduled_notifications (id, occurrenceId, offsetMinutes, triggerAt, channel, kind)
             VALUES (?, ?, ?, ?, ?, ?)
             ON CONFLICT(id) DO UPDATE SET
               triggerAt = excluded.triggerAt,
               channel = excluded.channel,
               kind = excluded.kind`,
            [
                notification.id,
                notification.occurrenceId,
                notification.offsetMinutes,
                notification.triggerAt,
                notification.channel,
                notification.kind,
            ]
        );
    }

    async deleteScheduledNotifications(ids: readonly string[]): Promise<void> {
        for (const id of ids) {
            await this.client.run('DELETE FROM scheduled_notifications WHERE id = ?', [id]);
        }
    }

    async saveSettings(data: unknown): Promise<void> {
        await this.client.run(
            `INSERT INTO settings (id, data) VALUES (1, ?)
             ON CONFLICT(id) DO UPDATE SET data = excluded.data`,
            [JSON.stringify(data)]
        );
    }
}

export class SqliteStore implements LocalStore {
    private readonly client: SqliteClient;
    private readonly ops: SqliteOperations;
    private tail: Promise<void> = Promise.resolve();

    constructor(client: SqliteClient) {
        this.client = client;
        this.ops = new SqliteOperations(client);
    }

    private serialize<T>(operation: () => Promise<T>): Promise<T> {
        const result = this.tail.then(operation);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    async ensureSchema(): Promise<void> {
        await this.serialize(async () => {
            if (this.client.exec) {
                await this.client.exec(SQLITE_SCHEMA);
            } else {
                await this.client.run(SQLITE_SCHEMA);
            }
        });
    }

    transaction<T>(fn: (tx: StoreWriter) => Promise<T>): Promise<T> {
        return this.serialize(async () => {
            await this.client.run('BEGIN IMMEDIATE');
            try {
                const result = await fn(this.ops);
                await this.client.run('COMMIT');
                return result;
            } catch (error) {
                await this.client.run('ROLLBACK');
                throw error;
            }
        });
    }

    getRecord(id: string): Promise<SyncableRecord | null> {
        return this.serialize(() => this.ops.getRecord(id));
    }

    listRecords(options?: ListRecordsOptions): Promise<SyncableRecord[]> {
        return this.serialize(() => this.ops.listRecords(options));
    }

    listExceptions(seriesId: string, options?: { includeDeleted?: boolean }): Promise<ExceptionRecord[]> {
        return this.serialize(() => this.ops.listExceptions(seriesId, options));
    }

    getCursor(target: SyncTargetId): Promise<string | null> {
        return this.serialize(() => this.ops.getCursor(target));
    }

    listPendingChanges(target?: SyncTargetId): Promise<PendingChange[]> {
        return this.serialize(() => this.ops.listPendingChanges(target));
    }

    hasPendingChange(target: SyncTargetId, recordId: string): Promise<boolean> {
        return this.serialize(() => this.ops.hasPendingChange(target, recordId));
    }

    listScheduledNotifications(): Promise<ScheduledNotification[]> {
        return this.serialize(() => this.ops.listScheduledNotifications());
    }

    loadSettings(): Promise<unknown> {
        return this.serialize(() => this.ops.loadSettings());
    }
}
