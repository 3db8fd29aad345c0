export type Weekday = 'MO' | 'TU' | 'WE' | 'TH' | 'FR' | 'SA' | 'SU';

export type RecurrenceFrequency = 'daily' | 'weekly' | 'monthly' | 'yearly' | 'custom';

export type RecurrenceEnd =
    | { type: 'never' }
    | { type: 'until'; until: string } // ISO instant; occurrences starting on/after it are excluded
    | { type: 'count'; count: number };

export interface RecurrenceRule {
    frequency: RecurrenceFrequency;
    interval: number;
    end: RecurrenceEnd;
    byWeekday?: Weekday[];
    byMonthDay?: number[];
}

export type ItemKind = 'event' | 'task';

export interface SeriesPayload {
    title: string;
    itemKind: ItemKind;
    anchor: string; // ISO instant of the first occurrence
    durationMs: number;
    rule: RecurrenceRule | null; // null: one-off item, expands to a single occurrence
    notes?: string;
    location?: string;
    category?: string;
    previousSeriesId?: string;
}

export interface ExceptionPayload {
    seriesId: string;
    itemKind: ItemKind;
    originalDate: string; // yyyy-MM-dd of the generated occurrence
    kind: 'replace' | 'cancel';
    start?: string;
    end?: string;
    title?: string;
    notes?: string;
    completedAt?: string;
}

export type RecordOrigin = 'local' | 'remote-backend' | 'external-calendar';

export type SyncTargetId = Exclude<RecordOrigin, 'local'>;

export const SYNC_TARGET_IDS: readonly SyncTargetId[] = ['remote-backend', 'external-calendar'];

interface SyncableRecordBase {
    id: string;
    origin: RecordOrigin;
    version: number;
    updatedAt: string;
    deletedAt?: string;
}

export interface SeriesRecord extends SyncableRecordBase {
    kind: 'series';
    payload: SeriesPayload;
}

export interface ExceptionRecord extends SyncableRecordBase {
    kind: 'exception';
    payload: ExceptionPayload;
}

export type SyncableRecord = SeriesRecord | ExceptionRecord;

export type RecordKind = SyncableRecord['kind'];

export type OccurrenceStatus = 'generated' | 'modified' | 'cancelled';

export interface Occurrence {
    id: string;
    seriesId: string;
    sequence: number;
    originalDate: string;
    start: string;
    end: string;
    status: OccurrenceStatus;
    itemKind: ItemKind;
    title: string;
    notes?: string;
    completedAt?: string;
}

export type ChangeOperation = 'create' | 'update' | 'delete';

export interface PendingChange {
    id: string;
    target: SyncTargetId;
    op: ChangeOperation;
    recordId: string;
    record: SyncableRecord;
    createdAt: string;
    retryCount: number;
    nextAttemptAt?: string;
    lastError?: string;
    failedAt?: string;
}

export type ConflictResolutionPolicy = 'newer-wins' | 'local-wins' | 'remote-wins';

export type NotificationKind = 'event-reminder' | 'task-due' | 'task-overdue' | 'daily-summary';

export interface ScheduledNotification {
    id: string;
    occurrenceId: string;
    offsetMinutes: number;
    triggerAt: string;
    channel: string;
    kind: NotificationKind;
}

export type AuthorizationState = 'not-requested' | 'denied' | 'read-write' | 'write-only';

export type SyncState = 'idle' | 'pulling' | 'reconciling' | 'pushing' | 'failed';

export interface TargetSyncStatus {
    state: SyncState;
    failureReason?: string;
    suspended: boolean;
    queued: boolean;
    lastSyncAt?: string;
    lastResult?: 'success' | 'error';
    failedChanges: number;
    pendingChanges: number;
    conflictsResolved: number;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });
