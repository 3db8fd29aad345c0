import * as z from 'zod';

import { toTime } from './date';
import { AuthorizationError, errorMessage } from './errors';
import { logWarn } from './logger';
import { exceptionIdFor, buildRRuleString, parseRRuleString } from './recurrence';
import { parseSyncableRecord } from './record-schema';
import { isRetryableError } from './retry-utils';
import type {
    AuthorizationState,
    ChangeOperation,
    PendingChange,
    SyncableRecord,
    SyncTargetId,
} from './types';

export type PullPage = {
    records: SyncableRecord[];
    cursor: string;
    hasMore: boolean;
};

export type PushOutcome =
    | { changeId: string; status: 'ack' }
    | { changeId: string; status: 'conflict'; record: SyncableRecord }
    | { changeId: string; status: 'error'; message: string; retryable: boolean };

/**
 * One remote store the coordinator keeps in step with the local store.
 * Implementations throw AuthorizationError when access is refused; every
 * other thrown error counts as a failed request.
 */
export interface SyncTarget {
    readonly id: SyncTargetId;
    authorization(): Promise<AuthorizationState>;
    /** Prompts for access again; resolves with the resulting state. */
    authorize(): Promise<AuthorizationState>;
    pull(cursor: string | null, signal: AbortSignal): Promise<PullPage>;
    /** One outcome per change; changes missing from the result count as errors. */
    push(changes: readonly PendingChange[], signal: AbortSignal): Promise<PushOutcome[]>;
    accepts(record: SyncableRecord): boolean;
}

// Remote backend

export type RemotePushEntry = {
    changeId: string;
    op: ChangeOperation;
    record: SyncableRecord;
};

/** Transport for the multi-device sync backend. Responses are validated by the target. */
export interface RemoteSyncBackend {
    authorization(): Promise<AuthorizationState>;
    authorize?(): Promise<AuthorizationState>;
    pull(cursor: string | null, limit: number, signal: AbortSignal): Promise<unknown>;
    push(entries: RemotePushEntry[], signal: AbortSignal): Promise<unknown>;
}

const RemotePullResponseSchema = z.object({
    changes: z.array(z.unknown()),
    cursor: z.string(),
    hasMore: z.boolean(),
});

const RemotePushResultSchema = z.object({
    changeId: z.string(),
    status: z.enum(['ack', 'conflict', 'error']),
    record: z.unknown().optional(),
    message: z.string().optional(),
    retryable: z.boolean().optional(),
});

const RemotePushResponseSchema = z.object({
    results: z.array(RemotePushResultSchema),
});

export type RemoteTargetOptions = {
    pageLimit: number;
};

export class RemoteBackendTarget implements SyncTarget {
    readonly id = 'remote-backend';
    private readonly backend: RemoteSyncBackend;
    private readonly options: RemoteTargetOptions;

    constructor(backend: RemoteSyncBackend, options: RemoteTargetOptions) {
        this.backend = backend;
        this.options = options;
    }

    authorization(): Promise<AuthorizationState> {
        return this.backend.authorization();
    }

    authorize(): Promise<AuthorizationState> {
        return this.backend.authorize ? this.backend.authorize() : this.backend.authorization();
    }

    async pull(cursor: string | null, signal: AbortSignal): Promise<PullPage> {
        const raw = await this.backend.pull(cursor, this.options.pageLimit, signal);
        const parsed = RemotePullResponseSchema.safeParse(raw);
        if (!parsed.success) {
            throw new Error(`Remote backend returned an invalid pull response: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
        }
        const records: SyncableRecord[] = [];
        for (const change of parsed.data.changes) {
            const record = parseSyncableRecord(change);
            if (record) {
                records.push(record);
            } else {
                void logWarn('Skipping malformed record from remote backend', { scope: 'sync', extra: { target: this.id } });
            }
        }
        return { records, cursor: parsed.data.cursor, hasMore: parsed.data.hasMore };
    }

    async push(changes: readonly PendingChange[], signal: AbortSignal): Promise<PushOutcome[]> {
        const raw = await this.backend.push(
            changes.map((change) => ({ changeId: change.id, op: change.op, record: change.record })),
            signal
        );
        const parsed = RemotePushResponseSchema.safeParse(raw);
        if (!parsed.success) {
            throw new Error('Remote backend returned an invalid push response');
        }
        return parsed.data.results.map((result): PushOutcome => {
            if (result.status === 'ack') return { changeId: result.changeId, status: 'ack' };
            if (result.status === 'conflict') {
                const record = parseSyncableRecord(result.record);
                if (record) return { changeId: result.changeId, status: 'conflict', record };
                return {
                    changeId: result.changeId,
                    status: 'error',
                    message: 'Conflict response carried no readable record',
                    retryable: true,
                };
            }
            return {
                changeId: result.changeId,
                status: 'error',
                message: result.message ?? 'Rejected by remote backend',
                retryable: result.retryable ?? true,
            };
        });
    }

    accepts(): boolean {
        return true;
    }
}

// External calendar

export type ExternalEventMetadata = {
    recordId: string;
    version: number;
    /** Last time the app wrote this event; a later `lastModified` means an outside edit. */
    syncedAt: string;
};

export type ExternalCalendarEvent = {
    externalId: string;
    title: string;
    start: string;
    end: string;
    notes?: string;
    location?: string;
    rrule?: string;
    /** Set on a detached single occurrence of a recurring event. */
    detachedFrom?: { recordId: string; originalDate: string };
    cancelled?: boolean;
    deleted?: boolean;
    lastModified: string;
    metadata?: ExternalEventMetadata;
};

export type ExternalEventInput = Omit<ExternalCalendarEvent, 'externalId' | 'lastModified' | 'deleted'> & {
    metadata: ExternalEventMetadata;
};

export interface ExternalCalendarService {
    authorizationStatus(): Promise<AuthorizationState>;
    requestAccess(): Promise<AuthorizationState>;
    listChangedEvents(
        since: string | null,
        signal: AbortSignal
    ): Promise<{ events: ExternalCalendarEvent[]; cursor: string; hasMore?: boolean }>;
    upsertEvent(event: ExternalEventInput, signal: AbortSignal): Promise<{ externalId: string }>;
    /** Deleting an unknown record id is not an error. */
    deleteEvent(recordId: string, signal: AbortSignal): Promise<void>;
}

const modifiedOutsideApp = (event: ExternalCalendarEvent): boolean => {
    if (!event.metadata) return true;
    return toTime(event.lastModified) > toTime(event.metadata.syncedAt);
};

/** Maps a calendar event to the record it mirrors, or null when it cannot be represented. */
export function eventToRecord(event: ExternalCalendarEvent): SyncableRecord | null {
    const baseVersion = event.metadata?.version ?? 0;
    const version = modifiedOutsideApp(event) ? baseVersion + 1 : baseVersion;
    const deletedAt = event.deleted ? event.lastModified : undefined;

    if (event.detachedFrom) {
        const { recordId: seriesId, originalDate } = event.detachedFrom;
        return parseSyncableRecord({
            id: exceptionIdFor(seriesId, originalDate),
            kind: 'exception',
            origin: 'external-calendar',
            version,
            updatedAt: event.lastModified,
            deletedAt,
            payload: event.cancelled
                ? { seriesId, itemKind: 'event', originalDate, kind: 'cancel' }
                : {
                      seriesId,
                      itemKind: 'event',
                      originalDate,
                      kind: 'replace',
                      start: event.start,
                      end: event.end,
                      title: event.title,
                      notes: event.notes,
                  },
        });
    }

    const rule = event.rrule ? parseRRuleString(event.rrule) : null;
    if (event.rrule && !rule) return null;
    return parseSyncableRecord({
        id: event.metadata?.recordId ?? `ext-${event.externalId}`,
        kind: 'series',
        origin: 'external-calendar',
        version,
        updatedAt: event.lastModified,
        deletedAt,
        payload: {
            title: event.title,
            itemKind: 'event',
            anchor: event.start,
            durationMs: Math.max(0, toTime(event.end) - toTime(event.start)),
            rule,
            notes: event.notes,
            location: event.location,
        },
    });
}

export function recordToEventInput(record: SyncableRecord, syncedAt: string): ExternalEventInput | null {
    const metadata: ExternalEventMetadata = { recordId: record.id, version: record.version, syncedAt };
    if (record.kind === 'series') {
        const { payload } = record;
        const start = new Date(payload.anchor);
        return {
            title: payload.title,
            start: payload.anchor,
            end: new Date(start.getTime() + payload.durationMs).toISOString(),
            notes: payload.notes,
            location: payload.location,
            rrule: payload.rule ? buildRRuleString(payload.rule) : undefined,
            metadata,
        };
    }
    const { payload } = record;
    if (payload.kind === 'replace' && (!payload.start || !payload.end)) return null;
    return {
        title: payload.title ?? '',
        start: payload.start ?? '',
        end: payload.end ?? '',
        notes: payload.notes,
        detachedFrom: { recordId: payload.seriesId, originalDate: payload.originalDate },
        cancelled: payload.kind === 'cancel',
        metadata,
    };
}

export type ExternalCalendarTargetOptions = {
    now?: () => Date;
};

export const HELD_BACK_MESSAGE = 'Held back behind an earlier change for the same record';

export class ExternalCalendarTarget implements SyncTarget {
    readonly id = 'external-calendar';
    private readonly service: ExternalCalendarService;
    private readonly now: () => Date;

    constructor(service: ExternalCalendarService, options: ExternalCalendarTargetOptions = {}) {
        this.service = service;
        this.now = options.now ?? (() => new Date());
    }

    authorization(): Promise<AuthorizationState> {
        return this.service.authorizationStatus();
    }

    authorize(): Promise<AuthorizationState> {
        return this.service.requestAccess();
    }

    async pull(cursor: string | null, signal: AbortSignal): Promise<PullPage> {
        const page = await this.service.listChangedEvents(cursor, signal);
        const records: SyncableRecord[] = [];
        for (const event of page.events) {
            const record = eventToRecord(event);
            if (record) {
                records.push(record);
            } else {
                void logWarn('Skipping calendar event that cannot be mapped', {
                    scope: 'sync',
                    extra: { target: this.id, externalId: event.externalId },
                });
            }
        }
        return { records, cursor: page.cursor, hasMore: page.hasMore ?? false };
    }

    /** Stops writing a record after its first failed change, so older data never lands after newer. */
    async push(changes: readonly PendingChange[], signal: AbortSignal): Promise<PushOutcome[]> {
        const outcomes: PushOutcome[] = [];
        const held = new Set<string>();
        for (const change of changes) {
            if (held.has(change.recordId)) {
                outcomes.push({ changeId: change.id, status: 'error', message: HELD_BACK_MESSAGE, retryable: true });
                continue;
            }
            try {
                await this.pushOne(change, signal);
                outcomes.push({ changeId: change.id, status: 'ack' });
            } catch (error) {
                if (error instanceof AuthorizationError) throw error;
                held.add(change.recordId);
                outcomes.push({
                    changeId: change.id,
                    status: 'error',
                    message: errorMessage(error),
                    retryable: isRetryableError(error),
                });
            }
        }
        return outcomes;
    }

    private async pushOne(change: PendingChange, signal: AbortSignal): Promise<void> {
        const { record } = change;
        if (change.op === 'delete' || record.deletedAt) {
            await this.service.deleteEvent(record.id, signal);
            return;
        }
        const input = recordToEventInput(record, this.now().toISOString());
        if (!input) throw new Error(`Record ${record.id} cannot be written to the calendar`);
        await this.service.upsertEvent(input, signal);
    }

    accepts(record: SyncableRecord): boolean {
        return record.payload.itemKind === 'event';
    }
}
