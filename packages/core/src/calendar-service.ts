import { addDays } from 'date-fns';
import * as z from 'zod';

import { safeParseDate, toDateKey } from './date';
import { RecordNotFoundError, ValidationError } from './errors';
import { logError, logInfo } from './logger';
import {
    DAILY_SUMMARY_SERIES_ID,
    type NotificationAction,
    type NotificationPayload,
    type NotificationSchedulerService,
} from './notification-scheduler';
import {
    exceptionIdFor,
    expandRecurrence,
    findFirstStartOnOrAfter,
    validateRecurrenceRule,
    type ExpansionWindow,
} from './recurrence';
import { mergeSettings, type CoreSettings, type CoreSettingsInput } from './settings';
import type { LocalStore, StoreWriter } from './sqlite-store';
import type { CoreStatusStore } from './status-store';
import type { SyncCoordinator, SyncCycleResult } from './sync-coordinator';
import type {
    ChangeOperation,
    ConflictResolutionPolicy,
    ExceptionPayload,
    ExceptionRecord,
    ItemKind,
    Occurrence,
    RecurrenceRule,
    SeriesPayload,
    SeriesRecord,
    SyncableRecord,
} from './types';
import { generateUUID } from './uuid';

const DateInputSchema = z.union([z.date(), z.string()]).transform((value, ctx) => {
    const date = typeof value === 'string' ? safeParseDate(value) : value;
    if (!date || Number.isNaN(date.getTime())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' });
        return z.NEVER;
    }
    return date;
});

const CreateSeriesSchema = z.object({
    title: z.string().trim().min(1, 'Title is required'),
    itemKind: z.enum(['event', 'task']),
    start: DateInputSchema,
    durationMs: z.number().int().min(0).default(0),
    notes: z.string().optional(),
    location: z.string().optional(),
    category: z.string().optional(),
});

const SeriesUpdateSchema = z
    .object({
        title: z.string().trim().min(1, 'Title is required'),
        durationMs: z.number().int().min(0),
        notes: z.string(),
        location: z.string(),
        category: z.string(),
    })
    .partial()
    .strict();

const OccurrenceEditSchema = z
    .object({
        start: DateInputSchema,
        end: DateInputSchema,
        title: z.string().trim().min(1, 'Title is required'),
        notes: z.string(),
    })
    .partial()
    .strict();

export type CreateSeriesInput = {
    title: string;
    itemKind: ItemKind;
    start: Date | string;
    durationMs?: number;
    rule?: RecurrenceRule | null;
    notes?: string;
    location?: string;
    category?: string;
};

export type SeriesUpdates = Partial<Pick<SeriesPayload, 'title' | 'durationMs' | 'notes' | 'location' | 'category'>>;

export type OccurrenceEdit = {
    start?: Date | string;
    end?: Date | string;
    title?: string;
    notes?: string;
};

export type ListOccurrencesOptions = {
    includeCancelled?: boolean;
};

export type CalendarServiceOptions = {
    store: LocalStore;
    coordinator: SyncCoordinator;
    notifications: NotificationSchedulerService;
    status: CoreStatusStore;
    now?: () => Date;
    /** Called after settings changed, e.g. to reconfigure the journal. */
    onSettingsChanged?: (settings: CoreSettings) => void;
};

export type NotificationActionResult =
    | { action: 'view'; occurrence: Occurrence | null }
    | { action: 'complete'; exception: ExceptionRecord }
    | { action: 'snooze'; notificationId: string };

type Write = { record: SyncableRecord; op: ChangeOperation };

const describeZodError = (error: z.ZodError) =>
    error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) throw new ValidationError(describeZodError(parsed.error));
    return parsed.data;
}

const isSeries = (record: SyncableRecord | null): record is SeriesRecord => !!record && record.kind === 'series';

const isException = (record: SyncableRecord | null): record is ExceptionRecord =>
    !!record && record.kind === 'exception';

/**
 * Expands every live series of the store over the window, ordered by start.
 * A series that fails to expand is logged and left out.
 */
export async function loadOccurrences(
    store: LocalStore,
    window: ExpansionWindow,
    includeCancelled: boolean
): Promise<Occurrence[]> {
    const records = await store.listRecords();
    const exceptionsBySeries = new Map<string, ExceptionPayload[]>();
    for (const record of records) {
        if (record.kind !== 'exception') continue;
        const list = exceptionsBySeries.get(record.payload.seriesId) ?? [];
        list.push(record.payload);
        exceptionsBySeries.set(record.payload.seriesId, list);
    }
    const result: Occurrence[] = [];
    for (const record of records) {
        if (record.kind !== 'series') continue;
        const expanded = expandRecurrence(record, window, exceptionsBySeries.get(record.id) ?? [], {
            includeCancelled,
        });
        if (!expanded.ok) {
            void logError(new Error(expanded.error.message), {
                scope: 'calendar',
                extra: { seriesId: record.id, code: expanded.error.code },
            });
            continue;
        }
        result.push(...expanded.value);
    }
    return result.sort((a, b) => a.start.localeCompare(b.start) || a.id.localeCompare(b.id));
}

/**
 * Command facade for UI consumers.
 *
 * Every mutation validates first, then writes its records and the matching
 * journal entries in one transaction, then asks for a sync and brings
 * reminders up to date.
 */
export class CalendarService {
    private readonly store: LocalStore;
    private readonly coordinator: SyncCoordinator;
    private readonly notifications: NotificationSchedulerService;
    private readonly status: CoreStatusStore;
    private readonly now: () => Date;
    private readonly onSettingsChanged?: (settings: CoreSettings) => void;

    constructor(options: CalendarServiceOptions) {
        this.store = options.store;
        this.coordinator = options.coordinator;
        this.notifications = options.notifications;
        this.status = options.status;
        this.now = options.now ?? (() => new Date());
        this.onSettingsChanged = options.onSettingsChanged;
    }

    getSettings(): CoreSettings {
        return this.status.getState().settings;
    }

    async createSeries(input: CreateSeriesInput): Promise<SeriesRecord> {
        const parsed = parseOrThrow(CreateSeriesSchema, input);
        const rule = this.validateRule(input.rule ?? null, parsed.start);
        const record: SeriesRecord = {
            id: generateUUID(),
            kind: 'series',
            origin: 'local',
            version: 1,
            updatedAt: this.now().toISOString(),
            payload: {
                title: parsed.title,
                itemKind: parsed.itemKind,
                anchor: parsed.start.toISOString(),
                durationMs: parsed.durationMs,
                rule,
                notes: parsed.notes,
                location: parsed.location,
                category: parsed.category,
            },
        };
        return this.commit(async () => ({ result: record, writes: [{ record, op: 'create' }] }));
    }

    /** Changes fields that do not affect which dates the series generates. */
    async updateSeries(seriesId: string, updates: SeriesUpdates): Promise<SeriesRecord> {
        const changes = parseOrThrow(SeriesUpdateSchema, updates);
        return this.commit(async (tx) => {
            const series = await this.requireSeries(tx, seriesId);
            const updated = this.bump(series, { ...series.payload, ...changes });
            return { result: updated, writes: [{ record: updated, op: 'update' }] };
        });
    }

    /**
     * Replaces the rule from `effectiveFrom` on. Occurrences before the first
     * generated start at or after that instant stay with the old series, which
     * ends there; the rest continue as a new series linked by `previousSeriesId`.
     * Exceptions of the old series from the split date on are dropped.
     */
    async replaceRule(
        seriesId: string,
        rule: RecurrenceRule | null,
        effectiveFrom: Date
    ): Promise<{ previous: SeriesRecord; next: SeriesRecord }> {
        return this.commit(async (tx) => {
            const series = await this.requireSeries(tx, seriesId);
            const anchor = new Date(series.payload.anchor);
            const split = series.payload.rule
                ? findFirstStartOnOrAfter(series.payload.rule, anchor, effectiveFrom)
                : anchor.getTime() >= effectiveFrom.getTime()
                  ? { sequence: 0, start: anchor }
                  : null;
            const nextAnchor = split ? split.start : effectiveFrom;
            const nextRule = this.validateRule(rule, nextAnchor);
            const now = this.now().toISOString();
            const writes: Write[] = [];

            let previous: SeriesRecord;
            if (split && split.sequence === 0) {
                previous = this.bump(series, series.payload, now, now);
                writes.push({ record: previous, op: 'delete' });
            } else if (split && series.payload.rule) {
                previous = this.bump(series, {
                    ...series.payload,
                    rule: { ...series.payload.rule, end: { type: 'until', until: split.start.toISOString() } },
                });
                writes.push({ record: previous, op: 'update' });
            } else {
                previous = series;
            }

            const splitDate = split ? toDateKey(split.start) : null;
            const exceptions = await tx.listExceptions(seriesId);
            for (const exception of exceptions) {
                if (splitDate === null || exception.payload.originalDate < splitDate) continue;
                writes.push({ record: this.bump(exception, exception.payload, now, now), op: 'delete' });
            }

            const next: SeriesRecord = {
                id: generateUUID(),
                kind: 'series',
                origin: 'local',
                version: 1,
                updatedAt: now,
                payload: {
                    ...series.payload,
                    anchor: nextAnchor.toISOString(),
                    rule: nextRule,
                    previousSeriesId: series.id,
                },
            };
            writes.push({ record: next, op: 'create' });
            return { result: { previous, next }, writes };
        });
    }

    async editOccurrence(seriesId: string, originalDate: string, edit: OccurrenceEdit): Promise<ExceptionRecord> {
        const changes = parseOrThrow(OccurrenceEditSchema, edit);
        return this.writeException(seriesId, originalDate, (occurrence, current, series) => {
            if (current?.kind === 'cancel') {
                throw new ValidationError(`Occurrence ${occurrence.id} is cancelled; reset it before editing`);
            }
            const start = changes.start ?? new Date(current?.start ?? occurrence.start);
            const end = changes.end ?? (changes.start ? new Date(start.getTime() + series.payload.durationMs) : new Date(current?.end ?? occurrence.end));
            if (end.getTime() < start.getTime()) {
                throw new ValidationError('Occurrence end must not be before its start');
            }
            return {
                seriesId,
                itemKind: series.payload.itemKind,
                originalDate,
                kind: 'replace',
                start: start.toISOString(),
                end: end.toISOString(),
                title: changes.title ?? current?.title,
                notes: changes.notes ?? current?.notes,
                completedAt: current?.completedAt,
            };
        });
    }

    async cancelOccurrence(seriesId: string, originalDate: string): Promise<ExceptionRecord> {
        return this.writeException(seriesId, originalDate, (_occurrence, _current, series) => ({
            seriesId,
            itemKind: series.payload.itemKind,
            originalDate,
            kind: 'cancel',
        }));
    }

    async setOccurrenceCompleted(seriesId: string, originalDate: string, completed: boolean): Promise<ExceptionRecord> {
        const completedAt = completed ? this.now().toISOString() : undefined;
        return this.writeException(seriesId, originalDate, (occurrence, current, series) => {
            if (current?.kind === 'cancel') {
                throw new ValidationError(`Occurrence ${occurrence.id} is cancelled`);
            }
            return {
                seriesId,
                itemKind: series.payload.itemKind,
                originalDate,
                kind: 'replace',
                start: current?.start ?? occurrence.start,
                end: current?.end ?? occurrence.end,
                title: current?.title,
                notes: current?.notes,
                completedAt,
            };
        });
    }

    /** Drops the occurrence's exception so it follows the series again. */
    async resetOccurrence(seriesId: string, originalDate: string): Promise<void> {
        await this.commit(async (tx) => {
            await this.requireSeries(tx, seriesId);
            const existing = await tx.getRecord(exceptionIdFor(seriesId, originalDate));
            if (!isException(existing) || existing.deletedAt) return { result: undefined, writes: [] };
            const now = this.now().toISOString();
            return { result: undefined, writes: [{ record: this.bump(existing, existing.payload, now, now), op: 'delete' }] };
        });
    }

    async deleteSeries(seriesId: string): Promise<void> {
        await this.commit(async (tx) => {
            const series = await this.requireSeries(tx, seriesId);
            const now = this.now().toISOString();
            const writes: Write[] = [{ record: this.bump(series, series.payload, now, now), op: 'delete' }];
            for (const exception of await tx.listExceptions(seriesId)) {
                writes.push({ record: this.bump(exception, exception.payload, now, now), op: 'delete' });
            }
            return { result: undefined, writes };
        });
    }

    /**
     * Occurrences of every live series whose generated start falls in the
     * window, ordered by start. Publishes the visible ones to the status store.
     */
    async listOccurrences(window: ExpansionWindow, options: ListOccurrencesOptions = {}): Promise<Occurrence[]> {
        const occurrences = await loadOccurrences(this.store, window, options.includeCancelled === true);
        this.status.getState().setOccurrences(
            occurrences.filter((occurrence) => occurrence.status !== 'cancelled'),
            { start: window.start.toISOString(), end: window.end.toISOString() }
        );
        return occurrences;
    }

    async setConflictPolicy(policy: ConflictResolutionPolicy): Promise<CoreSettings> {
        return this.updateSettings({ conflictPolicy: policy });
    }

    async updateNotificationSettings(updates: NonNullable<CoreSettingsInput['notifications']>): Promise<CoreSettings> {
        return this.updateSettings({ notifications: updates });
    }

    async updateSettings(updates: CoreSettingsInput): Promise<CoreSettings> {
        let next: CoreSettings;
        try {
            next = mergeSettings(this.getSettings(), updates);
        } catch (error) {
            if (error instanceof z.ZodError) throw new ValidationError(describeZodError(error));
            throw error;
        }
        await this.store.transaction((tx) => tx.saveSettings(next));
        this.status.getState().setSettings(next);
        this.onSettingsChanged?.(next);
        void logInfo('Settings updated', { scope: 'calendar', extra: { conflictPolicy: next.conflictPolicy } });
        await this.refreshDerivedState();
        return next;
    }

    /** Runs an action the user picked on a delivered notification. */
    async handleNotificationAction(
        payload: NotificationPayload,
        action: NotificationAction
    ): Promise<NotificationActionResult> {
        if (!payload.actions.includes(action)) {
            throw new ValidationError(`Notification ${payload.occurrenceId} does not offer '${action}'`);
        }
        switch (action) {
            case 'complete': {
                const exception = await this.setOccurrenceCompleted(payload.seriesId, payload.originalDate, true);
                return { action, exception };
            }
            case 'snooze':
                return { action, notificationId: await this.notifications.snooze(payload) };
            case 'view': {
                const day = safeParseDate(payload.originalDate);
                if (!day || payload.seriesId === DAILY_SUMMARY_SERIES_ID) return { action, occurrence: null };
                const occurrences = await loadOccurrences(this.store, { start: day, end: addDays(day, 1) }, true);
                const occurrence = occurrences.find((entry) => entry.id === payload.occurrenceId) ?? null;
                return { action, occurrence };
            }
        }
    }

    syncNow(): Promise<SyncCycleResult[]> {
        return this.coordinator.syncNow();
    }

    /** Re-derives reminders and the published window after records changed underneath. */
    async refreshDerivedState(): Promise<void> {
        try {
            await this.notifications.reconcile();
            const published = this.status.getState().occurrencesWindow;
            if (published) {
                await this.listOccurrences({ start: new Date(published.start), end: new Date(published.end) });
            }
        } catch (error) {
            void logError(error, { scope: 'calendar', extra: { step: 'refresh' } });
        }
    }

    private validateRule(rule: RecurrenceRule | null, anchor: Date): RecurrenceRule | null {
        if (rule === null) return null;
        const validated = validateRecurrenceRule(rule, anchor);
        if (!validated.ok) throw validated.error;
        return validated.value;
    }

    private bump<R extends SyncableRecord>(record: R, payload: R['payload'], now?: string, deletedAt?: string): R {
        return {
            ...record,
            origin: 'local',
            version: record.version + 1,
            updatedAt: now ?? this.now().toISOString(),
            deletedAt,
            payload,
        };
    }

    private async requireSeries(tx: StoreWriter, seriesId: string): Promise<SeriesRecord> {
        const record = await tx.getRecord(seriesId);
        if (!isSeries(record) || record.deletedAt) throw new RecordNotFoundError(seriesId);
        return record;
    }

    /** The generated occurrence for `originalDate`, exceptions ignored. */
    private findGeneratedOccurrence(series: SeriesRecord, originalDate: string): Occurrence {
        const day = safeParseDate(originalDate);
        if (!day || !/^\d{4}-\d{2}-\d{2}$/.test(originalDate)) {
            throw new ValidationError(`Invalid occurrence date: ${originalDate}`);
        }
        const expanded = expandRecurrence(series, { start: day, end: addDays(day, 1) }, [], { includeCancelled: true });
        const occurrence = expanded.ok ? expanded.value.find((entry) => entry.originalDate === originalDate) : undefined;
        if (!occurrence) throw new RecordNotFoundError(`${series.id}:${originalDate}`);
        return occurrence;
    }

    private async writeException(
        seriesId: string,
        originalDate: string,
        build: (occurrence: Occurrence, current: ExceptionPayload | null, series: SeriesRecord) => ExceptionPayload
    ): Promise<ExceptionRecord> {
        return this.commit(async (tx) => {
            const series = await this.requireSeries(tx, seriesId);
            const occurrence = this.findGeneratedOccurrence(series, originalDate);
            const existing = await tx.getRecord(exceptionIdFor(seriesId, originalDate));
            const current = isException(existing) && !existing.deletedAt ? existing.payload : null;
            const payload = build(occurrence, current, series);
            const written: ExceptionRecord = isException(existing)
                ? this.bump(existing, payload)
                : {
                      id: exceptionIdFor(seriesId, originalDate),
                      kind: 'exception',
                      origin: 'local',
                      version: 1,
                      updatedAt: this.now().toISOString(),
                      payload,
                  };
            return { result: written, writes: [{ record: written, op: current ? 'update' : 'create' }] };
        });
    }

    /** Writes records and their journal entries atomically, then syncs and refreshes reminders. */
    private async commit<T>(collect: (tx: StoreWriter) => Promise<{ result: T; writes: Write[] }>): Promise<T> {
        const { result, written } = await this.store.transaction(async (tx) => {
            const collected = await collect(tx);
            for (const { record, op } of collected.writes) {
                await tx.putRecord(record);
                await this.coordinator.enqueueForTargets(tx, record, op);
            }
            return { result: collected.result, written: collected.writes.length };
        });
        if (written > 0) {
            this.coordinator.requestSync();
            await this.refreshDerivedState();
        }
        return result;
    }
}
