import { addDays, addMinutes, setHours, setMinutes, startOfDay } from 'date-fns';

import { parseTimeOfDay, toDateKey, toTime } from './date';
import { errorMessage, NotificationSchedulingError } from './errors';
import { logError, logInfo, logWarn } from './logger';
import type { ExpansionWindow } from './recurrence';
import type { CoreSettings, NotificationSettings } from './settings';
import type { LocalStore } from './sqlite-store';
import type { CoreStatusStore } from './status-store';
import type { NotificationKind, Occurrence, ScheduledNotification } from './types';

export const DAILY_SUMMARY_SERIES_ID = 'daily-summary';

export const SNOOZE_MINUTES: Record<NotificationKind, number> = {
    'event-reminder': 15,
    'task-due': 60,
    'task-overdue': 60,
    'daily-summary': 15,
};

/** An uncompleted task is reported overdue this long after its due time. */
export const TASK_OVERDUE_DELAY_MINUTES = 60;

const DAY_MS = 24 * 60 * 60 * 1000;

export type ReminderOffsets = readonly number[] | { event: readonly number[]; task: readonly number[] };

export type NotificationAction = 'view' | 'complete' | 'snooze';

export type NotificationPayload = {
    title: string;
    body: string;
    kind: NotificationKind;
    occurrenceId: string;
    seriesId: string;
    originalDate: string;
    itemTitle: string;
    offsetMinutes: number;
    sound: NotificationSettings['sound'];
    channel: string;
    actions: NotificationAction[];
    snoozed?: boolean;
};

/** System notification facility (local notifications of the host OS). */
export interface NotificationService {
    /** May throw NotificationSchedulingError, e.g. when the system quota is full. */
    schedule(id: string, triggerAt: Date, payload: NotificationPayload): Promise<void>;
    cancel(id: string): Promise<void>;
    /** Ids of notifications the system still holds. */
    listPending(): Promise<string[]>;
}

export type ReconcileInput = {
    occurrences: readonly Occurrence[];
    reminderOffsets: ReminderOffsets;
    scheduled: readonly ScheduledNotification[];
    now: Date;
    channel?: string;
    /** Minutes after the due time at which a still-open task is reported overdue; null disables it. */
    overdueDelayMinutes?: number | null;
};

export type NotificationDiff = {
    toSchedule: ScheduledNotification[];
    toCancel: ScheduledNotification[];
    /** Trigger already passed; forget without a command. */
    expired: ScheduledNotification[];
};

export const notificationIdFor = (occurrenceId: string, offsetMinutes: number): string =>
    `${occurrenceId}#${offsetMinutes}`;

export const overdueNotificationIdFor = (occurrenceId: string): string => `${occurrenceId}#overdue`;

/** Ids this scheduler owns; anything else in the system's list (snoozes, other features) is left alone. */
export const isManagedNotificationId = (id: string): boolean => /#(\d+|overdue)$/.test(id);

const isSummary = (occurrence: Occurrence) => occurrence.seriesId === DAILY_SUMMARY_SERIES_ID;

export const notificationKindFor = (occurrence: Occurrence): NotificationKind => {
    if (isSummary(occurrence)) return 'daily-summary';
    return occurrence.itemKind === 'task' ? 'task-due' : 'event-reminder';
};

const offsetsFor = (occurrence: Occurrence, offsets: ReminderOffsets): readonly number[] => {
    if (isSummary(occurrence)) return [0];
    if (isOffsetList(offsets)) return offsets;
    return occurrence.itemKind === 'task' ? offsets.task : offsets.event;
};

const isOffsetList = (offsets: ReminderOffsets): offsets is readonly number[] => Array.isArray(offsets);

const isLive = (occurrence: Occurrence) => occurrence.status !== 'cancelled' && !occurrence.completedAt;

/**
 * Diff the reminders that should exist against the ones that do.
 *
 * A pair is (occurrence, offset) with trigger = start - offset. Pairs of live
 * occurrences whose trigger is still ahead are desired. Unchanged pairs yield
 * no command; a moved trigger is cancelled and scheduled again under the same
 * id. Every pair of a cancelled or completed occurrence is cancelled; a pair
 * whose trigger has passed while its occurrence is live is only forgotten.
 * Open tasks also get one overdue reminder `overdueDelayMinutes` after their
 * start, diffed and cancelled the same way.
 */
export function reconcileNotifications(input: ReconcileInput): NotificationDiff {
    const nowMs = input.now.getTime();
    const channel = input.channel ?? 'default';
    const desired = new Map<string, ScheduledNotification>();
    const occurrenceState = new Map<string, 'live' | 'ended'>();

    for (const occurrence of input.occurrences) {
        const live = isLive(occurrence);
        occurrenceState.set(occurrence.id, live ? 'live' : 'ended');
        if (!live) continue;
        const startMs = toTime(occurrence.start);
        for (const offset of new Set(offsetsFor(occurrence, input.reminderOffsets))) {
            const triggerMs = startMs - offset * 60_000;
            if (triggerMs <= nowMs) continue;
            const id = notificationIdFor(occurrence.id, offset);
            desired.set(id, {
                id,
                occurrenceId: occurrence.id,
                offsetMinutes: offset,
                triggerAt: new Date(triggerMs).toISOString(),
                channel,
                kind: notificationKindFor(occurrence),
            });
        }
        const overdueDelay = input.overdueDelayMinutes;
        if (overdueDelay == null || isSummary(occurrence) || occurrence.itemKind !== 'task') continue;
        const overdueMs = startMs + overdueDelay * 60_000;
        if (overdueMs <= nowMs) continue;
        const overdueId = overdueNotificationIdFor(occurrence.id);
        desired.set(overdueId, {
            id: overdueId,
            occurrenceId: occurrence.id,
            // Negative: the trigger follows the start.
            offsetMinutes: -overdueDelay,
            triggerAt: new Date(overdueMs).toISOString(),
            channel,
            kind: 'task-overdue',
        });
    }

    const diff: NotificationDiff = { toSchedule: [], toCancel: [], expired: [] };
    const current = new Map<string, ScheduledNotification>();
    for (const entry of input.scheduled) {
        current.set(entry.id, entry);
        const wanted = desired.get(entry.id);
        if (wanted) {
            if (toTime(wanted.triggerAt) !== toTime(entry.triggerAt) || wanted.channel !== entry.channel) {
                diff.toCancel.push(entry);
                diff.toSchedule.push(wanted);
            }
            continue;
        }
        const state = occurrenceState.get(entry.occurrenceId);
        const passed = toTime(entry.triggerAt) <= nowMs;
        if (state === 'ended' || !passed) {
            diff.toCancel.push(entry);
        } else {
            diff.expired.push(entry);
        }
    }
    for (const [id, wanted] of desired) {
        if (!current.has(id)) diff.toSchedule.push(wanted);
    }

    diff.toSchedule.sort((a, b) => toTime(a.triggerAt) - toTime(b.triggerAt) || a.id.localeCompare(b.id));
    diff.toCancel.sort((a, b) => a.id.localeCompare(b.id));
    diff.expired.sort((a, b) => a.id.localeCompare(b.id));
    return diff;
}

/** One zero-offset pseudo occurrence per local day at `time` (HH:mm). */
export function buildDailySummaryOccurrences(window: ExpansionWindow, time: string): Occurrence[] {
    const parsed = parseTimeOfDay(time);
    if (!parsed) return [];
    const result: Occurrence[] = [];
    let day = startOfDay(window.start);
    for (let sequence = 0; day.getTime() < window.end.getTime(); sequence += 1) {
        const start = setMinutes(setHours(day, parsed.hours), parsed.minutes);
        if (start.getTime() >= window.start.getTime() && start.getTime() < window.end.getTime()) {
            const originalDate = toDateKey(day);
            result.push({
                id: `${DAILY_SUMMARY_SERIES_ID}:${originalDate}`,
                seriesId: DAILY_SUMMARY_SERIES_ID,
                sequence,
                originalDate,
                start: start.toISOString(),
                end: start.toISOString(),
                status: 'generated',
                itemKind: 'event',
                title: 'Daily Summary',
            });
        }
        day = addDays(day, 1);
    }
    return result;
}

export function formatReminderOffset(minutes: number): string {
    const plural = (value: number, unit: string) => `${value} ${unit}${value === 1 ? '' : 's'}`;
    if (minutes > 0 && minutes % 1440 === 0) return plural(minutes / 1440, 'day');
    if (minutes > 0 && minutes % 60 === 0) return plural(minutes / 60, 'hour');
    return plural(minutes, 'minute');
}

export type NotificationSubject = Pick<Occurrence, 'seriesId' | 'originalDate' | 'title'>;

const isTaskKind = (kind: NotificationKind) => kind === 'task-due' || kind === 'task-overdue';

export function buildNotificationPayload(
    notification: ScheduledNotification,
    subject: NotificationSubject,
    settings: Pick<NotificationSettings, 'sound' | 'channel'>
): NotificationPayload {
    const title = subject.title.trim() || (isTaskKind(notification.kind) ? 'Untitled Task' : 'Untitled Event');
    const base = {
        kind: notification.kind,
        occurrenceId: notification.occurrenceId,
        seriesId: subject.seriesId,
        originalDate: subject.originalDate,
        itemTitle: title,
        offsetMinutes: notification.offsetMinutes,
        sound: settings.sound,
        channel: settings.channel,
    };
    switch (notification.kind) {
        case 'daily-summary':
            return { ...base, title: 'Daily Summary', body: "Here's your schedule for today", actions: ['view'] };
        case 'task-due':
            return {
                ...base,
                title: 'Task Due',
                body:
                    notification.offsetMinutes === 0
                        ? `${title} is due now`
                        : `${title} is due in ${formatReminderOffset(notification.offsetMinutes)}`,
                actions: ['view', 'complete', 'snooze'],
            };
        case 'task-overdue':
            return {
                ...base,
                title: 'Task Overdue',
                body: `${title} is overdue`,
                sound: 'urgent',
                actions: ['view', 'complete', 'snooze'],
            };
        case 'event-reminder':
            return {
                ...base,
                title: 'Event Reminder',
                body:
                    notification.offsetMinutes === 0
                        ? `${title} is starting now`
                        : `${title} starts in ${formatReminderOffset(notification.offsetMinutes)}`,
                actions: ['view', 'snooze'],
            };
    }
}

export function reminderOffsetsFromSettings(settings: NotificationSettings): { event: number[]; task: number[] } {
    if (!settings.enabled) return { event: [], task: [] };
    return {
        event: settings.eventRemindersEnabled ? [...settings.eventReminderOffsets] : [],
        task: settings.taskRemindersEnabled ? [...settings.taskReminderOffsets] : [],
    };
}

export type NotificationSchedulerOptions = {
    store: LocalStore;
    service: NotificationService;
    status: CoreStatusStore;
    getSettings: () => CoreSettings;
    /** Occurrences (cancelled included) whose generated start falls in the window. */
    loadOccurrences: (window: ExpansionWindow) => Promise<Occurrence[]>;
    now?: () => Date;
};

export type ReconcileReport = NotificationDiff & {
    scheduled: number;
    cancelled: number;
    failed: number;
};

/**
 * Drives the system notification service from `reconcileNotifications`.
 * Runs are serialized; a failing command is logged and reported as degraded
 * reminders, never thrown to the caller.
 */
export class NotificationSchedulerService {
    private readonly store: LocalStore;
    private readonly service: NotificationService;
    private readonly status: CoreStatusStore;
    private readonly getSettings: () => CoreSettings;
    private readonly loadOccurrences: (window: ExpansionWindow) => Promise<Occurrence[]>;
    private readonly now: () => Date;
    private tail: Promise<unknown> = Promise.resolve();

    constructor(options: NotificationSchedulerOptions) {
        this.store = options.store;
        this.service = options.service;
        this.status = options.status;
        this.getSettings = options.getSettings;
        this.loadOccurrences = options.loadOccurrences;
        this.now = options.now ?? (() => new Date());
    }

    private serialize<T>(operation: () => Promise<T>): Promise<T> {
        const result = this.tail.then(operation);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    reconcile(): Promise<ReconcileReport> {
        return this.serialize(() => this.runReconcile());
    }

    /** Cancels system notifications the store does not know and forgets entries the system lost. */
    healOnStartup(): Promise<{ cancelledOrphans: number; forgotten: number }> {
        return this.serialize(async () => {
            const pending = new Set(await this.service.listPending());
            const tracked = await this.store.listScheduledNotifications();
            const trackedIds = new Set(tracked.map((entry) => entry.id));

            let cancelledOrphans = 0;
            for (const id of pending) {
                if (!isManagedNotificationId(id) || trackedIds.has(id)) continue;
                try {
                    await this.service.cancel(id);
                    cancelledOrphans += 1;
                } catch (error) {
                    void logError(error, { scope: 'notifications', extra: { step: 'heal-cancel', notificationId: id } });
                }
            }
            const lost = tracked.filter((entry) => !pending.has(entry.id)).map((entry) => entry.id);
            if (lost.length > 0) {
                await this.store.transaction((tx) => tx.deleteScheduledNotifications(lost));
            }
            if (cancelledOrphans > 0 || lost.length > 0) {
                void logInfo('Healed notification state', {
                    scope: 'notifications',
                    extra: { cancelledOrphans: String(cancelledOrphans), forgotten: String(lost.length) },
                });
            }
            await this.publishPending();
            return { cancelledOrphans, forgotten: lost.length };
        });
    }

    /** Re-delivers a shown reminder later: 15 minutes for events, 1 hour for tasks. */
    async snooze(payload: NotificationPayload): Promise<string> {
        const minutes = SNOOZE_MINUTES[payload.kind];
        const triggerAt = addMinutes(this.now(), minutes);
        const id = `snooze:${payload.occurrenceId}:${triggerAt.getTime()}`;
        const body =
            payload.kind === 'task-overdue'
                ? `${payload.itemTitle} is still overdue`
                : payload.kind === 'task-due'
                  ? `${payload.itemTitle} is due soon`
                  : `${payload.itemTitle} starts soon`;
        await this.service.schedule(id, triggerAt, { ...payload, body, snoozed: true });
        return id;
    }

    async pendingCount(): Promise<number> {
        return (await this.store.listScheduledNotifications()).length;
    }

    private async runReconcile(): Promise<ReconcileReport> {
        const settings = this.getSettings();
        const notifications = settings.notifications;
        const now = this.now();
        const offsets = reminderOffsetsFromSettings(notifications);
        const maxOffset = Math.max(0, ...offsets.event, ...offsets.task);
        const overdueDelayMinutes =
            notifications.enabled && notifications.taskRemindersEnabled && notifications.taskOverdueRemindersEnabled
                ? TASK_OVERDUE_DELAY_MINUTES
                : null;
        // The window is on generated starts, so it reaches back far enough to see
        // occurrences moved from a past date to a later time.
        const window: ExpansionWindow = {
            start: new Date(now.getTime() - notifications.horizonDays * DAY_MS),
            end: new Date(now.getTime() + notifications.horizonDays * DAY_MS + maxOffset * 60_000),
        };

        const occurrences = notifications.enabled ? [...(await this.loadOccurrences(window))] : [];
        if (notifications.enabled && notifications.dailySummary.enabled) {
            occurrences.push(
                ...buildDailySummaryOccurrences(
                    { start: now, end: new Date(now.getTime() + notifications.horizonDays * DAY_MS) },
                    notifications.dailySummary.time
                )
            );
        }
        const subjects = new Map(occurrences.map((occurrence) => [occurrence.id, occurrence]));
        const scheduled = await this.store.listScheduledNotifications();
        const diff = reconcileNotifications({
            occurrences,
            reminderOffsets: offsets,
            scheduled,
            now,
            channel: notifications.channel,
            overdueDelayMinutes,
        });

        const forget = new Set<string>(diff.expired.map((entry) => entry.id));
        const keep: ScheduledNotification[] = [];
        let cancelled = 0;
        let failed = 0;
        let degradedReason: string | null = null;

        for (const entry of diff.toCancel) {
            try {
                await this.service.cancel(entry.id);
                forget.add(entry.id);
                cancelled += 1;
            } catch (error) {
                failed += 1;
                degradedReason = `Failed to cancel reminder: ${errorMessage(error)}`;
                void logError(error, { scope: 'notifications', extra: { step: 'cancel', notificationId: entry.id } });
            }
        }

        let quotaHit = false;
        for (const entry of diff.toSchedule) {
            if (quotaHit) {
                failed += 1;
                continue;
            }
            const subject = subjects.get(entry.occurrenceId);
            if (!subject) continue;
            try {
                const payload = buildNotificationPayload(entry, subject, notifications);
                await this.service.schedule(entry.id, new Date(entry.triggerAt), payload);
                keep.push(entry);
            } catch (error) {
                failed += 1;
                if (error instanceof NotificationSchedulingError && error.quotaExceeded) {
                    quotaHit = true;
                    degradedReason = 'Notification limit reached; later reminders are not scheduled';
                } else {
                    degradedReason = `Failed to schedule reminder: ${errorMessage(error)}`;
                }
                void logError(error, { scope: 'notifications', extra: { step: 'schedule', notificationId: entry.id } });
            }
        }

        if (forget.size > 0 || keep.length > 0) {
            await this.store.transaction(async (tx) => {
                await tx.deleteScheduledNotifications([...forget]);
                for (const entry of keep) {
                    await tx.putScheduledNotification(entry);
                }
            });
        }
        if (degradedReason) {
            void logWarn('Reminders degraded', { scope: 'notifications', extra: { failed: String(failed) } });
        }
        await this.publishPending(degradedReason);
        return { ...diff, scheduled: keep.length, cancelled, failed };
    }

    private async publishPending(degradedReason: string | null = null): Promise<void> {
        const pending = await this.pendingCount();
        this.status.getState().setNotificationState({ pending, degradedReason });
    }
}
