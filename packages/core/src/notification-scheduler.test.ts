import { describe, it, expect, beforeEach } from 'vitest';

import {
    buildDailySummaryOccurrences,
    buildNotificationPayload,
    formatReminderOffset,
    isManagedNotificationId,
    NotificationSchedulerService,
    reconcileNotifications,
} from './notification-scheduler';
import { mergeSettings } from './settings';
import type { SqliteStore } from './sqlite-store';
import { createStatusStore, type CoreStatusStore } from './status-store';
import { createClock, createMemoryStore, FakeNotificationService, testSettings } from './test-fakes';
import type { Occurrence, ScheduledNotification } from './types';

const occurrence = (id: string, start: string, overrides: Partial<Occurrence> = {}): Occurrence => ({
    id,
    seriesId: id.slice(0, id.indexOf(':')),
    sequence: 0,
    originalDate: start.slice(0, 10),
    start,
    end: start,
    status: 'generated',
    itemKind: 'event',
    title: 'Standup',
    ...overrides,
});

const scheduled = (id: string, occurrenceId: string, triggerAt: string, offsetMinutes = 15): ScheduledNotification => ({
    id,
    occurrenceId,
    offsetMinutes,
    triggerAt,
    channel: 'default',
    kind: 'event-reminder',
});

const subject = (seriesId: string, title: string) => ({ seriesId, originalDate: '2025-01-10', title });

const NOW = new Date('2025-01-10T09:00:00.000Z');

describe('reconcileNotifications', () => {
    it('schedules one reminder per live occurrence and offset', () => {
        const diff = reconcileNotifications({
            occurrences: [occurrence('e1:2025-01-10', '2025-01-10T10:00:00.000Z')],
            reminderOffsets: [15, 60, 15],
            scheduled: [],
            now: NOW,
        });

        expect(diff.toSchedule.map((entry) => [entry.id, entry.triggerAt])).toEqual([
            ['e1:2025-01-10#15', '2025-01-10T09:45:00.000Z'],
        ]);
        expect(diff.toCancel).toEqual([]);
    });

    it('yields nothing when the system already matches', () => {
        const diff = reconcileNotifications({
            occurrences: [occurrence('e1:2025-01-10', '2025-01-10T10:00:00.000Z')],
            reminderOffsets: [15],
            scheduled: [scheduled('e1:2025-01-10#15', 'e1:2025-01-10', '2025-01-10T09:45:00.000Z')],
            now: NOW,
        });

        expect(diff).toEqual({ toSchedule: [], toCancel: [], expired: [] });
    });

    it('reschedules a moved occurrence under the same id', () => {
        const current = scheduled('e1:2025-01-10#15', 'e1:2025-01-10', '2025-01-10T09:45:00.000Z');
        const diff = reconcileNotifications({
            occurrences: [occurrence('e1:2025-01-10', '2025-01-10T11:00:00.000Z')],
            reminderOffsets: [15],
            scheduled: [current],
            now: NOW,
        });

        expect(diff.toCancel).toEqual([current]);
        expect(diff.toSchedule.map((entry) => [entry.id, entry.triggerAt])).toEqual([
            ['e1:2025-01-10#15', '2025-01-10T10:45:00.000Z'],
        ]);
    });

    it('cancels reminders of cancelled and completed occurrences', () => {
        const diff = reconcileNotifications({
            occurrences: [
                occurrence('e1:2025-01-10', '2025-01-10T10:00:00.000Z', { status: 'cancelled' }),
                occurrence('t1:2025-01-10', '2025-01-10T08:00:00.000Z', {
                    itemKind: 'task',
                    completedAt: '2025-01-10T07:00:00.000Z',
                }),
            ],
            reminderOffsets: [15],
            scheduled: [
                scheduled('e1:2025-01-10#15', 'e1:2025-01-10', '2025-01-10T09:45:00.000Z'),
                scheduled('t1:2025-01-10#15', 't1:2025-01-10', '2025-01-10T07:45:00.000Z'),
            ],
            now: NOW,
        });

        expect(diff.toCancel.map((entry) => entry.id)).toEqual(['e1:2025-01-10#15', 't1:2025-01-10#15']);
        expect(diff.expired).toEqual([]);
    });

    it('forgets passed triggers and cancels ones whose occurrence disappeared', () => {
        const diff = reconcileNotifications({
            occurrences: [occurrence('e1:2025-01-10', '2025-01-10T09:10:00.000Z')],
            reminderOffsets: [15],
            scheduled: [
                scheduled('e1:2025-01-10#15', 'e1:2025-01-10', '2025-01-10T08:55:00.000Z'),
                scheduled('gone:2025-01-11#15', 'gone:2025-01-11', '2025-01-11T09:45:00.000Z'),
            ],
            now: NOW,
        });

        expect(diff.expired.map((entry) => entry.id)).toEqual(['e1:2025-01-10#15']);
        expect(diff.toCancel.map((entry) => entry.id)).toEqual(['gone:2025-01-11#15']);
        expect(diff.toSchedule).toEqual([]);
    });

    it('applies separate offsets to events and tasks', () => {
        const diff = reconcileNotifications({
            occurrences: [
                occurrence('e1:2025-01-10', '2025-01-10T12:00:00.000Z'),
                occurrence('t1:2025-01-10', '2025-01-10T12:00:00.000Z', { itemKind: 'task' }),
            ],
            reminderOffsets: { event: [60], task: [0] },
            scheduled: [],
            now: NOW,
            channel: 'reminders',
        });

        expect(diff.toSchedule.map((entry) => [entry.id, entry.kind, entry.channel])).toEqual([
            ['e1:2025-01-10#60', 'event-reminder', 'reminders'],
            ['t1:2025-01-10#0', 'task-due', 'reminders'],
        ]);
    });
});

describe('overdue task reminders', () => {
    const task = (start: string, overrides: Partial<Occurrence> = {}) =>
        occurrence('t1:2025-01-10', start, { itemKind: 'task', ...overrides });

    it('reports an open task overdue an hour after its due time', () => {
        const diff = reconcileNotifications({
            occurrences: [task('2025-01-10T08:30:00.000Z'), occurrence('e1:2025-01-10', '2025-01-10T08:30:00.000Z')],
            reminderOffsets: { event: [15], task: [0] },
            scheduled: [],
            now: NOW,
            overdueDelayMinutes: 60,
        });

        expect(diff.toSchedule).toEqual([
            {
                id: 't1:2025-01-10#overdue',
                occurrenceId: 't1:2025-01-10',
                offsetMinutes: -60,
                triggerAt: '2025-01-10T09:30:00.000Z',
                channel: 'default',
                kind: 'task-overdue',
            },
        ]);
    });

    it('cancels the overdue reminder once the task is completed', () => {
        const current: ScheduledNotification = {
            id: 't1:2025-01-10#overdue',
            occurrenceId: 't1:2025-01-10',
            offsetMinutes: -60,
            triggerAt: '2025-01-10T09:30:00.000Z',
            channel: 'default',
            kind: 'task-overdue',
        };

        const diff = reconcileNotifications({
            occurrences: [task('2025-01-10T08:30:00.000Z', { completedAt: '2025-01-10T08:50:00.000Z' })],
            reminderOffsets: { event: [15], task: [0] },
            scheduled: [current],
            now: NOW,
            overdueDelayMinutes: 60,
        });

        expect(diff).toEqual({ toSchedule: [], toCancel: [current], expired: [] });
    });

    it('schedules nothing overdue when disabled', () => {
        const diff = reconcileNotifications({
            occurrences: [task('2025-01-10T08:30:00.000Z')],
            reminderOffsets: { event: [15], task: [0] },
            scheduled: [],
            now: NOW,
            overdueDelayMinutes: null,
        });

        expect(diff.toSchedule).toEqual([]);
    });
});

describe('notification helpers', () => {
    it('builds one daily summary per day inside the window', () => {
        const summaries = buildDailySummaryOccurrences(
            { start: new Date('2025-01-10T08:00:00.000Z'), end: new Date('2025-01-12T08:00:00.000Z') },
            '09:00'
        );

        expect(summaries.map((entry) => [entry.id, entry.start])).toEqual([
            ['daily-summary:2025-01-10', '2025-01-10T09:00:00.000Z'],
            ['daily-summary:2025-01-11', '2025-01-11T09:00:00.000Z'],
        ]);
    });

    it('formats reminder offsets', () => {
        expect([1, 15, 60, 90, 120, 1440, 2880].map(formatReminderOffset)).toEqual([
            '1 minute',
            '15 minutes',
            '1 hour',
            '90 minutes',
            '2 hours',
            '1 day',
            '2 days',
        ]);
    });

    it('builds task and event payloads', () => {
        const settings = { sound: 'chime' as const, channel: 'reminders' };
        const task = buildNotificationPayload(
            { ...scheduled('t1:2025-01-10#0', 't1:2025-01-10', '2025-01-10T12:00:00.000Z', 0), kind: 'task-due' },
            subject('t1', 'Pay rent'),
            settings
        );
        const event = buildNotificationPayload(
            scheduled('e1:2025-01-10#60', 'e1:2025-01-10', '2025-01-10T11:00:00.000Z', 60),
            subject('e1', '  '),
            settings
        );

        const overdue = buildNotificationPayload(
            { ...scheduled('t1:2025-01-10#overdue', 't1:2025-01-10', '2025-01-10T13:00:00.000Z', -60), kind: 'task-overdue' },
            subject('t1', 'Pay rent'),
            settings
        );

        expect(task).toMatchObject({
            title: 'Task Due',
            body: 'Pay rent is due now',
            seriesId: 't1',
            originalDate: '2025-01-10',
            actions: ['view', 'complete', 'snooze'],
        });
        expect(overdue).toMatchObject({
            title: 'Task Overdue',
            body: 'Pay rent is overdue',
            sound: 'urgent',
            actions: ['view', 'complete', 'snooze'],
        });
        expect(event).toMatchObject({
            title: 'Event Reminder',
            body: 'Untitled Event starts in 1 hour',
            sound: 'chime',
            channel: 'reminders',
        });
    });

    it('recognizes only offset and overdue suffixed ids as managed', () => {
        expect(isManagedNotificationId('e1:2025-01-10#15')).toBe(true);
        expect(isManagedNotificationId('t1:2025-01-10#overdue')).toBe(true);
        expect(isManagedNotificationId('snooze:e1:2025-01-10:1736500000000')).toBe(false);
    });
});

describe('NotificationSchedulerService', () => {
    let store: SqliteStore;
    let status: CoreStatusStore;
    let service: FakeNotificationService;
    let scheduler: NotificationSchedulerService;
    let occurrences: Occurrence[];

    beforeEach(async () => {
        ({ store } = await createMemoryStore());
        status = createStatusStore(testSettings());
        service = new FakeNotificationService();
        occurrences = [];
        scheduler = new NotificationSchedulerService({
            store,
            service,
            status,
            getSettings: () => status.getState().settings,
            loadOccurrences: async () => occurrences,
            now: () => NOW,
        });
    });

    it('schedules reminders and records them', async () => {
        occurrences = [occurrence('e1:2025-01-10', '2025-01-10T10:00:00.000Z')];

        const report = await scheduler.reconcile();

        expect(report.scheduled).toBe(1);
        expect(service.pending.get('e1:2025-01-10#15')).toEqual({
            triggerAt: new Date('2025-01-10T09:45:00.000Z'),
            payload: {
                title: 'Event Reminder',
                body: 'Standup starts in 15 minutes',
                kind: 'event-reminder',
                occurrenceId: 'e1:2025-01-10',
                seriesId: 'e1',
                originalDate: '2025-01-10',
                itemTitle: 'Standup',
                offsetMinutes: 15,
                sound: 'default',
                channel: 'calnotes-reminders',
                actions: ['view', 'snooze'],
            },
        });
        expect((await store.listScheduledNotifications()).map((entry) => entry.id)).toEqual(['e1:2025-01-10#15']);
        expect(status.getState().pendingNotifications).toBe(1);
    });

    it('issues no commands when nothing changed', async () => {
        occurrences = [occurrence('e1:2025-01-10', '2025-01-10T10:00:00.000Z')];
        await scheduler.reconcile();

        const second = await scheduler.reconcile();

        expect(second).toMatchObject({ scheduled: 0, cancelled: 0, failed: 0 });
        expect(service.cancelled).toEqual([]);
    });

    it('moves and cancels reminders as occurrences change', async () => {
        occurrences = [occurrence('e1:2025-01-10', '2025-01-10T10:00:00.000Z')];
        await scheduler.reconcile();

        occurrences = [occurrence('e1:2025-01-10', '2025-01-10T11:00:00.000Z')];
        await scheduler.reconcile();
        expect(service.pending.get('e1:2025-01-10#15')?.triggerAt).toEqual(new Date('2025-01-10T10:45:00.000Z'));
        expect((await store.listScheduledNotifications())[0].triggerAt).toBe('2025-01-10T10:45:00.000Z');

        occurrences = [occurrence('e1:2025-01-10', '2025-01-10T11:00:00.000Z', { status: 'cancelled' })];
        await scheduler.reconcile();
        expect(service.pending.size).toBe(0);
        expect(await store.listScheduledNotifications()).toEqual([]);
    });

    it('reports degraded reminders when the system quota is full', async () => {
        service.quota = 1;
        occurrences = [
            occurrence('e1:2025-01-10', '2025-01-10T10:00:00.000Z'),
            occurrence('e2:2025-01-10', '2025-01-10T11:00:00.000Z'),
        ];

        const report = await scheduler.reconcile();

        expect(report).toMatchObject({ scheduled: 1, failed: 1 });
        expect([...service.pending.keys()]).toEqual(['e1:2025-01-10#15']);
        expect(status.getState()).toMatchObject({
            pendingNotifications: 1,
            remindersDegraded: true,
            remindersDegradedReason: 'Notification limit reached; later reminders are not scheduled',
        });
    });

    it('adds a daily summary for each day of the horizon', async () => {
        status.getState().setSettings(
            mergeSettings(status.getState().settings, { notifications: { dailySummary: { enabled: true, time: '09:30' } } })
        );

        const report = await scheduler.reconcile();

        expect(report.scheduled).toBe(14);
        expect(service.pending.get('daily-summary:2025-01-10#0')?.payload).toMatchObject({
            title: 'Daily Summary',
            body: "Here's your schedule for today",
            actions: ['view'],
        });
    });

    it('cancels everything when notifications are turned off', async () => {
        occurrences = [occurrence('e1:2025-01-10', '2025-01-10T10:00:00.000Z')];
        await scheduler.reconcile();
        status.getState().setSettings(mergeSettings(status.getState().settings, { notifications: { enabled: false } }));

        const report = await scheduler.reconcile();

        expect(report.cancelled).toBe(1);
        expect(service.pending.size).toBe(0);
    });

    it('heals orphaned and lost notifications on startup', async () => {
        await service.schedule('ghost:2025-01-10#15', new Date('2025-01-10T10:00:00.000Z'), buildNotificationPayload(
            scheduled('ghost:2025-01-10#15', 'ghost:2025-01-10', '2025-01-10T10:00:00.000Z'),
            subject('ghost', 'Ghost'),
            { sound: 'default', channel: 'calnotes-reminders' }
        ));
        await service.schedule('snooze:e1:2025-01-10:1', new Date('2025-01-10T10:00:00.000Z'), buildNotificationPayload(
            scheduled('e1:2025-01-10#15', 'e1:2025-01-10', '2025-01-10T10:00:00.000Z'),
            subject('e1', 'Standup'),
            { sound: 'default', channel: 'calnotes-reminders' }
        ));
        await store.transaction((tx) =>
            tx.putScheduledNotification(scheduled('lost:2025-01-10#15', 'lost:2025-01-10', '2025-01-10T10:00:00.000Z'))
        );

        const healed = await scheduler.healOnStartup();

        expect(healed).toEqual({ cancelledOrphans: 1, forgotten: 1 });
        expect([...service.pending.keys()]).toEqual(['snooze:e1:2025-01-10:1']);
        expect(await store.listScheduledNotifications()).toEqual([]);
    });

    it('snoozes a task reminder for an hour', async () => {
        const payload = buildNotificationPayload(
            { ...scheduled('t1:2025-01-10#0', 't1:2025-01-10', '2025-01-10T09:00:00.000Z', 0), kind: 'task-due' },
            subject('t1', 'Pay rent'),
            { sound: 'default', channel: 'calnotes-reminders' }
        );

        const id = await scheduler.snooze(payload);

        expect(id).toBe(`snooze:t1:2025-01-10:${Date.parse('2025-01-10T10:00:00.000Z')}`);
        expect(service.pending.get(id)).toMatchObject({
            triggerAt: new Date('2025-01-10T10:00:00.000Z'),
            payload: { body: 'Pay rent is due soon', snoozed: true },
        });
    });
});
