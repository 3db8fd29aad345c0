import { describe, it, expect, afterEach } from 'vitest';
import Database from 'better-sqlite3';

import { RecordNotFoundError, RecurrenceValidationError, ValidationError } from './errors';
import { createCalendarCore, type CalendarCore, type CalendarCoreOptions } from './index';
import { createBetterSqliteClient } from './sqlite-store';
import { createClock, createMemoryStore, FakeNotificationService, FakeRemoteBackend } from './test-fakes';

const cores: CalendarCore[] = [];

async function setup(options: Partial<CalendarCoreOptions> = {}) {
    const clock = createClock('2025-01-10T09:00:00.000Z');
    const notifications = new FakeNotificationService();
    const core = await createCalendarCore({
        client: createBetterSqliteClient(new Database(':memory:')),
        notifications,
        settings: { sync: { requestAttempts: 1 } },
        now: clock.now,
        ...options,
    });
    cores.push(core);
    return { core, service: core.service, notifications, clock };
}

afterEach(async () => {
    while (cores.length > 0) {
        await cores.pop()?.dispose();
    }
});

const window = (start: string, end: string) => ({ start: new Date(start), end: new Date(end) });

const dailyTask = { frequency: 'daily' as const, interval: 1, end: { type: 'count' as const, count: 5 } };

describe('CalendarService', () => {
    it('rejects invalid input before writing anything', async () => {
        const { core, service } = await setup();

        await expect(
            service.createSeries({ title: '  ', itemKind: 'event', start: '2025-01-10T10:00:00.000Z' })
        ).rejects.toThrow(new ValidationError('title: Title is required'));
        await expect(
            service.createSeries({
                title: 'Standup',
                itemKind: 'event',
                start: '2025-01-10T10:00:00.000Z',
                rule: { frequency: 'daily', interval: 0, end: { type: 'never' } },
            })
        ).rejects.toBeInstanceOf(RecurrenceValidationError);
        expect(await core.store.listRecords({ includeDeleted: true })).toEqual([]);
    });

    it('creates a series and lists its occurrences', async () => {
        const { core, service } = await setup();
        const series = await service.createSeries({
            title: 'Take vitamins',
            itemKind: 'task',
            start: '2025-01-10T17:00:00.000Z',
            rule: dailyTask,
        });

        const occurrences = await service.listOccurrences(window('2025-01-10T00:00:00.000Z', '2025-01-20T00:00:00.000Z'));

        expect(series).toMatchObject({ kind: 'series', origin: 'local', version: 1, updatedAt: '2025-01-10T09:00:00.000Z' });
        expect(occurrences.map((occurrence) => occurrence.originalDate)).toEqual([
            '2025-01-10',
            '2025-01-11',
            '2025-01-12',
            '2025-01-13',
            '2025-01-14',
        ]);
        expect(core.status.getState().occurrences).toHaveLength(5);
        expect(core.status.getState().occurrencesWindow).toEqual({
            start: '2025-01-10T00:00:00.000Z',
            end: '2025-01-20T00:00:00.000Z',
        });
    });

    it('cancelling an occurrence of a recurring task cancels its reminder', async () => {
        const { service, notifications } = await setup();
        const series = await service.createSeries({
            title: 'Take vitamins',
            itemKind: 'task',
            start: '2025-01-10T17:00:00.000Z',
            rule: dailyTask,
        });
        // A due reminder and an overdue reminder per occurrence.
        expect(notifications.pending.size).toBe(10);
        expect(notifications.pending.get(`${series.id}:2025-01-12#0`)?.payload.body).toBe('Take vitamins is due now');
        expect(notifications.pending.get(`${series.id}:2025-01-12#overdue`)?.triggerAt).toEqual(
            new Date('2025-01-12T18:00:00.000Z')
        );

        const exception = await service.cancelOccurrence(series.id, '2025-01-12');

        expect(exception).toMatchObject({
            id: `exc:${series.id}:2025-01-12`,
            version: 1,
            payload: { kind: 'cancel', originalDate: '2025-01-12' },
        });
        expect(notifications.cancelled).toEqual([`${series.id}:2025-01-12#0`, `${series.id}:2025-01-12#overdue`]);
        expect(notifications.pending.size).toBe(8);
        const visible = await service.listOccurrences(window('2025-01-10T00:00:00.000Z', '2025-01-20T00:00:00.000Z'));
        expect(visible.map((occurrence) => occurrence.originalDate)).not.toContain('2025-01-12');
    });

    it('moves one occurrence and its reminder', async () => {
        const { service, notifications } = await setup();
        const series = await service.createSeries({
            title: 'Standup',
            itemKind: 'event',
            start: '2025-01-10T10:00:00.000Z',
            durationMs: 30 * 60 * 1000,
            rule: { frequency: 'daily', interval: 1, end: { type: 'count', count: 3 } },
        });

        await service.editOccurrence(series.id, '2025-01-11', { start: '2025-01-11T14:00:00.000Z', title: 'Late standup' });

        const occurrences = await service.listOccurrences(window('2025-01-11T00:00:00.000Z', '2025-01-12T00:00:00.000Z'));
        expect(occurrences).toMatchObject([
            {
                status: 'modified',
                start: '2025-01-11T14:00:00.000Z',
                end: '2025-01-11T14:30:00.000Z',
                title: 'Late standup',
            },
        ]);
        expect(notifications.pending.get(`${series.id}:2025-01-11#15`)?.triggerAt).toEqual(
            new Date('2025-01-11T13:45:00.000Z')
        );
    });

    it('reminds about a past occurrence moved to a later time', async () => {
        const { service, notifications } = await setup();
        const series = await service.createSeries({
            title: 'Standup',
            itemKind: 'event',
            start: '2025-01-09T10:00:00.000Z',
            rule: { frequency: 'daily', interval: 1, end: { type: 'count', count: 3 } },
        });
        expect([...notifications.pending.keys()].sort()).toEqual([
            `${series.id}:2025-01-10#15`,
            `${series.id}:2025-01-11#15`,
        ]);

        await service.editOccurrence(series.id, '2025-01-09', { start: '2025-01-10T15:00:00.000Z' });

        expect(notifications.pending.get(`${series.id}:2025-01-09#15`)?.triggerAt).toEqual(
            new Date('2025-01-10T14:45:00.000Z')
        );
        expect(notifications.pending.size).toBe(3);
    });

    it('refuses to edit a cancelled occurrence until it is reset', async () => {
        const { service, notifications } = await setup();
        const series = await service.createSeries({
            title: 'Standup',
            itemKind: 'event',
            start: '2025-01-10T10:00:00.000Z',
            rule: { frequency: 'daily', interval: 1, end: { type: 'count', count: 3 } },
        });
        await service.cancelOccurrence(series.id, '2025-01-11');

        await expect(service.editOccurrence(series.id, '2025-01-11', { title: 'Back on' })).rejects.toBeInstanceOf(
            ValidationError
        );

        await service.resetOccurrence(series.id, '2025-01-11');
        const [occurrence] = await service.listOccurrences(window('2025-01-11T00:00:00.000Z', '2025-01-12T00:00:00.000Z'));
        expect(occurrence.status).toBe('generated');
        expect(notifications.pending.has(`${series.id}:2025-01-11#15`)).toBe(true);
    });

    it('completing a task occurrence removes its reminder until reopened', async () => {
        const { service, notifications } = await setup();
        const series = await service.createSeries({
            title: 'Take vitamins',
            itemKind: 'task',
            start: '2025-01-10T17:00:00.000Z',
            rule: dailyTask,
        });
        const id = `${series.id}:2025-01-11#0`;

        const completed = await service.setOccurrenceCompleted(series.id, '2025-01-11', true);
        expect(completed.payload.completedAt).toBe('2025-01-10T09:00:00.000Z');
        expect(notifications.pending.has(id)).toBe(false);

        const reopened = await service.setOccurrenceCompleted(series.id, '2025-01-11', false);
        expect(reopened.version).toBe(2);
        expect(notifications.pending.has(id)).toBe(true);
    });

    it('completes a task from its reminder', async () => {
        const { service, notifications } = await setup();
        const series = await service.createSeries({
            title: 'Take vitamins',
            itemKind: 'task',
            start: '2025-01-10T17:00:00.000Z',
            rule: dailyTask,
        });
        const delivered = notifications.pending.get(`${series.id}:2025-01-11#0`);
        if (!delivered) throw new Error('reminder was not scheduled');
        expect(delivered.payload).toMatchObject({ seriesId: series.id, originalDate: '2025-01-11' });

        const result = await service.handleNotificationAction(delivered.payload, 'complete');

        expect(result.action).toBe('complete');
        expect(result.action === 'complete' && result.exception.payload.completedAt).toBe('2025-01-10T09:00:00.000Z');
        expect(notifications.pending.has(`${series.id}:2025-01-11#0`)).toBe(false);
        expect(notifications.pending.has(`${series.id}:2025-01-11#overdue`)).toBe(false);
        expect(notifications.pending.has(`${series.id}:2025-01-12#0`)).toBe(true);
    });

    it('opens and snoozes from a reminder but refuses actions it does not offer', async () => {
        const { service, notifications } = await setup();
        const series = await service.createSeries({
            title: 'Standup',
            itemKind: 'event',
            start: '2025-01-10T10:00:00.000Z',
            rule: { frequency: 'daily', interval: 1, end: { type: 'count', count: 3 } },
        });
        const delivered = notifications.pending.get(`${series.id}:2025-01-11#15`);
        if (!delivered) throw new Error('reminder was not scheduled');

        const viewed = await service.handleNotificationAction(delivered.payload, 'view');
        expect(viewed.action === 'view' && viewed.occurrence?.start).toBe('2025-01-11T10:00:00.000Z');

        const snoozed = await service.handleNotificationAction(delivered.payload, 'snooze');
        const snoozeId = `snooze:${series.id}:2025-01-11:${Date.parse('2025-01-10T09:15:00.000Z')}`;
        expect(snoozed).toEqual({ action: 'snooze', notificationId: snoozeId });
        expect(notifications.pending.get(snoozeId)?.payload.body).toBe('Standup starts soon');

        await expect(service.handleNotificationAction(delivered.payload, 'complete')).rejects.toBeInstanceOf(
            ValidationError
        );
    });

    it('splits a series when its rule changes from a date on', async () => {
        const { core, service } = await setup();
        const series = await service.createSeries({
            title: 'Standup',
            itemKind: 'event',
            start: '2025-01-10T10:00:00.000Z',
            rule: { frequency: 'daily', interval: 1, end: { type: 'never' } },
        });
        await service.cancelOccurrence(series.id, '2025-01-14');

        const { previous, next } = await service.replaceRule(
            series.id,
            { frequency: 'weekly', interval: 1, end: { type: 'never' } },
            new Date('2025-01-13T00:00:00.000Z')
        );

        expect(previous.version).toBe(2);
        expect(previous.payload.rule?.end).toEqual({ type: 'until', until: '2025-01-13T10:00:00.000Z' });
        expect(next.payload).toMatchObject({ anchor: '2025-01-13T10:00:00.000Z', previousSeriesId: series.id });
        expect((await core.store.getRecord(`exc:${series.id}:2025-01-14`))?.deletedAt).toBe('2025-01-10T09:00:00.000Z');

        const occurrences = await service.listOccurrences(window('2025-01-10T00:00:00.000Z', '2025-01-28T00:00:00.000Z'));
        expect(occurrences.map((occurrence) => [occurrence.seriesId === series.id, occurrence.originalDate])).toEqual([
            [true, '2025-01-10'],
            [true, '2025-01-11'],
            [true, '2025-01-12'],
            [false, '2025-01-13'],
            [false, '2025-01-20'],
            [false, '2025-01-27'],
        ]);
    });

    it('replaces the whole series when the change starts at its first occurrence', async () => {
        const { service } = await setup();
        const series = await service.createSeries({
            title: 'Standup',
            itemKind: 'event',
            start: '2025-01-10T10:00:00.000Z',
            rule: { frequency: 'daily', interval: 1, end: { type: 'never' } },
        });

        const { previous, next } = await service.replaceRule(series.id, null, new Date('2025-01-01T00:00:00.000Z'));

        expect(previous.deletedAt).toBe('2025-01-10T09:00:00.000Z');
        expect(next.payload.rule).toBeNull();
        const occurrences = await service.listOccurrences(window('2025-01-10T00:00:00.000Z', '2025-01-20T00:00:00.000Z'));
        expect(occurrences.map((occurrence) => occurrence.seriesId)).toEqual([next.id]);
    });

    it('deletes a series with its exceptions and reminders', async () => {
        const { core, service, notifications } = await setup();
        const series = await service.createSeries({
            title: 'Take vitamins',
            itemKind: 'task',
            start: '2025-01-10T17:00:00.000Z',
            rule: dailyTask,
        });
        await service.cancelOccurrence(series.id, '2025-01-12');

        await service.deleteSeries(series.id);

        expect(await core.store.listRecords()).toEqual([]);
        expect(notifications.pending.size).toBe(0);
        await expect(service.deleteSeries(series.id)).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('updates descriptive fields and rejects anything else', async () => {
        const { service } = await setup();
        const series = await service.createSeries({ title: 'Standup', itemKind: 'event', start: '2025-01-10T10:00:00.000Z' });

        const updated = await service.updateSeries(series.id, { title: 'Daily standup', location: 'Room 4' });
        expect(updated).toMatchObject({ version: 2, payload: { title: 'Daily standup', location: 'Room 4' } });

        const withAnchor = { title: 'Moved', anchor: '2025-02-01T10:00:00.000Z' };
        await expect(service.updateSeries(series.id, withAnchor)).rejects.toBeInstanceOf(ValidationError);
    });

    it('reports unknown series and dates the rule never generates', async () => {
        const { service } = await setup();
        const series = await service.createSeries({
            title: 'Standup',
            itemKind: 'event',
            start: '2025-01-10T10:00:00.000Z',
            rule: { frequency: 'daily', interval: 1, end: { type: 'count', count: 2 } },
        });

        await expect(service.cancelOccurrence('missing', '2025-01-10')).rejects.toBeInstanceOf(RecordNotFoundError);
        await expect(service.cancelOccurrence(series.id, '2025-01-20')).rejects.toBeInstanceOf(RecordNotFoundError);
        await expect(service.cancelOccurrence(series.id, 'next week')).rejects.toBeInstanceOf(ValidationError);
    });

    it('journals mutations for the remote backend and syncs them', async () => {
        const remote = new FakeRemoteBackend();
        const { service } = await setup({ remote });
        const series = await service.createSeries({ title: 'Standup', itemKind: 'event', start: '2025-01-10T10:00:00.000Z' });

        const [result] = await service.syncNow();

        expect(result.target).toBe('remote-backend');
        expect(remote.records.get(series.id)?.version).toBe(1);
    });

    it('persists settings changes', async () => {
        const { core, service } = await setup();

        const next = await service.setConflictPolicy('local-wins');

        expect(next.conflictPolicy).toBe('local-wins');
        expect(core.status.getState().settings.conflictPolicy).toBe('local-wins');
        expect(await core.store.loadSettings()).toMatchObject({ conflictPolicy: 'local-wins' });
        await expect(service.updateNotificationSettings({ horizonDays: 0 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('drops reminders when notifications are turned off', async () => {
        const { service, notifications } = await setup();
        await service.createSeries({ title: 'Take vitamins', itemKind: 'task', start: '2025-01-10T17:00:00.000Z', rule: dailyTask });

        await service.updateNotificationSettings({ enabled: false });

        expect(notifications.pending.size).toBe(0);
    });
});

describe('createCalendarCore', () => {
    it('falls back to defaults when stored settings are invalid and applies overrides', async () => {
        const { client, store } = await createMemoryStore();
        await store.transaction((tx) => tx.saveSettings({ conflictPolicy: 'coin-flip' }));

        const core = await createCalendarCore({
            client,
            notifications: new FakeNotificationService(),
            settings: { sync: { intervalMs: 60_000 } },
        });
        cores.push(core);

        expect(core.service.getSettings().conflictPolicy).toBe('newer-wins');
        expect(core.service.getSettings().sync.intervalMs).toBe(60_000);
    });

    it('heals notification state on start', async () => {
        const { core, notifications } = await setup();
        await notifications.schedule('old:2025-01-01#15', new Date('2025-01-11T00:00:00.000Z'), {
            title: 'Event Reminder',
            body: 'Old starts in 15 minutes',
            kind: 'event-reminder',
            occurrenceId: 'old:2025-01-01',
            seriesId: 'old',
            originalDate: '2025-01-01',
            itemTitle: 'Old',
            offsetMinutes: 15,
            sound: 'default',
            channel: 'calnotes-reminders',
            actions: ['view', 'snooze'],
        });

        await core.start();

        expect(notifications.cancelled).toEqual(['old:2025-01-01#15']);
    });
});
