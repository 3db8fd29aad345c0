import { CalendarService, loadOccurrences } from './calendar-service';
import { ChangeJournal, type ChangeJournalOptions } from './change-journal';
import { configureLogging, logWarn, type LoggingOptions } from './logger';
import { NotificationSchedulerService, type NotificationService } from './notification-scheduler';
import { mergeSettings, parseStoredSettings, type CoreSettings, type CoreSettingsInput } from './settings';
import { SqliteStore, type SqliteClient } from './sqlite-store';
import { createStatusStore, type CoreStatusStore } from './status-store';
import { SyncCoordinator } from './sync-coordinator';
import {
    ExternalCalendarTarget,
    RemoteBackendTarget,
    type ExternalCalendarService,
    type RemoteSyncBackend,
    type SyncTarget,
} from './sync-targets';

export * from './types';
export * from './errors';
export * from './date';
export * from './logger';
export * from './settings';
export * from './retry-utils';
export * from './http-utils';
export * from './recurrence';
export * from './record-schema';
export * from './conflict-resolver';
export * from './change-journal';
export * from './sqlite-schema';
export * from './sqlite-store';
export * from './status-store';
export * from './sync-targets';
export * from './remote-backend-client';
export * from './sync-coordinator';
export * from './notification-scheduler';
export * from './calendar-service';
export { generateUUID } from './uuid';

const REMOTE_PULL_PAGE_SIZE = 200;

export type CalendarCoreOptions = {
    client: SqliteClient;
    notifications: NotificationService;
    remote?: RemoteSyncBackend;
    calendar?: ExternalCalendarService;
    /** Applied over the stored settings at startup. */
    settings?: CoreSettingsInput;
    logging?: LoggingOptions;
    now?: () => Date;
};

export type CalendarCore = {
    service: CalendarService;
    coordinator: SyncCoordinator;
    scheduler: NotificationSchedulerService;
    journal: ChangeJournal;
    store: SqliteStore;
    status: CoreStatusStore;
    /** Heals reminders against the system, then starts periodic sync. */
    start: () => Promise<void>;
    dispose: () => Promise<void>;
};

const journalOptions = (settings: CoreSettings): ChangeJournalOptions => ({
    maxRetries: settings.sync.maxRetries,
    retryBaseDelayMs: settings.sync.retryBaseDelayMs,
    retryMaxDelayMs: settings.sync.retryMaxDelayMs,
});

export async function createCalendarCore(options: CalendarCoreOptions): Promise<CalendarCore> {
    if (options.logging) configureLogging(options.logging);

    const store = new SqliteStore(options.client);
    await store.ensureSchema();

    const stored = parseStoredSettings(await store.loadSettings());
    if (stored.issues.length > 0) {
        void logWarn('Stored settings were invalid; using defaults', {
            scope: 'calendar',
            extra: { issues: stored.issues.join('; ') },
        });
    }
    const settings = options.settings ? mergeSettings(stored.settings, options.settings) : stored.settings;
    const status = createStatusStore(settings);
    const getSettings = () => status.getState().settings;

    const journal = new ChangeJournal(store, journalOptions(settings));
    const targets: SyncTarget[] = [];
    if (options.remote) targets.push(new RemoteBackendTarget(options.remote, { pageLimit: REMOTE_PULL_PAGE_SIZE }));
    if (options.calendar) targets.push(new ExternalCalendarTarget(options.calendar, { now: options.now }));

    let service: CalendarService | null = null;
    let started = false;

    const coordinator = new SyncCoordinator({
        store,
        journal,
        targets,
        status,
        getSettings,
        now: options.now,
        onRecordsApplied: async () => {
            await service?.refreshDerivedState();
        },
    });

    const scheduler = new NotificationSchedulerService({
        store,
        service: options.notifications,
        status,
        getSettings,
        loadOccurrences: (window) => loadOccurrences(store, window, true),
        now: options.now,
    });

    const calendarService = new CalendarService({
        store,
        coordinator,
        notifications: scheduler,
        status,
        now: options.now,
        onSettingsChanged: (next) => {
            journal.configure(journalOptions(next));
            if (started) coordinator.start();
        },
    });
    service = calendarService;

    return {
        service: calendarService,
        coordinator,
        scheduler,
        journal,
        store,
        status,
        start: async () => {
            await scheduler.healOnStartup();
            await scheduler.reconcile();
            started = true;
            coordinator.start();
            coordinator.requestSync();
        },
        dispose: async () => {
            started = false;
            await coordinator.dispose();
        },
    };
}
