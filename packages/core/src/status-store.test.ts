import { describe, it, expect } from 'vitest';

import { DEFAULT_SETTINGS } from './settings';
import { createStatusStore } from './status-store';

describe('status store', () => {
    it('updates one target without touching the other', () => {
        const status = createStatusStore();

        status.getState().updateTargetStatus('remote-backend', { state: 'syncing', pendingChanges: 3 });

        expect(status.getState().sync['remote-backend']).toMatchObject({ state: 'syncing', pendingChanges: 3, queued: false });
        expect(status.getState().sync['external-calendar'].state).toBe('idle');
    });

    it('flags degraded reminders from the reason', () => {
        const status = createStatusStore();

        status.getState().setNotificationState({ pending: 64, degradedReason: 'Quota reached' });
        expect(status.getState()).toMatchObject({
            pendingNotifications: 64,
            remindersDegraded: true,
            remindersDegradedReason: 'Quota reached',
        });

        status.getState().setNotificationState({ pending: 2, degradedReason: null });
        expect(status.getState().remindersDegraded).toBe(false);
    });

    it('notifies subscribers of settings changes', () => {
        const status = createStatusStore();
        const seen: string[] = [];
        const unsubscribe = status.subscribe((state) => seen.push(state.settings.conflictPolicy));

        status.getState().setSettings({ ...DEFAULT_SETTINGS, conflictPolicy: 'local-wins' });
        unsubscribe();
        status.getState().setSettings(DEFAULT_SETTINGS);

        expect(seen).toEqual(['local-wins']);
    });
});
