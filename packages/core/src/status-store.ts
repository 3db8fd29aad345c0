import { createStore, type StoreApi } from 'zustand/vanilla';

import { DEFAULT_SETTINGS, type CoreSettings } from './settings';
import type { Occurrence, SyncTargetId, TargetSyncStatus } from './types';

export const initialTargetStatus = (): TargetSyncStatus => ({
    state: 'idle',
    suspended: false,
    queued: false,
    failedChanges: 0,
    pendingChanges: 0,
    conflictsResolved: 0,
});

/**
 * Observable state for UI consumers. Written only by the core services;
 * subscribers read it through `getState()` / `subscribe()`.
 */
export interface CoreStatusState {
    sync: Record<SyncTargetId, TargetSyncStatus>;
    /** Occurrences of the last listed window, cancelled ones excluded. */
    occurrences: Occurrence[];
    occurrencesWindow: { start: string; end: string } | null;
    pendingNotifications: number;
    remindersDegraded: boolean;
    remindersDegradedReason: string | null;
    settings: CoreSettings;

    // Actions
    updateTargetStatus: (target: SyncTargetId, updates: Partial<TargetSyncStatus>) => void;
    setOccurrences: (occurrences: Occurrence[], window: { start: string; end: string }) => void;
    setNotificationState: (state: { pending: number; degradedReason: string | null }) => void;
    setSettings: (settings: CoreSettings) => void;
}

export type CoreStatusStore = StoreApi<CoreStatusState>;

export function createStatusStore(settings: CoreSettings = DEFAULT_SETTINGS): CoreStatusStore {
    return createStore<CoreStatusState>((set) => ({
        sync: {
            'remote-backend': initialTargetStatus(),
            'external-calendar': initialTargetStatus(),
        },
        occurrences: [],
        occurrencesWindow: null,
        pendingNotifications: 0,
        remindersDegraded: false,
        remindersDegradedReason: null,
        settings,

        updateTargetStatus: (target, updates) =>
            set((state) => ({
                sync: { ...state.sync, [target]: { ...state.sync[target], ...updates } },
            })),
        setOccurrences: (occurrences, window) => set({ occurrences, occurrencesWindow: window }),
        setNotificationState: ({ pending, degradedReason }) =>
            set({
                pendingNotifications: pending,
                remindersDegraded: degradedReason !== null,
                remindersDegradedReason: degradedReason,
            }),
        setSettings: (next) => set({ settings: next }),
    }));
}
