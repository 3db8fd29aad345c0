import * as z from 'zod';

import { parseTimeOfDay } from './date';

/** Reminder offsets the settings screen offers, in minutes before the start. */
export const REMINDER_OFFSET_PRESETS = [5, 15, 30, 60, 120, 1440, 2880] as const;

export const NOTIFICATION_SOUNDS = ['default', 'gentle', 'urgent', 'soft', 'chime'] as const;

const offsetList = z.array(z.number().int().min(0).max(60 * 24 * 30)).max(10);

const TargetSettingsSchema = z.object({
    enabled: z.boolean().default(true),
});

export const CoreSettingsSchema = z.object({
    conflictPolicy: z.enum(['newer-wins', 'local-wins', 'remote-wins']).default('newer-wins'),
    sync: z
        .object({
            intervalMs: z.number().int().positive().default(15 * 60 * 1000),
            pushBatchSize: z.number().int().min(1).max(500).default(50),
            pullPageLimit: z.number().int().min(1).default(20),
            maxRetries: z.number().int().min(1).max(20).default(5),
            retryBaseDelayMs: z.number().int().min(0).default(2000),
            retryMaxDelayMs: z.number().int().min(0).default(60_000),
            requestTimeoutMs: z.number().int().positive().default(30_000),
            requestAttempts: z.number().int().min(1).max(10).default(3),
            failureBackoffMs: z.number().int().min(0).default(30_000),
            tombstoneRetentionDays: z.number().int().min(0).default(30),
            remoteBackend: TargetSettingsSchema.default({}),
            externalCalendar: TargetSettingsSchema.default({ enabled: false }),
        })
        .default({}),
    notifications: z
        .object({
            enabled: z.boolean().default(true),
            eventRemindersEnabled: z.boolean().default(true),
            taskRemindersEnabled: z.boolean().default(true),
            taskOverdueRemindersEnabled: z.boolean().default(true),
            eventReminderOffsets: offsetList.default([15]),
            taskReminderOffsets: offsetList.default([0]),
            dailySummary: z
                .object({
                    enabled: z.boolean().default(false),
                    time: z
                        .string()
                        .refine((value) => parseTimeOfDay(value) !== null, 'Expected HH:mm')
                        .default('09:00'),
                })
                .default({}),
            horizonDays: z.number().int().min(1).max(60).default(14),
            sound: z.enum(NOTIFICATION_SOUNDS).default('default'),
            channel: z.string().min(1).default('calnotes-reminders'),
        })
        .default({}),
});

export type CoreSettings = z.infer<typeof CoreSettingsSchema>;
export type CoreSettingsInput = z.input<typeof CoreSettingsSchema>;
export type SyncSettings = CoreSettings['sync'];
export type NotificationSettings = CoreSettings['notifications'];

export const DEFAULT_SETTINGS: CoreSettings = CoreSettingsSchema.parse({});

export function parseSettings(input: unknown): CoreSettings {
    return CoreSettingsSchema.parse(input ?? {});
}

/** Stored settings that no longer validate fall back to defaults instead of blocking startup. */
export function parseStoredSettings(input: unknown): { settings: CoreSettings; issues: string[] } {
    const parsed = CoreSettingsSchema.safeParse(input ?? {});
    if (parsed.success) return { settings: parsed.data, issues: [] };
    return {
        settings: DEFAULT_SETTINGS,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
}

export function mergeSettings(current: CoreSettings, updates: CoreSettingsInput): CoreSettings {
    return parseSettings({
        ...current,
        ...updates,
        sync: { ...current.sync, ...updates.sync },
        notifications: {
            ...current.notifications,
            ...updates.notifications,
            dailySummary: { ...current.notifications.dailySummary, ...updates.notifications?.dailySummary },
        },
    });
}
