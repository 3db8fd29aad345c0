import * as z from 'zod';

import type { SyncableRecord } from './types';

const WeekdaySchema = z.enum(['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU']);

const StoredRuleSchema = z.object({
    frequency: z.enum(['daily', 'weekly', 'monthly', 'yearly', 'custom']),
    interval: z.number(),
    end: z.discriminatedUnion('type', [
        z.object({ type: z.literal('never') }),
        z.object({ type: z.literal('until'), until: z.string() }),
        z.object({ type: z.literal('count'), count: z.number() }),
    ]),
    byWeekday: z.array(WeekdaySchema).optional(),
    byMonthDay: z.array(z.number()).optional(),
});

const ItemKindSchema = z.enum(['event', 'task']);

export const SeriesPayloadSchema = z.object({
    title: z.string(),
    itemKind: ItemKindSchema,
    anchor: z.string(),
    durationMs: z.number().min(0),
    rule: StoredRuleSchema.nullable(),
    notes: z.string().optional(),
    location: z.string().optional(),
    category: z.string().optional(),
    previousSeriesId: z.string().optional(),
});

export const ExceptionPayloadSchema = z.object({
    seriesId: z.string(),
    itemKind: ItemKindSchema,
    originalDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    kind: z.enum(['replace', 'cancel']),
    start: z.string().optional(),
    end: z.string().optional(),
    title: z.string().optional(),
    notes: z.string().optional(),
    completedAt: z.string().optional(),
});

const OriginSchema = z.enum(['local', 'remote-backend', 'external-calendar']);

const RecordBaseSchema = z.object({
    id: z.string().min(1),
    origin: OriginSchema,
    version: z.number().int().min(0),
    updatedAt: z.string(),
    deletedAt: z.string().optional(),
});

export const SyncableRecordSchema = z.discriminatedUnion('kind', [
    RecordBaseSchema.extend({ kind: z.literal('series'), payload: SeriesPayloadSchema }),
    RecordBaseSchema.extend({ kind: z.literal('exception'), payload: ExceptionPayloadSchema }),
]);

/** Validates a record that crossed a process boundary (store row, network payload). */
export function parseSyncableRecord(value: unknown): SyncableRecord | null {
    const parsed = SyncableRecordSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
}
