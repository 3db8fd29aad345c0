import {
    addDays,
    addMonths,
    addWeeks,
    addYears,
    differenceInCalendarDays,
    differenceInCalendarMonths,
    differenceInCalendarYears,
    getDaysInMonth,
    set,
    startOfMonth,
    startOfWeek,
} from 'date-fns';
import * as z from 'zod';

import { safeParseDate, toDateKey } from './date';
import { RecurrenceValidationError } from './errors';
import {
    err,
    ok,
    type ExceptionPayload,
    type Occurrence,
    type RecurrenceEnd,
    type RecurrenceRule,
    type Result,
    type SeriesPayload,
    type Weekday,
} from './types';

export const WEEKDAYS: readonly Weekday[] = ['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU'];

/** Upper bound on generator periods walked by one expansion call. */
export const MAX_EXPANSION_PERIODS = 10_000;

export type RecurrenceErrorCode = 'invalid-rule' | 'invalid-anchor' | 'expansion-limit';

export type RecurrenceError = {
    code: RecurrenceErrorCode;
    message: string;
};

export type ExpandableSeries = {
    id: string;
    payload: SeriesPayload;
};

export type ExpansionWindow = {
    start: Date;
    end: Date; // exclusive
};

export type ExpandOptions = {
    includeCancelled?: boolean;
};

const RecurrenceEndSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('never') }),
    z.object({ type: z.literal('until'), until: z.string().min(1) }),
    z.object({ type: z.literal('count'), count: z.number().int('count must be an integer').min(1, 'count must be at least 1') }),
]);

const RecurrenceRuleSchema = z
    .object({
        frequency: z.enum(['daily', 'weekly', 'monthly', 'yearly', 'custom']),
        interval: z.number().int('interval must be an integer').min(1, 'interval must be a positive integer').default(1),
        end: RecurrenceEndSchema.default({ type: 'never' }),
        byWeekday: z.array(z.enum(['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU'])).optional(),
        byMonthDay: z.array(z.number().int().min(1).max(31)).optional(),
    })
    .superRefine((rule, ctx) => {
        const hasWeekdays = !!rule.byWeekday && rule.byWeekday.length > 0;
        const hasMonthDays = !!rule.byMonthDay && rule.byMonthDay.length > 0;
        if (rule.byWeekday && rule.byWeekday.length === 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['byWeekday'], message: 'byWeekday must not be empty' });
        }
        if (rule.byMonthDay && rule.byMonthDay.length === 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['byMonthDay'], message: 'byMonthDay must not be empty' });
        }
        if (rule.byWeekday && new Set(rule.byWeekday).size !== rule.byWeekday.length) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['byWeekday'], message: 'byWeekday has duplicates' });
        }
        if (rule.byMonthDay && new Set(rule.byMonthDay).size !== rule.byMonthDay.length) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['byMonthDay'], message: 'byMonthDay has duplicates' });
        }
        if (hasWeekdays && rule.frequency !== 'weekly' && rule.frequency !== 'custom') {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['byWeekday'], message: `byWeekday is not allowed for ${rule.frequency}` });
        }
        if (hasMonthDays && rule.frequency !== 'monthly' && rule.frequency !== 'custom') {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['byMonthDay'], message: `byMonthDay is not allowed for ${rule.frequency}` });
        }
        if (rule.frequency === 'custom' && hasWeekdays === hasMonthDays) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['frequency'],
                message: 'custom frequency needs exactly one of byWeekday or byMonthDay',
            });
        }
    });

/**
 * Validate a rule against its anchor. Rules are checked here, at creation time,
 * so malformed ones never reach the expander through the store.
 */
export function validateRecurrenceRule(rule: unknown, anchor: Date): Result<RecurrenceRule, RecurrenceValidationError> {
    const parsed = RecurrenceRuleSchema.safeParse(rule);
    if (!parsed.success) {
        return err(
            new RecurrenceValidationError(
                parsed.error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            )
        );
    }
    const value: RecurrenceRule = parsed.data;
    if (value.end.type === 'until') {
        const until = safeParseDate(value.end.until);
        if (!until) {
            return err(new RecurrenceValidationError(['end.until: not a valid date']));
        }
        if (until.getTime() <= anchor.getTime()) {
            return err(new RecurrenceValidationError(['end.until: end date is before the anchor']));
        }
    }
    return ok(value);
}

type GeneratedStart = { sequence: number; start: Date };

const WEEKDAY_OFFSETS: Record<Weekday, number> = { MO: 0, TU: 1, WE: 2, TH: 3, FR: 4, SA: 5, SU: 6 };

const withTimeOf = (day: Date, anchor: Date): Date =>
    set(day, {
        hours: anchor.getHours(),
        minutes: anchor.getMinutes(),
        seconds: anchor.getSeconds(),
        milliseconds: anchor.getMilliseconds(),
    });

// Always offset from the anchor: stepping from the previous date would turn Jan 31 -> Feb 28 -> Mar 28.
function addPeriods(anchor: Date, frequency: 'daily' | 'weekly' | 'monthly' | 'yearly', amount: number): Date {
    switch (frequency) {
        case 'daily':
            return addDays(anchor, amount);
        case 'weekly':
            return addWeeks(anchor, amount);
        case 'monthly':
            return addMonths(anchor, amount);
        case 'yearly':
            return addYears(anchor, amount);
    }
}

function estimatePeriodIndex(
    anchor: Date,
    frequency: 'daily' | 'weekly' | 'monthly' | 'yearly',
    interval: number,
    target: Date
): number {
    let units: number;
    switch (frequency) {
        case 'daily':
            units = differenceInCalendarDays(target, anchor);
            break;
        case 'weekly':
            units = Math.floor(differenceInCalendarDays(target, anchor) / 7);
            break;
        case 'monthly':
            units = differenceInCalendarMonths(target, anchor);
            break;
        case 'yearly':
            units = differenceInCalendarYears(target, anchor);
            break;
    }
    // One period of slack keeps the estimate on the safe side of DST and clamping shifts.
    return Math.max(0, Math.floor(units / interval) - 1);
}

function weekdayStarts(rule: RecurrenceRule, anchor: Date, period: number): Date[] {
    const weekStart = addWeeks(startOfWeek(anchor, { weekStartsOn: 1 }), period * rule.interval);
    return [...(rule.byWeekday ?? [])]
        .sort((a, b) => WEEKDAY_OFFSETS[a] - WEEKDAY_OFFSETS[b])
        .map((day) => withTimeOf(addDays(weekStart, WEEKDAY_OFFSETS[day]), anchor));
}

function monthDayStarts(rule: RecurrenceRule, anchor: Date, period: number): Date[] {
    const month = addMonths(startOfMonth(anchor), period * rule.interval);
    const lastDay = getDaysInMonth(month);
    const days = new Set<number>();
    for (const day of rule.byMonthDay ?? []) {
        days.add(Math.min(day, lastDay));
    }
    return [...days].sort((a, b) => a - b).map((day) => withTimeOf(set(month, { date: day }), anchor));
}

/**
 * Walks generator periods in order and yields every start that passes the
 * termination rule, along with its global sequence index.
 */
function* generateStarts(rule: RecurrenceRule, anchor: Date, from: Date): Generator<GeneratedStart, void, undefined> {
    const end: RecurrenceEnd = rule.end;
    const until = end.type === 'until' ? safeParseDate(end.until) : null;
    const count = end.type === 'count' ? end.count : Number.POSITIVE_INFINITY;
    const usesWeekdays = !!rule.byWeekday && rule.byWeekday.length > 0;
    const usesMonthDays = !!rule.byMonthDay && rule.byMonthDay.length > 0;

    if (rule.frequency !== 'custom' && !usesWeekdays && !usesMonthDays) {
        const frequency = rule.frequency;
        // Each period holds exactly one start, so the sequence index is the period index and we can skip ahead.
        let period = estimatePeriodIndex(anchor, frequency, rule.interval, from);
        for (let walked = 0; walked < MAX_EXPANSION_PERIODS; walked += 1, period += 1) {
            if (period >= count) return;
            const start = addPeriods(anchor, frequency, period * rule.interval);
            if (until && start.getTime() >= until.getTime()) return;
            yield { sequence: period, start };
        }
        throw new ExpansionLimitError();
    }

    // Multi-start periods: the sequence index is only known by counting from the anchor.
    let sequence = 0;
    for (let period = 0; period < MAX_EXPANSION_PERIODS; period += 1) {
        const starts = usesWeekdays ? weekdayStarts(rule, anchor, period) : monthDayStarts(rule, anchor, period);
        for (const start of starts) {
            if (start.getTime() < anchor.getTime()) continue;
            if (sequence >= count) return;
            if (until && start.getTime() >= until.getTime()) return;
            yield { sequence, start };
            sequence += 1;
        }
    }
    throw new ExpansionLimitError();
}

class ExpansionLimitError extends Error {
    constructor() {
        super(`Expansion exceeded ${MAX_EXPANSION_PERIODS} periods`);
        this.name = 'ExpansionLimitError';
    }
}

export const occurrenceIdFor = (seriesId: string, originalDate: string): string => `${seriesId}:${originalDate}`;

export const exceptionIdFor = (seriesId: string, originalDate: string): string => `exc:${seriesId}:${originalDate}`;

function buildOccurrence(
    series: ExpandableSeries,
    sequence: number,
    generatedStart: Date,
    exception: ExceptionPayload | undefined
): Occurrence {
    const { payload } = series;
    const originalDate = toDateKey(generatedStart);
    const base: Occurrence = {
        id: occurrenceIdFor(series.id, originalDate),
        seriesId: series.id,
        sequence,
        originalDate,
        start: generatedStart.toISOString(),
        end: new Date(generatedStart.getTime() + payload.durationMs).toISOString(),
        status: 'generated',
        itemKind: payload.itemKind,
        title: payload.title,
        notes: payload.notes,
    };
    if (!exception) return base;
    if (exception.kind === 'cancel') {
        return { ...base, status: 'cancelled' };
    }
    const start = safeParseDate(exception.start) ?? generatedStart;
    const end = safeParseDate(exception.end) ?? new Date(start.getTime() + payload.durationMs);
    return {
        ...base,
        start: start.toISOString(),
        end: end.toISOString(),
        status: 'modified',
        title: exception.title ?? base.title,
        notes: exception.notes ?? base.notes,
        completedAt: exception.completedAt,
    };
}

/**
 * Expand a series into the occurrences whose generated start falls in
 * `[window.start, window.end)`, ordered by sequence index.
 *
 * Exceptions are matched by (series id, original date): a replacement
 * substitutes its payload, a cancellation drops the date. Cancelled dates
 * still count toward a count-based termination.
 */
export function expandRecurrence(
    series: ExpandableSeries,
    window: ExpansionWindow,
    exceptions: readonly ExceptionPayload[] = [],
    options: ExpandOptions = {}
): Result<Occurrence[], RecurrenceError> {
    const anchor = safeParseDate(series.payload.anchor);
    if (!anchor) {
        return err({ code: 'invalid-anchor', message: `Series ${series.id} has an invalid anchor` });
    }
    if (window.end.getTime() <= window.start.getTime()) return ok([]);

    const exceptionsByDate = new Map<string, ExceptionPayload>();
    for (const exception of exceptions) {
        if (exception.seriesId !== series.id) continue;
        exceptionsByDate.set(exception.originalDate, exception);
    }

    const include = (occurrence: Occurrence) => occurrence.status !== 'cancelled' || options.includeCancelled === true;

    if (!series.payload.rule) {
        if (anchor < window.start || anchor >= window.end) return ok([]);
        const single = buildOccurrence(series, 0, anchor, exceptionsByDate.get(toDateKey(anchor)));
        return ok(include(single) ? [single] : []);
    }

    const validated = validateRecurrenceRule(series.payload.rule, anchor);
    if (!validated.ok) {
        return err({ code: 'invalid-rule', message: validated.error.message });
    }

    const occurrences: Occurrence[] = [];
    try {
        for (const { sequence, start } of generateStarts(validated.value, anchor, window.start)) {
            if (start.getTime() >= window.end.getTime()) break;
            if (start.getTime() < window.start.getTime()) continue;
            const occurrence = buildOccurrence(series, sequence, start, exceptionsByDate.get(toDateKey(start)));
            if (include(occurrence)) occurrences.push(occurrence);
        }
    } catch (error) {
        if (error instanceof ExpansionLimitError) {
            return err({ code: 'expansion-limit', message: error.message });
        }
        throw error;
    }
    return ok(occurrences);
}

/** First generated start on or after `instant`, ignoring exceptions. */
export function findFirstStartOnOrAfter(
    rule: RecurrenceRule,
    anchor: Date,
    instant: Date
): { sequence: number; start: Date } | null {
    try {
        for (const generated of generateStarts(rule, anchor, instant)) {
            if (generated.start.getTime() >= instant.getTime()) return generated;
        }
    } catch (error) {
        if (error instanceof ExpansionLimitError) return null;
        throw error;
    }
    return null;
}

const toRRuleDate = (date: Date): string => date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');

const fromRRuleDate = (value: string): string | null => {
    const match = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})Z?)?$/.exec(value);
    if (!match) return null;
    const [, year, month, day, hours = '00', minutes = '00', seconds = '00'] = match;
    return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}.000Z`;
};

/** Serializes the rule as the RRULE subset external calendars accept. */
export function buildRRuleString(rule: RecurrenceRule): string {
    const usesWeekdays = !!rule.byWeekday && rule.byWeekday.length > 0;
    const frequency =
        rule.frequency === 'custom' ? (usesWeekdays ? 'WEEKLY' : 'MONTHLY') : rule.frequency.toUpperCase();
    const parts = [`FREQ=${frequency}`];
    if (rule.interval > 1) parts.push(`INTERVAL=${rule.interval}`);
    if (rule.byWeekday && rule.byWeekday.length > 0) parts.push(`BYDAY=${rule.byWeekday.join(',')}`);
    if (rule.byMonthDay && rule.byMonthDay.length > 0) parts.push(`BYMONTHDAY=${rule.byMonthDay.join(',')}`);
    if (rule.end.type === 'count') parts.push(`COUNT=${rule.end.count}`);
    if (rule.end.type === 'until') {
        const until = safeParseDate(rule.end.until);
        if (until) parts.push(`UNTIL=${toRRuleDate(until)}`);
    }
    return parts.join(';');
}

export function parseRRuleString(value: string): RecurrenceRule | null {
    const fields = new Map<string, string>();
    for (const part of value.replace(/^RRULE:/i, '').split(';')) {
        const [key, raw] = part.split('=');
        if (key && raw !== undefined) fields.set(key.trim().toUpperCase(), raw.trim());
    }
    const freq = fields.get('FREQ')?.toLowerCase();
    if (freq !== 'daily' && freq !== 'weekly' && freq !== 'monthly' && freq !== 'yearly') return null;

    const interval = fields.has('INTERVAL') ? Number(fields.get('INTERVAL')) : 1;
    if (!Number.isInteger(interval) || interval < 1) return null;

    const rule: RecurrenceRule = { frequency: freq, interval, end: { type: 'never' } };
    const byDay = fields.get('BYDAY');
    if (byDay) {
        const days = byDay.split(',').map((day) => day.trim().toUpperCase());
        const weekdays = days.filter((day): day is Weekday => WEEKDAYS.some((weekday) => weekday === day));
        if (weekdays.length !== days.length) return null;
        rule.byWeekday = weekdays;
    }
    const byMonthDay = fields.get('BYMONTHDAY');
    if (byMonthDay) {
        const days = byMonthDay.split(',').map(Number);
        if (days.some((day) => !Number.isInteger(day) || day < 1 || day > 31)) return null;
        rule.byMonthDay = days;
    }
    const count = fields.get('COUNT');
    const until = fields.get('UNTIL');
    if (count) {
        const parsedCount = Number(count);
        if (!Number.isInteger(parsedCount) || parsedCount < 1) return null;
        rule.end = { type: 'count', count: parsedCount };
    } else if (until) {
        const iso = fromRRuleDate(until);
        if (!iso) return null;
        rule.end = { type: 'until', until: iso };
    }
    return rule;
}
