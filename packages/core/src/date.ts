import { format, isValid, parseISO } from 'date-fns';

export function safeParseDate(value: string | undefined | null): Date | null {
    if (!value) return null;
    const parsed = parseISO(value);
    return isValid(parsed) ? parsed : null;
}

export const toTime = (value: string | undefined | null): number => {
    const parsed = safeParseDate(value);
    return parsed ? parsed.getTime() : 0;
};

export const toDateKey = (date: Date): string => format(date, 'yyyy-MM-dd');

export const toIso = (date: Date): string => date.toISOString();

/** Parses `HH:mm`; null when out of range. */
export function parseTimeOfDay(value: string): { hours: number; minutes: number } | null {
    const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
    if (!match) return null;
    const hours = Number(match[1]);
    const minutes = Number(match[2]);
    if (hours > 23 || minutes > 59) return null;
    return { hours, minutes };
}
