import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, afterEach, vi } from 'vitest';

import { configureLogging, logError, logWarn, type LogEntry } from './logger';

describe('logger', () => {
    afterEach(() => {
        configureLogging({ enabled: false });
    });

    it('does nothing while disabled', async () => {
        const sink = vi.fn();
        configureLogging({ enabled: false, sink });

        expect(await logWarn('ignored')).toBeNull();
        expect(sink).not.toHaveBeenCalled();
    });

    it('redacts secrets in messages and context', async () => {
        const entries: LogEntry[] = [];
        configureLogging({ enabled: true, sink: (entry) => entries.push(entry) });

        await logWarn('Request with token=test-token failed', {
            scope: 'sync',
            extra: { authorization: 'Bearer test-token', target: 'remote-backend' },
        });
        await logError(new Error('Authorization: Bearer test-token rejected'), { scope: 'sync' });

        expect(entries[0]).toMatchObject({
            level: 'warn',
            scope: 'sync',
            message: 'Request with token=[redacted] failed',
            context: { authorization: '[redacted]', target: 'remote-backend' },
        });
        expect(entries[1]).toMatchObject({ level: 'error', message: 'Authorization: Bearer [redacted] rejected' });
    });

    it('prints entries to the console when asked', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        configureLogging({ enabled: true, console: true });

        await logWarn('Request with token=test-token failed', { scope: 'sync', extra: { target: 'remote-backend' } });
        await logError(new Error('Quota reached'), { scope: 'notifications' });

        expect(warn).toHaveBeenCalledWith('[sync] Request with token=[redacted] failed', { target: 'remote-backend' });
        expect(error).toHaveBeenCalledWith('[notifications] Quota reached');
        warn.mockRestore();
        error.mockRestore();
    });

    it('appends JSON lines to the log file', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'calnotes-log-'));
        const filePath = join(dir, 'logs', 'core.log');
        configureLogging({ enabled: true, filePath });

        expect(await logWarn('first', { scope: 'calendar' })).toBe(filePath);
        await logWarn('second', { scope: 'calendar' });

        const lines = (await readFile(filePath, 'utf8')).trim().split('\n');
        expect(lines.map((line) => JSON.parse(line).message)).toEqual(['first', 'second']);
    });
});
