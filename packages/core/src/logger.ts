import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

export type LogLevel = 'info' | 'warn' | 'error';

export type LogEntry = {
    ts: string;
    level: LogLevel;
    scope: string;
    message: string;
    stack?: string;
    context?: Record<string, string>;
};

export type LogSink = (entry: LogEntry) => void;

export type LoggingOptions = {
    enabled: boolean;
    /** Also print entries as `[scope] message` on the console. */
    console?: boolean;
    /** JSON lines are appended here when set. */
    filePath?: string;
    sink?: LogSink;
};

const SENSITIVE_KEYS = [
    'token',
    'access_token',
    'password',
    'pass',
    'apikey',
    'api_key',
    'secret',
    'auth',
    'authorization',
    'session',
    'cookie',
];

let options: LoggingOptions = { enabled: false };
let writeChain: Promise<void> = Promise.resolve();

export function configureLogging(next: LoggingOptions): void {
    options = { ...next };
}

function redactSensitiveText(value: string): string {
    let result = value;
    result = result.replace(/(Authorization:\s*)(Basic|Bearer)\s+[A-Za-z0-9+/=._-]+/gi, '$1$2 [redacted]');
    result = result.replace(
        /(password|pass|token|access_token|api_key|apikey|authorization|secret|session|cookie)=([^\s&]+)/gi,
        '$1=[redacted]'
    );
    return result;
}

export function sanitizeLogMessage(value: string): string {
    return redactSensitiveText(value);
}

function sanitizeContext(context?: Record<string, string>): Record<string, string> | undefined {
    if (!context) return undefined;
    const sanitized: Record<string, string> = {};
    for (const [key, value] of Object.entries(context)) {
        const keyLower = key.toLowerCase();
        if (SENSITIVE_KEYS.some((s) => keyLower.includes(s))) {
            sanitized[key] = '[redacted]';
        } else {
            sanitized[key] = redactSensitiveText(String(value));
        }
    }
    return sanitized;
}

function writeConsole(entry: LogEntry): void {
    const line = `[${entry.scope}] ${entry.message}`;
    const args: unknown[] = entry.context ? [line, entry.context] : [line];
    if (entry.level === 'error') {
        console.error(...args);
    } else if (entry.level === 'warn') {
        console.warn(...args);
    } else {
        console.info(...args);
    }
}

async function appendLogLine(entry: LogEntry): Promise<string | null> {
    if (!options.enabled) return null;
    if (options.console) writeConsole(entry);
    options.sink?.(entry);
    const filePath = options.filePath;
    if (!filePath) return null;
    const line = `${JSON.stringify(entry)}\n`;
    // Serialize appends so concurrent log calls keep their order in the file.
    const write = writeChain.then(async () => {
        await mkdir(dirname(filePath), { recursive: true });
        await appendFile(filePath, line, 'utf8');
    });
    writeChain = write.catch(() => undefined);
    try {
        await write;
        return filePath;
    } catch {
        return null;
    }
}

export async function logError(
    error: unknown,
    context: { scope: string; extra?: Record<string, string> }
): Promise<string | null> {
    const rawMessage = error instanceof Error ? error.message : String(error);
    const rawStack = error instanceof Error ? error.stack : undefined;
    return appendLogLine({
        ts: new Date().toISOString(),
        level: 'error',
        scope: context.scope,
        message: redactSensitiveText(rawMessage),
        stack: rawStack ? redactSensitiveText(rawStack) : undefined,
        context: context.extra && Object.keys(context.extra).length ? sanitizeContext(context.extra) : undefined,
    });
}

export async function logInfo(
    message: string,
    context?: { scope?: string; extra?: Record<string, string> }
): Promise<string | null> {
    return appendLogLine({
        ts: new Date().toISOString(),
        level: 'info',
        scope: context?.scope ?? 'info',
        message: redactSensitiveText(message),
        context: sanitizeContext(context?.extra),
    });
}

export async function logWarn(
    message: string,
    context?: { scope?: string; extra?: Record<string, string> }
): Promise<string | null> {
    return appendLogLine({
        ts: new Date().toISOString(),
        level: 'warn',
        scope: context?.scope ?? 'warn',
        message: redactSensitiveText(message),
        context: sanitizeContext(context?.extra),
    });
}

export async function logSyncError(
    error: unknown,
    context: { target: string; step: string }
): Promise<string | null> {
    return logError(error, {
        scope: 'sync',
        extra: { target: context.target, step: context.step },
    });
}
