import type { SyncTargetId } from './types';

export class RecurrenceValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid recurrence rule: ${issues.join('; ')}`);
        this.name = 'RecurrenceValidationError';
        this.issues = issues;
    }
}

/** A command was rejected before anything was written. */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class RecordNotFoundError extends Error {
    readonly recordId: string;

    constructor(recordId: string) {
        super(`Record not found: ${recordId}`);
        this.name = 'RecordNotFoundError';
        this.recordId = recordId;
    }
}

/** Target refused access; its sync stays suspended until re-authorized. */
export class AuthorizationError extends Error {
    readonly target: SyncTargetId;

    constructor(target: SyncTargetId, message = 'Authorization denied') {
        super(`${target}: ${message}`);
        this.name = 'AuthorizationError';
        this.target = target;
    }
}

export class TransientSyncError extends Error {
    readonly status?: number;

    constructor(message: string, status?: number) {
        super(message);
        this.name = 'TransientSyncError';
        this.status = status;
    }
}

export class SyncAbortedError extends Error {
    constructor(message = 'Sync aborted') {
        super(message);
        this.name = 'SyncAbortedError';
    }
}

/** The write-ahead append failed, so the originating edit must be reported as failed. */
export class JournalWriteError extends Error {
    constructor(cause: unknown) {
        super(`Failed to record pending change: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'JournalWriteError';
    }
}

export class NotificationSchedulingError extends Error {
    readonly notificationId: string;
    readonly quotaExceeded: boolean;

    constructor(notificationId: string, message: string, quotaExceeded = false) {
        super(message);
        this.name = 'NotificationSchedulingError';
        this.notificationId = notificationId;
        this.quotaExceeded = quotaExceeded;
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
