import { toTime } from './date';
import {
    err,
    ok,
    type ConflictResolutionPolicy,
    type RecordOrigin,
    type Result,
    type SyncableRecord,
} from './types';

/** Tie-break order for equal timestamps; earlier wins. */
export const ORIGIN_PRIORITY: readonly RecordOrigin[] = ['local', 'remote-backend', 'external-calendar'];

export type ConflictCandidates<R extends SyncableRecord = SyncableRecord> = {
    local: R;
    remote?: R;
    external?: R;
};

export type ConflictResolution<R extends SyncableRecord = SyncableRecord> = {
    winner: R;
    winnerOrigin: RecordOrigin;
    /** Losing origins that need the winner pushed to them. */
    repush: Array<{ origin: RecordOrigin; recordId: string }>;
    deletionWon: boolean;
    /** False when every input carried the same content state and timestamp. */
    conflicted: boolean;
};

export type ConflictError = {
    code: 'no-incoming' | 'id-mismatch' | 'kind-mismatch';
    message: string;
};

type Candidate<R extends SyncableRecord> = { origin: RecordOrigin; record: R };

const priorityOf = (origin: RecordOrigin): number => ORIGIN_PRIORITY.indexOf(origin);

const byPriority = <R extends SyncableRecord>(a: Candidate<R>, b: Candidate<R>) => priorityOf(a.origin) - priorityOf(b.origin);

function pickNewest<R extends SyncableRecord>(candidates: Candidate<R>[]): Candidate<R> {
    return [...candidates].sort((a, b) => {
        const diff = toTime(b.record.updatedAt) - toTime(a.record.updatedAt);
        return diff !== 0 ? diff : byPriority(a, b);
    })[0];
}

function pickByPolicy<R extends SyncableRecord>(candidates: Candidate<R>[], policy: ConflictResolutionPolicy): Candidate<R> {
    switch (policy) {
        case 'newer-wins':
            return pickNewest(candidates);
        case 'local-wins': {
            const local = candidates.find((candidate) => candidate.origin === 'local');
            return local ?? pickNewest(candidates);
        }
        case 'remote-wins': {
            const remote = [...candidates].filter((candidate) => candidate.origin !== 'local').sort(byPriority)[0];
            return remote ?? pickNewest(candidates);
        }
    }
}

const sameState = (a: SyncableRecord, b: SyncableRecord): boolean =>
    toTime(a.updatedAt) === toTime(b.updatedAt) && !!a.deletedAt === !!b.deletedAt && a.version === b.version;

/**
 * Resolve competing versions of one logical record.
 *
 * Rules:
 * 1. Any deleted version beats every live version, whatever the policy or version numbers.
 * 2. Otherwise the policy picks: newest `updatedAt` (ties by ORIGIN_PRIORITY), or a fixed origin.
 * 3. The winner always carries `max(input versions) + 1`, so the decision propagates and is never re-litigated.
 */
export function resolveConflict<R extends SyncableRecord>(
    candidates: ConflictCandidates<R>,
    policy: ConflictResolutionPolicy
): Result<ConflictResolution<R>, ConflictError> {
    const entries: Candidate<R>[] = [{ origin: 'local', record: candidates.local }];
    if (candidates.remote) entries.push({ origin: 'remote-backend', record: candidates.remote });
    if (candidates.external) entries.push({ origin: 'external-calendar', record: candidates.external });

    if (entries.length < 2) {
        return err({ code: 'no-incoming', message: 'Conflict resolution needs at least one incoming version' });
    }
    const { id, kind } = candidates.local;
    const mismatch = entries.find((entry) => entry.record.id !== id);
    if (mismatch) {
        return err({ code: 'id-mismatch', message: `Cannot resolve ${id} against ${mismatch.record.id}` });
    }
    if (entries.some((entry) => entry.record.kind !== kind)) {
        return err({ code: 'kind-mismatch', message: `Record ${id} has versions of different kinds` });
    }

    const deleted = entries.filter((entry) => !!entry.record.deletedAt);
    const pool = deleted.length > 0 ? deleted : entries;
    const chosen = pickByPolicy(pool, policy);

    const maxVersion = Math.max(...entries.map((entry) => entry.record.version));
    const winner: R = { ...chosen.record, origin: chosen.origin, version: maxVersion + 1 };

    const conflicted = entries.some((entry) => !sameState(entry.record, candidates.local));

    return ok({
        winner,
        winnerOrigin: chosen.origin,
        repush: entries
            .filter((entry) => entry.origin !== chosen.origin)
            .map((entry) => ({ origin: entry.origin, recordId: id })),
        deletionWon: deleted.length > 0 && deleted.length < entries.length,
        conflicted,
    });
}
