import { z } from "zod";

/**
 * Listening progress is persisted outside the session, one JSON record per
 * item identifier. The session only emits updates; it never reads them back.
 */

export interface ListeningProgressRecord {
    identifier: string;
    title: string;
    positionSec: number;
    durationSec: number;
    /** ISO-8601 timestamp */
    updatedAt: string;
}

export interface ListeningProgressSink {
    record(progress: ListeningProgressRecord): void | Promise<void>;
}

/** Any `localStorage`-shaped key/value store. */
export interface KeyValueStorage {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
}

export const LISTENING_PROGRESS_KEY_PREFIX = "shelfcast_listening_progress_";

export function listeningProgressKey(identifier: string): string {
    return `${LISTENING_PROGRESS_KEY_PREFIX}${identifier}`;
}

export function createStorageProgressSink(
    storage: KeyValueStorage
): ListeningProgressSink {
    return {
        record: (progress) => {
            storage.setItem(
                listeningProgressKey(progress.identifier),
                JSON.stringify(progress)
            );
        },
    };
}

const listeningProgressRecordSchema = z.object({
    identifier: z.string(),
    title: z.string(),
    positionSec: z.number().finite(),
    durationSec: z.number().finite(),
    updatedAt: z.string(),
});

function parseRecord(raw: string): ListeningProgressRecord | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }

    const result = listeningProgressRecordSchema.safeParse(parsed);
    return result.success ? result.data : null;
}

export function readListeningProgress(
    storage: KeyValueStorage,
    identifier: string
): ListeningProgressRecord | null {
    const raw = storage.getItem(listeningProgressKey(identifier));
    if (raw === null) {
        return null;
    }
    return parseRecord(raw);
}

/**
 * In-process storage, for hosts without `localStorage` and for tests.
 */
export class MemoryKeyValueStorage implements KeyValueStorage {
    private readonly entries = new Map<string, string>();

    getItem(key: string): string | null {
        return this.entries.get(key) ?? null;
    }

    setItem(key: string, value: string): void {
        this.entries.set(key, value);
    }

    get size(): number {
        return this.entries.size;
    }
}
