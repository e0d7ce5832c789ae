// src/persistence/persistenceAdapter.ts

import { PersistenceError } from '../errors';
import { QueueEntry } from '../models/QueueEntry';

/**
 * Durable storage of queue entries
 *
 * save / updateState are awaited inside every mutating queue operation,
 * before the operation reports success. Terminal entries stay in storage
 * for reporting; only WAITING ones come back from loadActiveEntries, and
 * SERVED ones feed the wait statistics through loadServedEntries.
 */
export interface PersistenceAdapter {
    loadActiveEntries(): Promise<QueueEntry[]>;
    loadServedEntries(): Promise<QueueEntry[]>;   // oldest serve first
    save(entry: QueueEntry): Promise<void>;
    updateState(entry: QueueEntry): Promise<void>;
}

/**
 * Run a persistence call with an upper bound on its duration
 *
 * Rejections and timeouts both surface as PersistenceError. A call that
 * times out is not cancelled: it may still land later. onTimeout receives
 * the call's promise when the bound elapses, so the caller can undo a late
 * write once it settles.
 *
 * @param operation Name used in the error message ("save", "updateState", ...)
 * @param timeoutMs Bound in milliseconds
 * @param call Persistence call to run
 * @param onTimeout Invoked once with the still-running call if the bound elapses
 */
export async function withTimeout<T>(
    operation: string,
    timeoutMs: number,
    call: () => Promise<T>,
    onTimeout?: (inFlight: Promise<T>) => void
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    try {
        const inFlight = call();
        const timeout = new Promise<never>((_resolve, reject) => {
            timer = setTimeout(() => {
                onTimeout?.(inFlight);
                reject(new PersistenceError(operation, `timed out after ${timeoutMs}ms`));
            }, timeoutMs);
        });

        return await Promise.race([inFlight, timeout]);
    } catch (error) {
        if (error instanceof PersistenceError) {
            throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new PersistenceError(operation, message, error);
    } finally {
        clearTimeout(timer);
    }
}
