// src/engine/queue.ts

import { CapacityExceededError, EmptyQueueError, EntryNotFoundError } from '../errors';
import { EntryState, NewQueueEntry, Priority, QueueEntry, QueuePosition } from '../models/QueueEntry';
import { EntryHeap } from './entryHeap';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function cloneEntry(entry: QueueEntry): QueueEntry {
    return {
        ...entry,
        joinedAt: new Date(entry.joinedAt),
        servedAt: entry.servedAt && new Date(entry.servedAt),
        removedAt: entry.removedAt && new Date(entry.removedAt)
    };
}

/**
 * One specialization's line of waiting patients
 *
 * Holds WAITING entries only. An entry that reaches SERVED or REMOVED leaves
 * the ordering structure and no longer counts toward capacity.
 *
 * Every method is synchronous and returns copies; callers never hold a
 * reference into the heap. Locking is the caller's job (see QueueManager).
 */
export class Queue {
    readonly specializationKey: string;
    private heap = new EntryHeap();
    private clock: Clock;

    constructor(specializationKey: string, clock: Clock = systemClock) {
        this.specializationKey = specializationKey;
        this.clock = clock;
    }

    get length(): number {
        return this.heap.size;
    }

    /**
     * Insert a new WAITING entry in priority/FIFO order
     *
     * @param entry Entry to insert; joinedAt is stamped when absent
     * @param capacity Maximum waiting entries for this specialization
     * @throws CapacityExceededError when the queue is already full
     */
    enqueue(entry: NewQueueEntry, capacity: number): QueueEntry {
        if (this.heap.size >= capacity) {
            throw new CapacityExceededError(this.specializationKey, capacity);
        }

        const waiting: QueueEntry = {
            id: entry.id,
            patientRef: entry.patientRef,
            specializationKey: this.specializationKey,
            priority: entry.priority,
            state: EntryState.WAITING,
            joinedAt: entry.joinedAt ? new Date(entry.joinedAt) : this.clock(),
            servedAt: null,
            removedAt: null,
            removalReason: null
        };

        this.heap.push(waiting);
        return cloneEntry(waiting);
    }

    /**
     * Serve the highest-priority, earliest-joined waiting entry
     *
     * @throws EmptyQueueError when nobody is waiting
     */
    dequeueNext(): QueueEntry {
        const next = this.heap.pop();
        if (!next) {
            throw new EmptyQueueError(this.specializationKey);
        }

        next.state = EntryState.SERVED;
        next.servedAt = this.clock();
        return cloneEntry(next);
    }

    /**
     * Serve a specific entry out of strict order
     *
     * @throws EntryNotFoundError if the entry is not waiting here
     */
    serve(entryId: string): QueueEntry {
        const entry = this.take(entryId);

        entry.state = EntryState.SERVED;
        entry.servedAt = this.clock();
        return cloneEntry(entry);
    }

    /**
     * @throws EntryNotFoundError if the entry is not waiting here (including
     * a second removal of the same entry)
     */
    remove(entryId: string, reason: string | null): QueueEntry {
        const entry = this.take(entryId);

        entry.state = EntryState.REMOVED;
        entry.removedAt = this.clock();
        entry.removalReason = reason;
        return cloneEntry(entry);
    }

    /**
     * Change priority and re-sort. joinedAt and insertion order are
     * untouched, so the entry keeps its arrival order against others in its
     * new priority class.
     *
     * @throws EntryNotFoundError if the entry is not waiting here
     */
    reprioritize(entryId: string, newPriority: Priority): QueueEntry {
        const entry = this.take(entryId);

        entry.priority = newPriority;
        this.heap.push(entry);
        return cloneEntry(entry);
    }

    /**
     * Waiting entry by id, or undefined
     */
    find(entryId: string): QueueEntry | undefined {
        const entry = this.heap.get(entryId);
        return entry && cloneEntry(entry);
    }

    /**
     * Waiting entry for a patient, or undefined
     */
    findByPatient(patientRef: string): QueueEntry | undefined {
        const entry = this.heap.values().find(e => e.patientRef === patientRef);
        return entry && cloneEntry(entry);
    }

    /**
     * 1-indexed view of waiting entries in serve order
     * Recomputed on every call; mutating the result does not touch the queue.
     */
    snapshot(): QueuePosition[] {
        return this.heap.ordered().map((entry, index) => ({
            position: index + 1,
            entry: cloneEntry(entry)
        }));
    }

    /**
     * Drop a tentatively enqueued entry without a state transition
     * Used to roll back an enqueue whose write failed.
     */
    discard(entryId: string): void {
        this.heap.delete(entryId);
        this.heap.forget(entryId);
    }

    /**
     * The entry's SERVED / REMOVED state is durable; it will not be restored
     */
    settle(entryId: string): void {
        this.heap.forget(entryId);
    }

    /**
     * Put an entry back to a previously captured value
     * Used to roll back serve/remove/reprioritize whose write failed. The
     * entry keeps its original place among arrivals of the same millisecond.
     */
    restore(previous: QueueEntry): void {
        this.heap.delete(previous.id);
        if (previous.state === EntryState.WAITING) {
            this.heap.push(cloneEntry(previous));
        }
    }

    /**
     * Re-insert an entry loaded from storage, bypassing the capacity check
     */
    load(entry: QueueEntry): void {
        if (entry.state !== EntryState.WAITING || this.heap.has(entry.id)) {
            return;
        }
        this.heap.push(cloneEntry(entry));
    }

    private take(entryId: string): QueueEntry {
        const entry = this.heap.delete(entryId);
        if (!entry) {
            throw new EntryNotFoundError(entryId);
        }
        return entry;
    }
}
