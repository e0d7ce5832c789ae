// src/persistence/inMemoryQueueStore.ts

import { cloneEntry } from '../engine/queue';
import { EntryState, QueueEntry } from '../models/QueueEntry';
import { PersistenceAdapter } from './persistenceAdapter';

/**
 * Process-local PersistenceAdapter
 *
 * Keeps every entry ever written, terminal ones included, so reports can
 * read served/removed history. Stores copies.
 */
export class InMemoryQueueStore implements PersistenceAdapter {
    private entries = new Map<string, QueueEntry>();

    constructor(initial: QueueEntry[] = []) {
        for (const entry of initial) {
            this.entries.set(entry.id, cloneEntry(entry));
        }
    }

    async loadActiveEntries(): Promise<QueueEntry[]> {
        return [...this.entries.values()]
            .filter(entry => entry.state === EntryState.WAITING)
            .map(cloneEntry);
    }

    async loadServedEntries(): Promise<QueueEntry[]> {
        return [...this.entries.values()]
            .filter(entry => entry.state === EntryState.SERVED)
            .sort((a, b) => (a.servedAt?.getTime() ?? 0) - (b.servedAt?.getTime() ?? 0))
            .map(cloneEntry);
    }

    async save(entry: QueueEntry): Promise<void> {
        if (this.entries.has(entry.id)) {
            throw new Error(`Queue entry ${entry.id} already stored`);
        }
        this.entries.set(entry.id, cloneEntry(entry));
    }

    async updateState(entry: QueueEntry): Promise<void> {
        if (!this.entries.has(entry.id)) {
            throw new Error(`Queue entry ${entry.id} not stored`);
        }
        this.entries.set(entry.id, cloneEntry(entry));
    }

    /**
     * Stored entry by id, terminal or not
     */
    get(entryId: string): QueueEntry | undefined {
        const entry = this.entries.get(entryId);
        return entry && cloneEntry(entry);
    }

    all(): QueueEntry[] {
        return [...this.entries.values()].map(cloneEntry);
    }
}
