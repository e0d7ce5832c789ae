// src/engine/entryHeap.ts

import { QueueEntry } from '../models/QueueEntry';
import { compareServiceKeys, serviceKey, ServiceKey } from './priorityCalculator';

interface HeapNode {
    entry: QueueEntry;
    key: ServiceKey;
}

/**
 * Indexed binary min-heap of waiting entries in serve order
 *
 * Keeps an id → array index map so a specific entry can be pulled out
 * without a linear scan.
 *
 * An id keeps its insertion sequence after it leaves the heap, until
 * forget() is called. Pushing it again (rollback, priority change) puts it
 * back among same-millisecond arrivals where it was.
 *
 * Performance:
 * - push: O(log n)
 * - pop: O(log n)
 * - delete by id: O(log n)
 * - ordered(): O(n log n), copies, never mutates the heap
 */
export class EntryHeap {
    private nodes: HeapNode[] = [];
    private indexById = new Map<string, number>();
    private sequenceById = new Map<string, number>();
    private sequence = 0;

    get size(): number {
        return this.nodes.length;
    }

    has(entryId: string): boolean {
        return this.indexById.has(entryId);
    }

    get(entryId: string): QueueEntry | undefined {
        const index = this.indexById.get(entryId);
        return index === undefined ? undefined : this.nodes[index].entry;
    }

    /**
     * Insert an entry. Key is computed from its current priority and joinedAt,
     * and the sequence the id was first pushed with.
     */
    push(entry: QueueEntry): void {
        let sequence = this.sequenceById.get(entry.id);
        if (sequence === undefined) {
            sequence = this.sequence++;
            this.sequenceById.set(entry.id, sequence);
        }

        const node: HeapNode = { entry, key: serviceKey(entry, sequence) };
        this.nodes.push(node);
        this.indexById.set(entry.id, this.nodes.length - 1);
        this.siftUp(this.nodes.length - 1);
    }

    peek(): QueueEntry | undefined {
        return this.nodes[0]?.entry;
    }

    pop(): QueueEntry | undefined {
        if (this.nodes.length === 0) {
            return undefined;
        }
        return this.removeAt(0);
    }

    /**
     * Remove a specific entry
     *
     * @returns The removed entry, or undefined if it was not in the heap
     */
    delete(entryId: string): QueueEntry | undefined {
        const index = this.indexById.get(entryId);
        if (index === undefined) {
            return undefined;
        }
        return this.removeAt(index);
    }

    /**
     * Drop the remembered sequence of an id that will not be pushed again
     * No-op while the entry is still in the heap.
     */
    forget(entryId: string): void {
        if (!this.indexById.has(entryId)) {
            this.sequenceById.delete(entryId);
        }
    }

    /**
     * Entries in serve order
     */
    ordered(): QueueEntry[] {
        return [...this.nodes]
            .sort((a, b) => compareServiceKeys(a.key, b.key))
            .map(node => node.entry);
    }

    values(): QueueEntry[] {
        return this.nodes.map(node => node.entry);
    }

    private removeAt(index: number): QueueEntry {
        const removed = this.nodes[index];
        const last = this.nodes.pop();
        this.indexById.delete(removed.entry.id);

        // Removed node was the tail
        if (last === undefined || index === this.nodes.length) {
            return removed.entry;
        }

        this.nodes[index] = last;
        this.indexById.set(last.entry.id, index);

        if (index > 0 && this.less(index, this.parent(index))) {
            this.siftUp(index);
        } else {
            this.siftDown(index);
        }

        return removed.entry;
    }

    private siftUp(index: number): void {
        let current = index;
        while (current > 0) {
            const parent = this.parent(current);
            if (!this.less(current, parent)) {
                break;
            }
            this.swap(current, parent);
            current = parent;
        }
    }

    private siftDown(index: number): void {
        let current = index;
        for (;;) {
            const left = current * 2 + 1;
            const right = left + 1;
            let smallest = current;

            if (left < this.nodes.length && this.less(left, smallest)) {
                smallest = left;
            }
            if (right < this.nodes.length && this.less(right, smallest)) {
                smallest = right;
            }
            if (smallest === current) {
                return;
            }

            this.swap(current, smallest);
            current = smallest;
        }
    }

    private less(i: number, j: number): boolean {
        return compareServiceKeys(this.nodes[i].key, this.nodes[j].key) < 0;
    }

    private parent(index: number): number {
        return Math.floor((index - 1) / 2);
    }

    private swap(i: number, j: number): void {
        const a = this.nodes[i];
        const b = this.nodes[j];
        this.nodes[i] = b;
        this.nodes[j] = a;
        this.indexById.set(b.entry.id, i);
        this.indexById.set(a.entry.id, j);
    }
}
