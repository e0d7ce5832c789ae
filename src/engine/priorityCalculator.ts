// src/engine/priorityCalculator.ts

import { Priority, QueueEntry } from '../models/QueueEntry';

/**
 * Rank for a priority class (higher = served sooner)
 *
 * Pure function. The switch is exhaustive over the enum, so an unknown
 * value cannot slip through as a silent default.
 *
 * @returns 0 for NORMAL, 1 for URGENT, 2 for SUPER_URGENT
 */
export function priorityRank(priority: Priority): number {
    switch (priority) {
        case Priority.SUPER_URGENT:
            return 2;
        case Priority.URGENT:
            return 1;
        case Priority.NORMAL:
            return 0;
    }
}

/**
 * Narrow an arbitrary value to a Priority
 */
export function isPriority(value: unknown): value is Priority {
    return value === Priority.NORMAL || value === Priority.URGENT || value === Priority.SUPER_URGENT;
}

/**
 * Ordering key for a waiting entry: (-rank, joinedAt, sequence)
 *
 * sequence is the queue's insertion counter; it only decides between entries
 * sharing both priority and joinedAt millisecond.
 */
export interface ServiceKey {
    rank: number;
    joinedAtMs: number;
    sequence: number;
}

export function serviceKey(entry: QueueEntry, sequence: number): ServiceKey {
    return {
        rank: priorityRank(entry.priority),
        joinedAtMs: entry.joinedAt.getTime(),
        sequence
    };
}

/**
 * Compare two keys in serve order
 *
 * @returns Negative when a is served before b
 */
export function compareServiceKeys(a: ServiceKey, b: ServiceKey): number {
    if (a.rank !== b.rank) {
        return b.rank - a.rank;
    }
    if (a.joinedAtMs !== b.joinedAtMs) {
        return a.joinedAtMs - b.joinedAtMs;
    }
    return a.sequence - b.sequence;
}
