// src/models/QueueEntry.ts

/**
 * Urgency classes, lowest to highest
 * Ranking lives in engine/priorityCalculator
 */
export enum Priority {
    NORMAL = 'NORMAL',
    URGENT = 'URGENT',
    SUPER_URGENT = 'SUPER_URGENT'
}

/**
 * Entry lifecycle states
 *
 * Valid transitions:
 * - WAITING → SERVED (serve-next or serve-specific)
 * - WAITING → REMOVED (patient left, staff removal)
 * - WAITING → WAITING (reprioritize, priority field only)
 *
 * SERVED and REMOVED are terminal.
 */
export enum EntryState {
    WAITING = 'WAITING',
    SERVED = 'SERVED',
    REMOVED = 'REMOVED'
}

/**
 * Queue entry model - one patient waiting in one specialization's line
 *
 * Data only, no methods. State mutations handled by engine/queue.
 */
export interface QueueEntry {
    id: string;
    patientRef: string;
    specializationKey: string;
    priority: Priority;
    state: EntryState;

    // Timing
    joinedAt: Date;
    servedAt: Date | null;
    removedAt: Date | null;
    removalReason: string | null;
}

/**
 * Entry handed to Queue.enqueue - joinedAt is stamped by the queue when absent
 */
export type NewQueueEntry = Pick<QueueEntry, 'id' | 'patientRef' | 'specializationKey' | 'priority'> & {
    joinedAt?: Date;
};

/**
 * A waiting entry and its 1-indexed place in serve order
 */
export interface QueuePosition {
    position: number;
    entry: QueueEntry;
}

/**
 * Queue position annotated with an estimated wait
 */
export interface AnnotatedQueuePosition extends QueuePosition {
    estimatedWaitMs: number;
}

export const PRIORITIES: readonly Priority[] = [Priority.NORMAL, Priority.URGENT, Priority.SUPER_URGENT];
