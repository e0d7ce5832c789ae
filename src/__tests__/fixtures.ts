// src/__tests__/fixtures.ts

import { QueueManager } from '../engine/queueManager';
import { WaitTimeEstimator, WaitTimeEstimatorOptions } from '../engine/waitTimeEstimator';
import { EntryState, Priority, QueueEntry } from '../models/QueueEntry';
import { InMemoryQueueStore } from '../persistence/inMemoryQueueStore';
import { InMemoryDirectory } from '../providers/inMemoryDirectory';

export const MINUTE = 60_000;
export const DAY_START = Date.parse('2026-03-02T09:00:00.000Z');

export interface TestClock {
    clock: () => Date;
    advanceMinutes(minutes: number): void;
    nowMs(): number;
}

export function createClock(startMs = DAY_START): TestClock {
    let now = startMs;
    return {
        clock: () => new Date(now),
        advanceMinutes: minutes => {
            now += minutes * MINUTE;
        },
        nowMs: () => now
    };
}

export function makeEntry(overrides: Partial<QueueEntry> = {}): QueueEntry {
    return {
        id: 'entry-1',
        patientRef: 'P-1',
        specializationKey: 'cardiology',
        priority: Priority.NORMAL,
        state: EntryState.WAITING,
        joinedAt: new Date(DAY_START),
        servedAt: null,
        removedAt: null,
        removalReason: null,
        ...overrides
    };
}

export interface Deferred {
    promise: Promise<void>;
    resolve: () => void;
}

export function deferred(): Deferred {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(res => {
        resolve = res;
    });
    return { promise, resolve };
}

type WriteHook = (entry: QueueEntry) => Promise<void>;

/**
 * In-memory store whose writes can be delayed or made to fail
 */
export class ScriptedQueueStore extends InMemoryQueueStore {
    beforeSave: WriteHook | null = null;
    beforeUpdate: WriteHook | null = null;
    saveCalls = 0;
    updateCalls = 0;

    async save(entry: QueueEntry): Promise<void> {
        this.saveCalls++;
        if (this.beforeSave) {
            await this.beforeSave(entry);
        }
        return super.save(entry);
    }

    async updateState(entry: QueueEntry): Promise<void> {
        this.updateCalls++;
        if (this.beforeUpdate) {
            await this.beforeUpdate(entry);
        }
        return super.updateState(entry);
    }

    failNextSave(message = 'disk full'): void {
        this.beforeSave = async () => {
            this.beforeSave = null;
            throw new Error(message);
        };
    }

    failNextUpdate(message = 'connection reset'): void {
        this.beforeUpdate = async () => {
            this.beforeUpdate = null;
            throw new Error(message);
        };
    }
}

export interface Harness {
    directory: InMemoryDirectory;
    store: ScriptedQueueStore;
    estimator: WaitTimeEstimator;
    manager: QueueManager;
    time: TestClock;
}

/**
 * QueueManager over in-memory collaborators
 *
 * cardiology: capacity 2, neurology: capacity 3, radiology: inactive.
 * Patients P-1 … P-9 exist.
 */
export function createHarness(options: {
    estimator?: WaitTimeEstimatorOptions;
    persistenceTimeoutMs?: number;
    store?: ScriptedQueueStore;
} = {}): Harness {
    const time = createClock();
    const directory = new InMemoryDirectory()
        .setSpecialization('cardiology', { capacity: 2, active: true })
        .setSpecialization('neurology', { capacity: 3, active: true })
        .setSpecialization('radiology', { capacity: 5, active: false });
    for (let i = 1; i <= 9; i++) {
        directory.addPatient(`P-${i}`);
    }

    const store = options.store ?? new ScriptedQueueStore();
    const estimator = new WaitTimeEstimator(options.estimator);
    const manager = new QueueManager({
        specializations: directory,
        patients: directory,
        persistence: store,
        estimator,
        clock: time.clock,
        persistenceTimeoutMs: options.persistenceTimeoutMs ?? 1000
    });

    return { directory, store, estimator, manager, time };
}
