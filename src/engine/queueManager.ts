// src/engine/queueManager.ts

import { Mutex } from 'async-mutex';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import {
    DuplicateEntryError,
    EmptyQueueError,
    EntryNotFoundError,
    InactiveSpecializationError,
    ValidationError
} from '../errors';
import { moduleLogger } from '../logger';
import {
    AnnotatedQueuePosition,
    EntryState,
    Priority,
    PRIORITIES,
    QueueEntry,
    QueuePosition
} from '../models/QueueEntry';
import { QueueStatistics, SpecializationStatus } from '../models/Specialization';
import { PersistenceAdapter, withTimeout } from '../persistence/persistenceAdapter';
import { PatientProvider, SpecializationProvider } from '../providers/types';
import { isPriority } from './priorityCalculator';
import { Clock, Queue, systemClock } from './queue';
import { WaitTimeEstimator } from './waitTimeEstimator';

export const DEFAULT_PERSISTENCE_TIMEOUT_MS = 2000;

// Stored on an entry whose save timed out but landed afterwards
export const LATE_SAVE_REASON = 'write timed out';

export interface QueueManagerDeps {
    specializations: SpecializationProvider;
    patients: PatientProvider;
    persistence: PersistenceAdapter;
    estimator?: WaitTimeEstimator;
    clock?: Clock;
    persistenceTimeoutMs?: number;
    logger?: Logger;
}

/**
 * Waiting entry with its place in line
 */
export interface EntryLocation extends AnnotatedQueuePosition {
    queueLength: number;
}

/**
 * Queue manager - one Queue per specialization
 *
 * Every operation on a specialization runs under that specialization's
 * mutex, reads included, so no caller observes a mutation still waiting on
 * its durable write. Different specializations never share a lock.
 *
 * Mutations are applied in memory first, then written through the
 * persistence adapter. A failed or timed-out write rolls the in-memory change
 * back before PersistenceError reaches the caller. A timed-out write that
 * lands later is overwritten with the state memory holds for that entry.
 */
export class QueueManager {
    private queues = new Map<string, Queue>();
    private locks = new Map<string, Mutex>();

    // entry id → specialization key, WAITING entries only
    private entryIndex = new Map<string, string>();

    // entry id → timed-out writes still running against storage
    private lateWrites = new Map<string, number>();
    // last committed SERVED / REMOVED state of entries with a late write pending
    private settledWhileLate = new Map<string, QueueEntry>();
    private reconciliations = new Set<Promise<void>>();

    private readonly specializations: SpecializationProvider;
    private readonly patients: PatientProvider;
    private readonly persistence: PersistenceAdapter;
    private readonly estimator: WaitTimeEstimator;
    private readonly clock: Clock;
    private readonly persistenceTimeoutMs: number;
    private readonly log: Logger;

    constructor(deps: QueueManagerDeps) {
        this.specializations = deps.specializations;
        this.patients = deps.patients;
        this.persistence = deps.persistence;
        this.estimator = deps.estimator ?? new WaitTimeEstimator();
        this.clock = deps.clock ?? systemClock;
        this.persistenceTimeoutMs = deps.persistenceTimeoutMs ?? DEFAULT_PERSISTENCE_TIMEOUT_MS;
        this.log = deps.logger ?? moduleLogger('queue-manager');
    }

    get queueCount(): number {
        return this.queues.size;
    }

    /**
     * Rebuild in-memory queues from storage. Call once at startup.
     *
     * Loaded entries bypass the capacity check: a capacity lowered while
     * patients were waiting leaves them in line, and new patients are
     * rejected until the queue drains below the new limit. Stored SERVED
     * entries are replayed into the estimator, so wait statistics and
     * service durations carry over a restart.
     *
     * @returns Number of waiting entries restored
     */
    async initialize(): Promise<number> {
        const entries = await withTimeout('loadActiveEntries', this.persistenceTimeoutMs, () =>
            this.persistence.loadActiveEntries()
        );
        const served = await withTimeout('loadServedEntries', this.persistenceTimeoutMs, () =>
            this.persistence.loadServedEntries()
        );

        for (const entry of served) {
            this.estimator.recordServe(entry);
        }

        let restored = 0;
        for (const entry of entries) {
            if (entry.state !== EntryState.WAITING) {
                continue;
            }
            this.queueFor(entry.specializationKey).load(entry);
            this.entryIndex.set(entry.id, entry.specializationKey);
            restored++;
        }

        this.log.info({ restored, served: served.length, queues: this.queues.size }, 'Queues restored from storage');
        return restored;
    }

    /**
     * Add a patient to a specialization's queue
     *
     * @param patientRef Patient reference, checked against the patient registry
     * @param specializationKey Target specialization
     * @param priority Urgency class
     * @returns The new WAITING entry
     * @throws ValidationError unknown specialization or patient
     * @throws InactiveSpecializationError specialization not accepting patients
     * @throws DuplicateEntryError patient already waiting in this queue
     * @throws CapacityExceededError queue full
     * @throws PersistenceError write failed; nothing was enqueued
     */
    async addToQueue(patientRef: string, specializationKey: string, priority: Priority = Priority.NORMAL): Promise<QueueEntry> {
        this.assertPriority(priority);

        const status = await this.requireSpecialization(specializationKey);
        if (!status.active) {
            throw new InactiveSpecializationError(specializationKey);
        }

        if (!(await this.patients.exists(patientRef))) {
            throw new ValidationError(`Patient ${patientRef} not found`, { patientRef });
        }

        return this.withLock(specializationKey, async () => {
            const queue = this.queueFor(specializationKey);

            const existing = queue.findByPatient(patientRef);
            if (existing) {
                throw new DuplicateEntryError(patientRef, specializationKey, existing.id);
            }

            const entry = queue.enqueue(
                { id: uuidv4(), patientRef, specializationKey, priority },
                status.capacity
            );
            this.entryIndex.set(entry.id, specializationKey);

            try {
                await withTimeout('save', this.persistenceTimeoutMs, () => this.persistence.save(entry), late =>
                    this.undoLateWrite(late, {
                        ...entry,
                        state: EntryState.REMOVED,
                        removedAt: this.clock(),
                        removalReason: LATE_SAVE_REASON
                    })
                );
            } catch (error) {
                queue.discard(entry.id);
                this.entryIndex.delete(entry.id);
                this.log.warn({ entryId: entry.id, specializationKey, err: error }, 'Enqueue rolled back');
                throw error;
            }

            this.log.info(
                { entryId: entry.id, specializationKey, priority, queueLength: queue.length },
                'Patient added to queue'
            );
            return entry;
        });
    }

    /**
     * Serve the next patient in a specialization
     *
     * @throws EmptyQueueError nobody waiting
     * @throws PersistenceError write failed; the patient is still waiting
     */
    async serveNext(specializationKey: string): Promise<QueueEntry> {
        return this.withLock(specializationKey, async () => {
            const queue = this.queues.get(specializationKey);
            if (!queue) {
                throw new EmptyQueueError(specializationKey);
            }

            const served = queue.dequeueNext();
            return this.commitTerminal(queue, served, 'Patient served');
        });
    }

    /**
     * Serve a specific waiting patient, regardless of position
     *
     * @throws EntryNotFoundError entry absent or no longer waiting
     */
    async serveSpecific(entryId: string): Promise<QueueEntry> {
        const specializationKey = this.locate(entryId);

        return this.withLock(specializationKey, async () => {
            const queue = this.requireQueue(specializationKey, entryId);
            const served = queue.serve(entryId);
            return this.commitTerminal(queue, served, 'Patient served out of order');
        });
    }

    /**
     * Take a waiting patient out of line without serving them
     *
     * @throws EntryNotFoundError entry absent or no longer waiting
     */
    async removeFromQueue(entryId: string, reason: string | null = null): Promise<QueueEntry> {
        const specializationKey = this.locate(entryId);

        return this.withLock(specializationKey, async () => {
            const queue = this.requireQueue(specializationKey, entryId);
            const removed = queue.remove(entryId, reason);
            return this.commitTerminal(queue, removed, 'Patient removed from queue');
        });
    }

    /**
     * Change a waiting patient's priority; arrival time is kept
     *
     * @throws ValidationError priority outside the enumeration
     * @throws EntryNotFoundError entry absent or no longer waiting
     */
    async reprioritize(entryId: string, newPriority: Priority): Promise<QueueEntry> {
        this.assertPriority(newPriority);
        const specializationKey = this.locate(entryId);

        return this.withLock(specializationKey, async () => {
            const queue = this.requireQueue(specializationKey, entryId);
            const before = queue.find(entryId);
            if (!before) {
                throw new EntryNotFoundError(entryId);
            }

            const updated = queue.reprioritize(entryId, newPriority);

            try {
                await withTimeout('updateState', this.persistenceTimeoutMs, () => this.persistence.updateState(updated), late =>
                    this.undoLateWrite(late, before)
                );
            } catch (error) {
                queue.restore(before);
                this.log.warn({ entryId, specializationKey, err: error }, 'Reprioritize rolled back');
                throw error;
            }

            this.log.info(
                { entryId, specializationKey, from: before.priority, to: newPriority },
                'Patient reprioritized'
            );
            return updated;
        });
    }

    /**
     * Waiting entries in serve order with estimated waits
     *
     * @throws ValidationError unknown specialization
     */
    async getQueue(specializationKey: string): Promise<AnnotatedQueuePosition[]> {
        await this.requireSpecialization(specializationKey);
        return this.withLock(specializationKey, async () => this.annotate(specializationKey, this.snapshotOf(specializationKey)));
    }

    /**
     * Annotated snapshots of every queue held in memory
     */
    async getAllQueues(): Promise<Record<string, AnnotatedQueuePosition[]>> {
        const result: Record<string, AnnotatedQueuePosition[]> = {};
        const keys = [...this.queues.keys()].sort();

        for (const key of keys) {
            result[key] = await this.withLock(key, async () => this.annotate(key, this.snapshotOf(key)));
        }
        return result;
    }

    /**
     * A waiting entry with its current position and estimate
     *
     * @throws EntryNotFoundError entry absent or no longer waiting
     */
    async getEntry(entryId: string): Promise<EntryLocation> {
        const specializationKey = this.locate(entryId);

        return this.withLock(specializationKey, async () => {
            const annotated = this.annotate(specializationKey, this.snapshotOf(specializationKey));
            const found = annotated.find(item => item.entry.id === entryId);
            if (!found) {
                throw new EntryNotFoundError(entryId);
            }
            return { ...found, queueLength: annotated.length };
        });
    }

    /**
     * Aggregate metrics for one specialization. Read-only.
     *
     * Served counts and average wait cover every SERVED entry in storage
     * (replayed by initialize) plus serves since.
     *
     * @throws ValidationError unknown specialization
     */
    async getStatistics(specializationKey: string): Promise<QueueStatistics> {
        const status = await this.requireSpecialization(specializationKey);

        return this.withLock(specializationKey, async () => {
            const snapshot = this.snapshotOf(specializationKey);
            const history = this.estimator.summary(specializationKey);
            const nowMs = this.clock().getTime();

            const countByPriority: Record<Priority, number> = {
                [Priority.NORMAL]: 0,
                [Priority.URGENT]: 0,
                [Priority.SUPER_URGENT]: 0
            };
            let longestWaitMs = 0;

            for (const { entry } of snapshot) {
                countByPriority[entry.priority]++;
                longestWaitMs = Math.max(longestWaitMs, nowMs - entry.joinedAt.getTime());
            }

            return {
                specializationKey,
                currentLength: snapshot.length,
                capacity: status.capacity,
                capacityUtilization: status.capacity > 0 ? snapshot.length / status.capacity : 0,
                averageWaitMs: history.averageWaitMs,
                longestWaitMs,
                averageServiceMs: history.averageServiceMs,
                servedCount: history.servedCount,
                countByPriority
            };
        });
    }

    /**
     * Persist a SERVED / REMOVED transition, or put the entry back in line
     */
    private async commitTerminal(queue: Queue, entry: QueueEntry, message: string): Promise<QueueEntry> {
        this.entryIndex.delete(entry.id);
        const waiting: QueueEntry = {
            ...entry,
            state: EntryState.WAITING,
            servedAt: null,
            removedAt: null,
            removalReason: null
        };

        try {
            await withTimeout('updateState', this.persistenceTimeoutMs, () => this.persistence.updateState(entry), late =>
                this.undoLateWrite(late, waiting)
            );
        } catch (error) {
            queue.restore(waiting);
            this.entryIndex.set(entry.id, entry.specializationKey);
            this.log.warn({ entryId: entry.id, specializationKey: entry.specializationKey, err: error }, 'Terminal transition rolled back');
            throw error;
        }

        queue.settle(entry.id);
        if (this.lateWrites.has(entry.id)) {
            this.settledWhileLate.set(entry.id, entry);
        }
        if (entry.state === EntryState.SERVED) {
            this.estimator.recordServe(entry);
        }

        this.log.info(
            { entryId: entry.id, specializationKey: entry.specializationKey, state: entry.state, queueLength: queue.length },
            message
        );
        return entry;
    }

    /**
     * Wait for every timed-out write to settle, and be overwritten if it
     * landed. Call before closing the persistence connection.
     */
    async drain(): Promise<void> {
        while (this.reconciliations.size > 0) {
            await Promise.all([...this.reconciliations]);
        }
    }

    /**
     * Track a write that outlived its timeout
     *
     * If it lands, storage now holds a state the caller was told did not
     * happen. Once it settles, the entry is rewritten under the
     * specialization lock with what memory holds: the waiting entry if it is
     * still in line, its committed terminal state if a later operation
     * settled it, or fallback otherwise.
     */
    private undoLateWrite(late: Promise<void>, fallback: QueueEntry): void {
        const { id: entryId, specializationKey } = fallback;
        this.lateWrites.set(entryId, (this.lateWrites.get(entryId) ?? 0) + 1);

        const reconciliation = late
            .then(
                () => this.withLock(specializationKey, () => this.rewriteAfterLateWrite(fallback)),
                (error: unknown) => {
                    this.log.debug({ entryId, specializationKey, err: error }, 'Timed-out write failed; nothing to undo');
                }
            )
            .catch((error: unknown) => {
                this.log.warn({ entryId, specializationKey, err: error }, 'Could not undo a timed-out write');
            })
            .finally(() => {
                const pending = (this.lateWrites.get(entryId) ?? 1) - 1;
                if (pending > 0) {
                    this.lateWrites.set(entryId, pending);
                } else {
                    this.lateWrites.delete(entryId);
                    this.settledWhileLate.delete(entryId);
                }
                this.reconciliations.delete(reconciliation);
            });

        this.reconciliations.add(reconciliation);
    }

    private async rewriteAfterLateWrite(fallback: QueueEntry): Promise<void> {
        const current = this.queues.get(fallback.specializationKey)?.find(fallback.id)
            ?? this.settledWhileLate.get(fallback.id)
            ?? fallback;

        await withTimeout('updateState', this.persistenceTimeoutMs, () => this.persistence.updateState(current));
        this.log.warn(
            { entryId: current.id, specializationKey: current.specializationKey, state: current.state },
            'Timed-out write landed late; stored entry rewritten'
        );
    }

    private annotate(specializationKey: string, snapshot: QueuePosition[]): AnnotatedQueuePosition[] {
        return snapshot.map(({ position, entry }) => ({
            position,
            entry,
            estimatedWaitMs: this.estimator.estimate(position, specializationKey)
        }));
    }

    private snapshotOf(specializationKey: string): QueuePosition[] {
        return this.queues.get(specializationKey)?.snapshot() ?? [];
    }

    private async requireSpecialization(specializationKey: string): Promise<SpecializationStatus> {
        const status = await this.specializations.getCapacityAndStatus(specializationKey);
        if (!status) {
            throw new ValidationError(`Specialization ${specializationKey} not found`, { specializationKey });
        }
        return status;
    }

    private assertPriority(priority: unknown): void {
        if (!isPriority(priority)) {
            throw new ValidationError(`Unknown priority ${String(priority)}`, { allowed: PRIORITIES });
        }
    }

    private locate(entryId: string): string {
        const specializationKey = this.entryIndex.get(entryId);
        if (specializationKey === undefined) {
            throw new EntryNotFoundError(entryId);
        }
        return specializationKey;
    }

    private requireQueue(specializationKey: string, entryId: string): Queue {
        const queue = this.queues.get(specializationKey);
        if (!queue) {
            throw new EntryNotFoundError(entryId);
        }
        return queue;
    }

    private queueFor(specializationKey: string): Queue {
        let queue = this.queues.get(specializationKey);
        if (!queue) {
            queue = new Queue(specializationKey, this.clock);
            this.queues.set(specializationKey, queue);
        }
        return queue;
    }

    private withLock<T>(specializationKey: string, critical: () => Promise<T>): Promise<T> {
        let lock = this.locks.get(specializationKey);
        if (!lock) {
            lock = new Mutex();
            this.locks.set(specializationKey, lock);
        }
        return lock.runExclusive(critical);
    }
}
