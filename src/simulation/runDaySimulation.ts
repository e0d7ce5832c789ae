// src/simulation/runDaySimulation.ts

import type { Logger } from 'pino';
import { priorityRank } from '../engine/priorityCalculator';
import { QueueManager } from '../engine/queueManager';
import { WaitTimeEstimator } from '../engine/waitTimeEstimator';
import { AppError } from '../errors';
import { moduleLogger } from '../logger';
import { AnnotatedQueuePosition, Priority, QueueEntry } from '../models/QueueEntry';
import { QueueStatistics } from '../models/Specialization';
import { InMemoryQueueStore } from '../persistence/inMemoryQueueStore';
import { InMemoryDirectory } from '../providers/inMemoryDirectory';

/**
 * Front-desk day simulation
 *
 * Demonstrates:
 * - Priority ordering with FIFO tie-break
 * - Capacity, inactive-specialization and duplicate rejections
 * - Reprioritization keeping arrival time
 * - Serving, and a walk-out removal
 * - Wait estimates learned from serve history
 * - Invariant preservation
 *
 * Runs on a simulated clock so the output is the same on every run.
 */

export interface SimulationSummary {
    servedOrder: string[];               // patientRefs in the order they were served
    rejections: Record<string, number>;  // error code → count
    statistics: QueueStatistics[];
    allInvariantsHold: boolean;
}

const DAY_START = Date.parse('2026-03-02T09:00:00.000Z');
const MINUTE = 60_000;

export async function runDaySimulation(log: Logger = moduleLogger('simulation')): Promise<SimulationSummary> {
    let nowMs = DAY_START;
    const clock = () => new Date(nowMs);
    const at = (minute: number) => {
        nowMs = DAY_START + minute * MINUTE;
    };

    const logSection = (title: string) => log.info(`===== ${title} =====`);

    const logQueue = (key: string, queue: AnnotatedQueuePosition[]) => {
        log.info(`${key}: ${queue.length} waiting`);
        for (const { position, entry, estimatedWaitMs } of queue) {
            log.info(`  #${position} ${entry.id.slice(0, 8)} ${entry.priority} (~${Math.round(estimatedWaitMs / MINUTE)} min)`);
        }
    };

    // Initialize system
    const directory = new InMemoryDirectory()
        .setSpecialization('cardiology', { capacity: 3, active: true })
        .setSpecialization('neurology', { capacity: 4, active: true })
        .setSpecialization('radiology', { capacity: 5, active: false });
    for (let i = 1; i <= 8; i++) {
        directory.addPatient(`P-100${i}`);
    }

    const store = new InMemoryQueueStore();
    const queueManager = new QueueManager({
        specializations: directory,
        patients: directory,
        persistence: store,
        estimator: new WaitTimeEstimator({ minSamples: 1 }),
        clock,
        logger: log
    });

    const servedOrder: string[] = [];
    const rejections: Record<string, number> = {};
    const entriesByPatient = new Map<string, QueueEntry>();

    const attempt = async (label: string, action: () => Promise<QueueEntry>): Promise<void> => {
        try {
            const entry = await action();
            entriesByPatient.set(entry.patientRef, entry);
            log.info(`  ✓ ${label}`);
        } catch (error) {
            if (!(error instanceof AppError)) {
                throw error;
            }
            rejections[error.code] = (rejections[error.code] ?? 0) + 1;
            log.info(`  ✗ ${label}: ${error.code}`);
        }
    };

    const serve = async (key: string): Promise<void> => {
        const served = await queueManager.serveNext(key);
        servedOrder.push(served.patientRef);
        log.info(`  → ${key} served ${served.patientRef} (${served.priority})`);
    };

    const entryId = (patientRef: string): string => {
        const entry = entriesByPatient.get(patientRef);
        if (!entry) {
            throw new Error(`Simulation script error: ${patientRef} never queued`);
        }
        return entry.id;
    };

    // ========== STEP 1: Morning registrations ==========
    logSection('STEP 1: Morning registrations');

    const registrations: Array<{ minute: number; patient: string; key: string; priority: Priority }> = [
        { minute: 0, patient: 'P-1001', key: 'cardiology', priority: Priority.NORMAL },
        { minute: 2, patient: 'P-1002', key: 'cardiology', priority: Priority.URGENT },
        { minute: 4, patient: 'P-1003', key: 'cardiology', priority: Priority.NORMAL },
        { minute: 6, patient: 'P-1004', key: 'cardiology', priority: Priority.NORMAL },   // over capacity
        { minute: 8, patient: 'P-1005', key: 'neurology', priority: Priority.NORMAL },
        { minute: 10, patient: 'P-1006', key: 'neurology', priority: Priority.NORMAL },
        { minute: 12, patient: 'P-1007', key: 'neurology', priority: Priority.URGENT },
        { minute: 13, patient: 'P-1008', key: 'radiology', priority: Priority.NORMAL },   // inactive
        { minute: 13, patient: 'P-1005', key: 'neurology', priority: Priority.URGENT }    // duplicate
    ];

    for (const { minute, patient, key, priority } of registrations) {
        at(minute);
        await attempt(`${patient} → ${key} (${priority})`, () => queueManager.addToQueue(patient, key, priority));
    }

    logQueue('cardiology', await queueManager.getQueue('cardiology'));
    logQueue('neurology', await queueManager.getQueue('neurology'));

    // ========== STEP 2: Triage escalation ==========
    logSection('STEP 2: Triage escalation');

    at(14);
    await attempt('P-1006 escalated to SUPER_URGENT', () =>
        queueManager.reprioritize(entryId('P-1006'), Priority.SUPER_URGENT)
    );
    logQueue('neurology', await queueManager.getQueue('neurology'));

    // ========== STEP 3: Consultations ==========
    logSection('STEP 3: Consultations');

    at(20);
    await serve('cardiology');
    at(32);
    await serve('cardiology');

    at(34);
    await attempt('P-1004 → cardiology (NORMAL), retry after capacity freed', () =>
        queueManager.addToQueue('P-1004', 'cardiology', Priority.NORMAL)
    );

    at(35);
    await serve('neurology');
    at(47);
    await serve('neurology');

    at(50);
    await attempt('P-1005 left without being seen', () =>
        queueManager.removeFromQueue(entryId('P-1005'), 'left without being seen')
    );

    at(60);
    await serve('cardiology');

    // ========== STEP 4: Invariant verification ==========
    logSection('STEP 4: Invariant verification');

    let allInvariantsHold = true;
    const statistics: QueueStatistics[] = [];

    for (const key of ['cardiology', 'neurology']) {
        const queue = await queueManager.getQueue(key);
        const stats = await queueManager.getStatistics(key);
        statistics.push(stats);

        if (queue.length > stats.capacity) {
            log.info(`  ✗ VIOLATED: ${key} has ${queue.length} waiting (capacity ${stats.capacity})`);
            allInvariantsHold = false;
        }

        queue.forEach(({ position, entry }, index) => {
            if (position !== index + 1) {
                log.info(`  ✗ VIOLATED: ${key} position ${position} at index ${index}`);
                allInvariantsHold = false;
            }
            const ahead = queue[index - 1]?.entry;
            if (ahead && !servedBefore(ahead, entry)) {
                log.info(`  ✗ VIOLATED: ${key} ${ahead.id} ordered ahead of ${entry.id}`);
                allInvariantsHold = false;
            }
        });
    }
    log.info(`  ${allInvariantsHold ? '✓' : '✗'} Capacity and ordering invariants`);

    // Final summary
    logSection('SIMULATION SUMMARY');

    for (const stats of statistics) {
        log.info(
            `${stats.specializationKey}: waiting ${stats.currentLength}/${stats.capacity}, ` +
            `served ${stats.servedCount}, avg wait ${Math.round(stats.averageWaitMs / MINUTE)} min, ` +
            `avg service ${Math.round(stats.averageServiceMs / MINUTE)} min`
        );
    }
    log.info(`Served order: ${servedOrder.join(', ')}`);
    log.info(`Rejections: ${JSON.stringify(rejections)}`);
    log.info(`Entries stored: ${store.all().length}`);

    return { servedOrder, rejections, statistics, allInvariantsHold };
}

function servedBefore(a: QueueEntry, b: QueueEntry): boolean {
    const rankA = priorityRank(a.priority);
    const rankB = priorityRank(b.priority);
    if (rankA !== rankB) {
        return rankA > rankB;
    }
    return a.joinedAt.getTime() <= b.joinedAt.getTime();
}
