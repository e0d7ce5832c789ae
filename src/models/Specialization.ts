// src/models/Specialization.ts

import { Priority } from './QueueEntry';

/**
 * Capacity and availability of one specialization, as reported by its provider
 *
 * Invariant: waiting entries in the specialization's queue <= capacity
 */
export interface SpecializationStatus {
    capacity: number;   // Maximum simultaneously waiting patients
    active: boolean;    // Inactive specializations accept no new patients
}

/**
 * Aggregate metrics for one specialization's queue
 */
export interface QueueStatistics {
    specializationKey: string;
    currentLength: number;
    capacity: number;
    capacityUtilization: number;   // currentLength / capacity, 0 when capacity is 0
    averageWaitMs: number;         // Mean join-to-serve time of served entries
    longestWaitMs: number;         // Longest current wait among waiting entries
    averageServiceMs: number;      // Service duration used for estimates
    servedCount: number;
    countByPriority: Record<Priority, number>;
}
