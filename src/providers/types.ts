// src/providers/types.ts

import { SpecializationStatus } from '../models/Specialization';

/**
 * Source of specialization capacity and availability
 */
export interface SpecializationProvider {
    /**
     * @returns Capacity and active flag, or null when the key is unknown
     */
    getCapacityAndStatus(specializationKey: string): Promise<SpecializationStatus | null>;
}

/**
 * Patient registry existence check
 */
export interface PatientProvider {
    exists(patientRef: string): Promise<boolean>;
}
