// src/providers/inMemoryDirectory.ts

import { SpecializationStatus } from '../models/Specialization';
import { PatientProvider, SpecializationProvider } from './types';

export interface DirectorySeed {
    specializations: Array<{ key: string; name?: string; capacity: number; active: boolean }>;
    patients: Array<{ ref: string; name?: string }>;
}

/**
 * In-memory patient and specialization registry
 *
 * Stands in for the front desk's record screens when no database is
 * configured, and in tests.
 */
export class InMemoryDirectory implements SpecializationProvider, PatientProvider {
    private specializations = new Map<string, SpecializationStatus>();
    private patients = new Set<string>();

    constructor(seed?: DirectorySeed) {
        for (const specialization of seed?.specializations ?? []) {
            this.setSpecialization(specialization.key, specialization);
        }
        for (const patient of seed?.patients ?? []) {
            this.addPatient(patient.ref);
        }
    }

    setSpecialization(key: string, status: SpecializationStatus): this {
        this.specializations.set(key, { capacity: status.capacity, active: status.active });
        return this;
    }

    addPatient(patientRef: string): this {
        this.patients.add(patientRef);
        return this;
    }

    async getCapacityAndStatus(specializationKey: string): Promise<SpecializationStatus | null> {
        const status = this.specializations.get(specializationKey);
        return status ? { ...status } : null;
    }

    async exists(patientRef: string): Promise<boolean> {
        return this.patients.has(patientRef);
    }
}
