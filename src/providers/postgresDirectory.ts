// src/providers/postgresDirectory.ts

import { z } from 'zod';
import { SpecializationStatus } from '../models/Specialization';
import { Queryable } from '../persistence/queryable';
import { PatientProvider, SpecializationProvider } from './types';

const SpecializationRowSchema = z.object({
    max_capacity: z.coerce.number().int().min(0),
    is_active: z.boolean()
});

/**
 * Specialization and patient lookups against the front desk's record tables
 */
export class PostgresDirectory implements SpecializationProvider, PatientProvider {
    constructor(private readonly db: Queryable) {}

    async getCapacityAndStatus(specializationKey: string): Promise<SpecializationStatus | null> {
        const result = await this.db.query(
            'SELECT max_capacity, is_active FROM specializations WHERE specialization_key = $1',
            [specializationKey]
        );

        if (result.rows.length === 0) {
            return null;
        }

        const row = SpecializationRowSchema.parse(result.rows[0]);
        return { capacity: row.max_capacity, active: row.is_active };
    }

    async exists(patientRef: string): Promise<boolean> {
        const result = await this.db.query('SELECT 1 FROM patients WHERE patient_ref = $1', [patientRef]);
        return result.rows.length > 0;
    }
}
