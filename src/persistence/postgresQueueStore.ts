// src/persistence/postgresQueueStore.ts

import { z } from 'zod';
import { EntryState, Priority, QueueEntry } from '../models/QueueEntry';
import { PersistenceAdapter } from './persistenceAdapter';
import { Queryable } from './queryable';

const QueueEntryRowSchema = z.object({
    id: z.string(),
    patient_ref: z.string(),
    specialization_key: z.string(),
    priority: z.nativeEnum(Priority),
    state: z.nativeEnum(EntryState),
    joined_at: z.coerce.date(),
    served_at: z.coerce.date().nullable(),
    removed_at: z.coerce.date().nullable(),
    removal_reason: z.string().nullable()
});

type QueueEntryRow = z.infer<typeof QueueEntryRowSchema>;

const SELECT_COLUMNS = `
    id, patient_ref, specialization_key, priority, state,
    joined_at, served_at, removed_at, removal_reason
`;

function toEntry(row: QueueEntryRow): QueueEntry {
    return {
        id: row.id,
        patientRef: row.patient_ref,
        specializationKey: row.specialization_key,
        priority: row.priority,
        state: row.state,
        joinedAt: row.joined_at,
        servedAt: row.served_at,
        removedAt: row.removed_at,
        removalReason: row.removal_reason
    };
}

/**
 * PostgreSQL PersistenceAdapter over the queue_entries table (db/schema.sql)
 *
 * Rows are never deleted: SERVED and REMOVED entries stay for reporting.
 */
export class PostgresQueueStore implements PersistenceAdapter {
    constructor(private readonly db: Queryable) {}

    async loadActiveEntries(): Promise<QueueEntry[]> {
        const result = await this.db.query(
            `SELECT ${SELECT_COLUMNS}
             FROM queue_entries
             WHERE state = $1
             ORDER BY specialization_key, joined_at ASC`,
            [EntryState.WAITING]
        );

        return result.rows.map(row => toEntry(QueueEntryRowSchema.parse(row)));
    }

    async loadServedEntries(): Promise<QueueEntry[]> {
        const result = await this.db.query(
            `SELECT ${SELECT_COLUMNS}
             FROM queue_entries
             WHERE state = $1
             ORDER BY served_at ASC`,
            [EntryState.SERVED]
        );

        return result.rows.map(row => toEntry(QueueEntryRowSchema.parse(row)));
    }

    async save(entry: QueueEntry): Promise<void> {
        await this.db.query(
            `INSERT INTO queue_entries
                (id, patient_ref, specialization_key, priority, state,
                 joined_at, served_at, removed_at, removal_reason)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
            [
                entry.id,
                entry.patientRef,
                entry.specializationKey,
                entry.priority,
                entry.state,
                entry.joinedAt,
                entry.servedAt,
                entry.removedAt,
                entry.removalReason
            ]
        );
    }

    async updateState(entry: QueueEntry): Promise<void> {
        const result = await this.db.query(
            `UPDATE queue_entries
             SET priority = $2, state = $3, served_at = $4, removed_at = $5, removal_reason = $6
             WHERE id = $1`,
            [entry.id, entry.priority, entry.state, entry.servedAt, entry.removedAt, entry.removalReason]
        );

        if (result.rowCount === 0) {
            throw new Error(`Queue entry ${entry.id} not stored`);
        }
    }
}
