// src/errors.ts

/**
 * Queue error taxonomy
 *
 * Every failure the engine reports is an AppError carrying a stable code and
 * the HTTP status the route layer answers with. Validation-class errors are
 * raised before any mutation; PersistenceError only after rollback.
 */

export interface SafeErrorDetails {
    code: string;
    message: string;
    statusCode: number;
}

export class AppError extends Error {
    public readonly code: string;
    public readonly statusCode: number;

    constructor(message: string, code: string, statusCode = 500) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.statusCode = statusCode;
        Error.captureStackTrace(this, this.constructor);
    }

    toSafeError(): SafeErrorDetails {
        return {
            code: this.code,
            message: this.message,
            statusCode: this.statusCode
        };
    }
}

/**
 * Unknown specialization, unknown patient, malformed input
 */
export class ValidationError extends AppError {
    public readonly details: unknown;

    constructor(message: string, details?: unknown) {
        super(message, 'VALIDATION_ERROR', 400);
        this.name = 'ValidationError';
        this.details = details;
    }
}

/**
 * Patient already waiting in this specialization's queue
 */
export class DuplicateEntryError extends AppError {
    constructor(patientRef: string, specializationKey: string, public readonly existingEntryId: string) {
        super(
            `Patient ${patientRef} is already waiting in the ${specializationKey} queue`,
            'DUPLICATE_ENTRY',
            409
        );
        this.name = 'DuplicateEntryError';
    }
}

export class InactiveSpecializationError extends AppError {
    constructor(specializationKey: string) {
        super(`Specialization ${specializationKey} is not accepting patients`, 'INACTIVE_SPECIALIZATION', 409);
        this.name = 'InactiveSpecializationError';
    }
}

export class CapacityExceededError extends AppError {
    constructor(specializationKey: string, public readonly capacity: number) {
        super(
            `Queue for ${specializationKey} is at maximum capacity (${capacity})`,
            'CAPACITY_EXCEEDED',
            409
        );
        this.name = 'CapacityExceededError';
    }
}

export class EmptyQueueError extends AppError {
    constructor(specializationKey: string) {
        super(`No patients waiting for ${specializationKey}`, 'EMPTY_QUEUE', 404);
        this.name = 'EmptyQueueError';
    }
}

/**
 * Entry is absent, or already SERVED / REMOVED
 */
export class EntryNotFoundError extends AppError {
    constructor(entryId: string) {
        super(`No waiting queue entry with id ${entryId}`, 'ENTRY_NOT_FOUND', 404);
        this.name = 'EntryNotFoundError';
    }
}

/**
 * Durable write failed or timed out; the in-memory mutation has been rolled back
 */
export class PersistenceError extends AppError {
    public readonly operation: string;
    public readonly originalError: unknown;

    constructor(operation: string, message: string, originalError?: unknown) {
        super(`Persistence ${operation} failed: ${message}`, 'PERSISTENCE_ERROR', 503);
        this.name = 'PersistenceError';
        this.operation = operation;
        this.originalError = originalError;
    }
}
