// src/routes/schemas.ts

import { z } from 'zod';
import { ValidationError } from '../errors';
import { Priority } from '../models/QueueEntry';

export const AddToQueueBodySchema = z.object({
    patientRef: z.string().trim().min(1, 'patientRef is required'),
    priority: z.nativeEnum(Priority).default(Priority.NORMAL)
});

export const RemoveEntryBodySchema = z.object({
    reason: z.string().trim().min(1).max(500).nullable().default(null)
});

export const ReprioritizeBodySchema = z.object({
    priority: z.nativeEnum(Priority)
});

/**
 * Parse a request body, turning zod issues into a ValidationError
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) {
        const message = parsed.error.issues
            .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        throw new ValidationError(message, parsed.error.issues);
    }
    return parsed.data;
}
