// src/persistence/queryable.ts

/**
 * The slice of pg's Pool / Client the adapters use
 * Rows come back untyped and are validated with zod before use.
 */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}
