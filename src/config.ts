// src/config.ts

import { z } from 'zod';

/**
 * Environment validation - parsed once at boot, fails fast on bad values
 */
const EnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.string().default('3000').transform(Number).pipe(z.number().int().min(0).max(65535)),
    HOST: z.string().default('0.0.0.0'),
    // Read by the logger directly
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    // Unset = in-memory stores seeded from src/data/seed.json
    DATABASE_URL: z.string().url().optional(),

    PERSISTENCE_TIMEOUT_MS: z.string().default('2000').transform(Number).pipe(z.number().int().positive()),

    // Wait-time estimation
    DEFAULT_SERVICE_MINUTES: z.string().default('15').transform(Number).pipe(z.number().positive()),
    WAIT_EMA_ALPHA: z.string().default('0.3').transform(Number).pipe(z.number().gt(0).lte(1)),
    WAIT_MIN_SAMPLES: z.string().default('3').transform(Number).pipe(z.number().int().min(1))
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
    env: Env['NODE_ENV'];
    port: number;
    host: string;
    databaseUrl: string | undefined;
    persistenceTimeoutMs: number;
    estimator: {
        defaultServiceMs: number;
        alpha: number;
        minSamples: number;
    };
}

/**
 * Parse and validate environment into application config
 *
 * @param source Environment variables (defaults to process.env)
 * @throws Error listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(source);

    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');
        throw new Error(`Invalid environment configuration:\n${issues}`);
    }

    const env = parsed.data;

    return {
        env: env.NODE_ENV,
        port: env.PORT,
        host: env.HOST,
        databaseUrl: env.DATABASE_URL,
        persistenceTimeoutMs: env.PERSISTENCE_TIMEOUT_MS,
        estimator: {
            defaultServiceMs: env.DEFAULT_SERVICE_MINUTES * 60_000,
            alpha: env.WAIT_EMA_ALPHA,
            minSamples: env.WAIT_MIN_SAMPLES
        }
    };
}
