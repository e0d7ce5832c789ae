// src/server.ts

import { Pool } from 'pg';
import { createApp } from './app';
import { loadConfig } from './config';
import { QueueManager } from './engine/queueManager';
import { WaitTimeEstimator } from './engine/waitTimeEstimator';
import { logger } from './logger';
import { InMemoryQueueStore } from './persistence/inMemoryQueueStore';
import { PersistenceAdapter } from './persistence/persistenceAdapter';
import { PostgresQueueStore } from './persistence/postgresQueueStore';
import { InMemoryDirectory } from './providers/inMemoryDirectory';
import { PostgresDirectory } from './providers/postgresDirectory';
import { PatientProvider, SpecializationProvider } from './providers/types';
import seed from './data/seed.json';

interface Collaborators {
    directory: SpecializationProvider & PatientProvider;
    persistence: PersistenceAdapter;
    close: () => Promise<void>;
}

function buildCollaborators(databaseUrl: string | undefined): Collaborators {
    if (databaseUrl) {
        const pool = new Pool({ connectionString: databaseUrl });
        pool.on('error', err => logger.error({ err }, 'Idle PostgreSQL client error'));
        return {
            directory: new PostgresDirectory(pool),
            persistence: new PostgresQueueStore(pool),
            close: () => pool.end()
        };
    }

    logger.warn('DATABASE_URL not set; using in-memory stores seeded from src/data/seed.json');
    return {
        directory: new InMemoryDirectory(seed),
        persistence: new InMemoryQueueStore(),
        close: async () => undefined
    };
}

async function main(): Promise<void> {
    const config = loadConfig();
    const collaborators = buildCollaborators(config.databaseUrl);

    const queueManager = new QueueManager({
        specializations: collaborators.directory,
        patients: collaborators.directory,
        persistence: collaborators.persistence,
        estimator: new WaitTimeEstimator(config.estimator),
        persistenceTimeoutMs: config.persistenceTimeoutMs
    });
    await queueManager.initialize();

    const app = createApp({ queueManager });
    const server = app.listen(config.port, config.host, () => {
        logger.info({ port: config.port, host: config.host }, 'Front-desk queue engine listening');
    });

    const shutdown = (signal: string): void => {
        logger.info({ signal }, 'Shutting down');
        server.close(() => {
            queueManager.drain()
                .then(() => collaborators.close())
                .then(() => process.exit(0))
                .catch(err => {
                    logger.error({ err }, 'Error closing storage');
                    process.exit(1);
                });
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(err => {
    logger.fatal({ err }, 'Failed to start');
    process.exit(1);
});
