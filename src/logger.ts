// src/logger.ts

import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured pino logger
 *
 * - JSON in production, pino-pretty in development
 * - Silent under NODE_ENV=test unless LOG_LEVEL says otherwise
 * - Patient references are censored wherever they appear in log objects
 */

export interface LoggerConfig {
    level?: string;
    serviceName?: string;
    pretty?: boolean;
}

export const REDACTION_PATHS = [
    'patientRef',
    '*.patientRef',
    'entries[*].patientRef'
];

function getDefaultLevel(): string {
    if (process.env.LOG_LEVEL) {
        return process.env.LOG_LEVEL;
    }

    switch (process.env.NODE_ENV) {
        case 'production':
            return 'info';
        case 'test':
            return 'silent';
        default:
            return 'debug';
    }
}

function isDevelopment(): boolean {
    return process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
}

export function createLogger(config: LoggerConfig = {}): Logger {
    const serviceName = config.serviceName ?? 'front-desk-queue';

    const options: LoggerOptions = {
        level: config.level ?? getDefaultLevel(),
        name: serviceName,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: serviceName,
            env: process.env.NODE_ENV ?? 'development'
        },
        formatters: {
            level: label => ({ level: label })
        },
        redact: {
            paths: REDACTION_PATHS,
            censor: '[REDACTED]'
        }
    };

    if (config.pretty ?? isDevelopment()) {
        const transport = pino.transport({
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname,service,env'
            }
        });
        return pino(options, transport);
    }

    return pino(options);
}

/**
 * Process-wide root logger; modules take children of it
 */
export const logger = createLogger();

export function moduleLogger(module: string, parent: Logger = logger): Logger {
    return parent.child({ module });
}
