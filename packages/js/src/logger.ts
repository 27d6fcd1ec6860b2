/**
 * Logging, built on pino.
 */

import pino from 'pino';
import type { DestinationStream, LevelWithSilent, Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

export type { Logger };

export interface LoggerOptions {
    level?: LevelWithSilent;
    /** Where log lines go (default: stdout) */
    destination?: DestinationStream;
}

/**
 * Create the root logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const settings = {
        level: options.level ?? 'info',
        base: { service: 'ldsync' },
        formatters: {
            level: (label: string) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    };
    return options.destination ? pino(settings, options.destination) : pino(settings);
}

/** A logger that discards everything. */
export const silentLogger: Logger = pino({ level: 'silent' });

/**
 * Child logger for one import run, tagged with a fresh run id.
 */
export function createRunLogger(logger: Logger, context: Record<string, unknown> = {}): Logger {
    return logger.child({ runId: uuidv4(), ...context });
}
