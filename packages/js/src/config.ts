/**
 * Environment configuration.
 *
 * Values come from the process environment, optionally seeded from a
 * `.env` file, and are validated with Zod.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { formatIssues } from './schemas.js';

export const ConfigSchema = z.object({
    LDSYNC_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LDSYNC_HTTP_TIMEOUT: z.coerce.number().int().positive().default(30_000),
    LDSYNC_GRAPH_FORMAT: z.enum(['n-triples', 'json-ld']).default('n-triples'),
    LDSYNC_DELIMITER: z.string().length(1).default(','),
});

export interface Config {
    logLevel: z.infer<typeof ConfigSchema>['LDSYNC_LOG_LEVEL'];
    /** Repository request timeout in milliseconds */
    httpTimeout: number;
    graphFormat: z.infer<typeof ConfigSchema>['LDSYNC_GRAPH_FORMAT'];
    /** Field delimiter of import files */
    delimiter: string;
}

/** Load a `.env` file into `process.env`; variables already set win. */
export function loadDotenv(path?: string): void {
    dotenv.config(path ? { path } : undefined);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = ConfigSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, { cause: parsed.error });
    }
    return {
        logLevel: parsed.data.LDSYNC_LOG_LEVEL,
        httpTimeout: parsed.data.LDSYNC_HTTP_TIMEOUT,
        graphFormat: parsed.data.LDSYNC_GRAPH_FORMAT,
        delimiter: parsed.data.LDSYNC_DELIMITER,
    };
}
