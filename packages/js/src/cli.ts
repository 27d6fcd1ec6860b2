#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 *   ldsync import --model <name> [--limit N] [--delimiter C] <filename>
 *   ldsync models
 *
 * Exit codes: 0 when every row succeeded, 1 when some rows failed,
 * 2 for usage and configuration errors.
 */

import { parseArgs } from 'util';
import pino from 'pino';
import { ZodError } from 'zod';
import { LdSyncClient } from './client.js';
import { loadConfig, loadDotenv } from './config.js';
import { isLdSyncError } from './errors.js';
import { HttpRepository } from './http-repository.js';
import { Logger, createLogger } from './logger.js';
import { ModelRegistry, createDefaultRegistry } from './registry.js';
import { Repository } from './repository.js';
import { formatIssues } from './schemas.js';

export const USAGE = [
    'Usage:',
    '  ldsync import --model <name> [--limit N] [--delimiter C] <filename>',
    '  ldsync models',
].join('\n');

export interface CliDependencies {
    /** Environment to read configuration from; `.env` is only loaded when absent */
    env?: NodeJS.ProcessEnv;
    repository?: Repository;
    registry?: ModelRegistry;
    logger?: Logger;
    stdout?: (line: string) => void;
    stderr?: (line: string) => void;
}

export async function main(
    argv: string[] = process.argv.slice(2),
    deps: CliDependencies = {}
): Promise<number> {
    const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
    const stderr = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));
    const registry = deps.registry ?? createDefaultRegistry();
    const [command, ...rest] = argv;

    if (command === 'models') {
        for (const name of registry.names()) stdout(name);
        return 0;
    }
    if (command !== 'import') {
        stderr(USAGE);
        return 2;
    }

    let values: { model?: string; limit?: string; delimiter?: string };
    let positionals: string[];
    try {
        ({ values, positionals } = parseArgs({
            args: rest,
            options: {
                model: { type: 'string', short: 'm' },
                limit: { type: 'string', short: 'l' },
                delimiter: { type: 'string', short: 'd' },
            },
            allowPositionals: true,
        }));
    } catch (error) {
        stderr(`${error instanceof Error ? error.message : String(error)}\n${USAGE}`);
        return 2;
    }

    if (!values.model || positionals.length !== 1) {
        stderr(USAGE);
        return 2;
    }
    const [filename] = positionals;

    try {
        if (!deps.env) loadDotenv();
        const config = loadConfig(deps.env ?? process.env);
        const logger = deps.logger ?? createLogger({ level: config.logLevel, destination: pino.destination(2) });
        const repository = deps.repository ?? new HttpRepository({
            timeout: config.httpTimeout,
            format: config.graphFormat,
        });

        const client = new LdSyncClient({ repository, registry, logger });
        const report = await client.importFile(filename, {
            model: values.model,
            limit: values.limit === undefined ? undefined : Number(values.limit),
            delimiter: values.delimiter ?? config.delimiter,
        });

        stdout(
            `Updated ${report.updated} of ${report.rows} items; ` +
            `${report.unchanged} unchanged; ${report.failed} failed`
        );
        for (const failure of report.failures) {
            stdout(`  ${filename}:${failure.line} <${failure.uri}> ${failure.code}: ${failure.message}`);
        }
        return report.failed > 0 ? 1 : 0;
    } catch (error) {
        if (error instanceof ZodError) {
            stderr(`Invalid arguments: ${formatIssues(error)}`);
            return 2;
        }
        if (isLdSyncError(error)) {
            stderr(error.message);
            return 2;
        }
        throw error;
    }
}

if (require.main === module) {
    main().then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            console.error(error);
            process.exitCode = 2;
        }
    );
}
