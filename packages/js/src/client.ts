/**
 * High-level Client API for ldsync.
 *
 * Ties the registry, the tabular reader and the import driver together
 * behind a validated interface.
 */

import { buildLookupIndex } from './index-builder.js';
import { diffRow } from './diff.js';
import { DeltaGraph } from './delta.js';
import { ImportJob } from './import.js';
import { Logger, silentLogger } from './logger.js';
import { COLUMN_INDEX } from './namespaces.js';
import { ModelRegistry, createDefaultRegistry } from './registry.js';
import { Repository } from './repository.js';
import { Resource } from './resource.js';
import { ImportOptionsInput, ImportOptionsSchema, validate } from './schemas.js';
import { buildSparqlUpdate } from './sparql.js';
import { readTable } from './table.js';
import { ImportReport, RowOutcome, Table } from './types.js';

export interface LdSyncClientOptions {
    repository: Repository;
    /** Models available to imports (default: the built-in models) */
    registry?: ModelRegistry;
    logger?: Logger;
}

export interface ClientImportOptions extends ImportOptionsInput {
    onRow?: (outcome: RowOutcome) => void;
}

export interface RowPreview {
    resource: Resource;
    delta: DeltaGraph;
    /** The update that would be sent, or undefined when nothing changes */
    update?: string;
}

export class LdSyncClient {
    private readonly repository: Repository;
    private readonly registry: ModelRegistry;
    private readonly logger: Logger;

    constructor(options: LdSyncClientOptions) {
        this.repository = options.repository;
        this.registry = options.registry ?? createDefaultRegistry();
        this.logger = options.logger ?? silentLogger;
    }

    /** Names of the registered models. */
    public models(): string[] {
        return this.registry.names();
    }

    /**
     * Read a delimited file and import its rows.
     * schema-validated.
     */
    public async importFile(path: string, options: ClientImportOptions): Promise<ImportReport> {
        const valid = validate(ImportOptionsSchema, {
            model: options.model,
            limit: options.limit,
            delimiter: options.delimiter,
        });
        const model = this.registry.get(valid.model);
        const table = await readTable(path, valid.delimiter ?? ',');
        return new ImportJob(this.repository, {
            model,
            limit: valid.limit,
            logger: this.logger,
            source: path,
            onRow: options.onRow,
        }).run(table);
    }

    /**
     * Import rows that are already in memory.
     */
    public importTable(table: Table, options: ClientImportOptions): Promise<ImportReport> {
        const valid = validate(ImportOptionsSchema, { model: options.model, limit: options.limit });
        return new ImportJob(this.repository, {
            model: this.registry.get(valid.model),
            limit: valid.limit,
            logger: this.logger,
            onRow: options.onRow,
        }).run(table);
    }

    /**
     * Compute the change a single row would make without sending it.
     */
    public async preview(modelName: string, uri: string, values: Record<string, string>): Promise<RowPreview> {
        const model = this.registry.get(modelName);
        const resource = Resource.fromGraph(model, await this.repository.getGraph(uri), uri);
        const index = buildLookupIndex(resource, values[COLUMN_INDEX] ?? '');
        const { diff } = diffRow(resource, values, index);
        return {
            resource,
            delta: diff.delta,
            update: diff.delta.isEmpty() ? undefined : buildSparqlUpdate(diff.delta),
        };
    }
}
