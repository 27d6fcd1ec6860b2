/**
 * Import Driver
 *
 * Walks the rows of an import table and, for each one, fetches the
 * resource, diffs the row against it and sends the net change as one
 * SPARQL Update. Rows are processed one at a time; a row that fails is
 * logged and counted, and the run continues with the next row.
 */

import { buildLookupIndex } from './index-builder.js';
import { diffRow } from './diff.js';
import { isLdSyncError, MissingColumnError, MissingValueError, TermConversionError } from './errors.js';
import { Logger, createRunLogger, silentLogger } from './logger.js';
import { COLUMN_INDEX, COLUMN_URI } from './namespaces.js';
import { Repository } from './repository.js';
import { Resource } from './resource.js';
import { buildSparqlUpdate } from './sparql.js';
import { isAbsoluteIri } from './terms.js';
import {
    ImportReport,
    ModelDescriptor,
    RowOutcome,
    RowState,
    Table,
    TableRow,
} from './types.js';

export interface ImportOptions {
    model: ModelDescriptor;
    /** Stop after this many rows */
    limit?: number;
    logger?: Logger;
    /** Name of the input, used in log lines */
    source?: string;
    /** Called once per row, after the row has resolved */
    onRow?: (outcome: RowOutcome) => void;
}

export class ImportJob {
    private readonly logger: Logger;
    private readonly source: string;

    constructor(
        private readonly repository: Repository,
        private readonly options: ImportOptions
    ) {
        this.source = options.source ?? 'input';
        this.logger = createRunLogger(options.logger ?? silentLogger, {
            model: options.model.name,
            source: this.source,
        });
    }

    async run(table: Table): Promise<ImportReport> {
        if (!table.headers.includes(COLUMN_URI)) {
            throw new MissingColumnError(COLUMN_URI);
        }
        this.checkHeaders(table.headers);

        const { limit, onRow } = this.options;
        const report: ImportReport = { rows: 0, updated: 0, unchanged: 0, failed: 0, failures: [] };

        for (const [offset, row] of table.rows.entries()) {
            if (limit !== undefined && offset >= limit) {
                this.logger.info(`Stopping after ${limit} rows`);
                break;
            }

            const outcome = await this.processRow(row);

            report.rows += 1;
            if (outcome.state === 'updated') report.updated += 1;
            else if (outcome.state === 'unchanged') report.unchanged += 1;
            else {
                report.failed += 1;
                if (outcome.error) report.failures.push(outcome.error);
            }
            onRow?.(outcome);
        }

        this.logger.info(`${report.unchanged} of ${report.rows} items remained unchanged`);
        this.logger.info(`Updated ${report.updated} of ${report.rows} items`);
        if (report.failed > 0) {
            this.logger.warn(`Failed to update ${report.failed} of ${report.rows} items`);
        }
        return report;
    }

    /**
     * Fetch, index, diff and (if anything changed) update one row.
     * Errors of the LdSyncError family become a failed outcome; any
     * other error propagates.
     */
    async processRow(row: TableRow): Promise<RowOutcome> {
        const uri = (row.values[COLUMN_URI] ?? '').trim();
        const rowLogger = this.logger.child({ line: row.line, uri });
        let state: RowState = 'read';

        rowLogger.debug(`Processing ${this.source}:${row.line}`);
        try {
            if (uri.length === 0) {
                throw new MissingValueError(COLUMN_URI);
            }
            if (!isAbsoluteIri(uri)) {
                throw new TermConversionError(uri, 'a resource URI');
            }

            const graph = await this.repository.getGraph(uri);
            const resource = Resource.fromGraph(this.options.model, graph, uri);
            state = 'fetched';
            if (!resource.matchesModelTypes()) {
                rowLogger.warn(`${resource} has none of the types ${resource.model.types.join(', ')}`);
            }

            const index = buildLookupIndex(resource, row.values[COLUMN_INDEX] ?? '');
            state = 'indexed';

            const { diff, cancelled } = diffRow(resource, row.values, index);
            state = 'diffed';
            if (cancelled > 0) {
                rowLogger.debug(`Cancelled ${cancelled} triples deleted and re-inserted`);
            }

            const { deletions, insertions } = diff.delta.size;
            if (diff.delta.isEmpty()) {
                diff.commit();
                rowLogger.info(`No changes found for "${resource}"`);
                return { line: row.line, uri, state: 'unchanged', deletions, insertions };
            }

            const update = buildSparqlUpdate(diff.delta);
            rowLogger.info(`Sending update for ${resource}`);
            rowLogger.debug(update);
            await this.repository.patch(uri, update);
            diff.commit();

            return { line: row.line, uri, state: 'updated', deletions, insertions };
        } catch (error) {
            if (!isLdSyncError(error)) {
                throw error;
            }
            rowLogger.error(
                { code: error.code, state },
                `${this.source}:${row.line} failed: ${error.message}`
            );
            return {
                line: row.line,
                uri,
                state: 'failed',
                deletions: 0,
                insertions: 0,
                error: { line: row.line, uri, code: error.code, message: error.message },
            };
        }
    }

    private checkHeaders(headers: string[]): void {
        const present = new Set(headers);
        for (const header of this.options.model.headerMap.keys()) {
            if (!present.has(header)) {
                this.logger.warn(`Column "${header}" is not in ${this.source}; it will not be updated`);
            }
        }
        for (const header of headers) {
            if (header !== COLUMN_URI && header !== COLUMN_INDEX && !this.options.model.headerMap.has(header)) {
                this.logger.debug(`Ignoring column "${header}"`);
            }
        }
    }
}

/**
 * Import every row of a table.
 */
export function importRows(
    repository: Repository,
    table: Table,
    options: ImportOptions
): Promise<ImportReport> {
    return new ImportJob(repository, options).run(table);
}
