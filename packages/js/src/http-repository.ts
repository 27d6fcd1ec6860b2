/**
 * HTTP repository client.
 *
 * Reads resource graphs with GET (N-Triples, or JSON-LD converted to
 * N-Quads through jsonld.js) and applies updates with PATCH and a
 * SPARQL Update body, as linked-data platform servers accept them.
 */

import type * as RDF from '@rdfjs/types';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import * as jsonld from 'jsonld';
import { Parser } from 'n3';
import { RepositoryError } from './errors.js';
import { GRAPH_MEDIA_TYPES, GraphFormat, Repository } from './repository.js';
import { SPARQL_UPDATE_MEDIA_TYPE } from './sparql.js';

export interface HttpRepositoryOptions {
    /** Preconfigured client; one is created from `timeout` when absent */
    client?: AxiosInstance;
    /** Request timeout in milliseconds (default: 30000) */
    timeout?: number;
    /** Representation requested when fetching graphs (default: n-triples) */
    format?: GraphFormat;
}

type JsonLdInput = Parameters<typeof jsonld.toRDF>[0];

function isJsonLdInput(value: unknown): value is JsonLdInput {
    return typeof value === 'object' && value !== null;
}

function describeFailure(error: unknown): { message: string; status?: number } {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        return {
            message: status !== undefined ? `HTTP ${status}` : error.message,
            status,
        };
    }
    return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * Parse a fetched representation into quads.
 */
export async function parseGraph(body: string, format: GraphFormat, uri: string): Promise<RDF.Quad[]> {
    try {
        if (format === 'n-triples') {
            return new Parser({ format: 'N-Triples' }).parse(body);
        }

        const document: unknown = JSON.parse(body);
        if (!isJsonLdInput(document)) {
            throw new Error('JSON-LD body is not an object or array');
        }
        const nquads = await jsonld.toRDF(document, { format: 'application/n-quads', base: uri });
        if (typeof nquads !== 'string') {
            throw new Error('jsonld.toRDF did not return N-Quads');
        }
        return new Parser({ format: 'N-Quads' }).parse(nquads);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new RepositoryError(`Cannot parse graph of <${uri}>: ${reason}`, uri, undefined, { cause: error });
    }
}

export class HttpRepository implements Repository {
    private readonly client: AxiosInstance;
    private readonly format: GraphFormat;

    constructor(options: HttpRepositoryOptions = {}) {
        this.client = options.client ?? axios.create({ timeout: options.timeout ?? 30_000 });
        this.format = options.format ?? 'n-triples';
    }

    async getGraph(uri: string): Promise<RDF.Quad[]> {
        let body: string;
        try {
            const response = await this.client.get<string>(uri, {
                headers: { Accept: GRAPH_MEDIA_TYPES[this.format] },
                responseType: 'text',
            });
            body = response.data;
        } catch (error) {
            const { message, status } = describeFailure(error);
            throw new RepositoryError(`Cannot fetch <${uri}>: ${message}`, uri, status, { cause: error });
        }
        return parseGraph(body, this.format, uri);
    }

    async patch(uri: string, update: string): Promise<void> {
        try {
            await this.client.patch(uri, update, {
                headers: { 'Content-Type': SPARQL_UPDATE_MEDIA_TYPE },
            });
        } catch (error) {
            const { message, status } = describeFailure(error);
            throw new RepositoryError(`Cannot update <${uri}>: ${message}`, uri, status, { cause: error });
        }
    }
}
