/**
 * In-process repository backed by an n3 Store.
 *
 * Applies the updates it receives to its store, so an import run against
 * it can be checked by reading the graph back.
 */

import type * as RDF from '@rdfjs/types';
import { DataFactory, Parser, Store } from 'n3';
import { RepositoryError } from './errors.js';
import { Repository } from './repository.js';
import { parseSparqlUpdate } from './sparql.js';

export interface PatchRecord {
    uri: string;
    update: string;
}

export class MemoryRepository implements Repository {
    readonly store: Store;
    /** URIs fetched, in order */
    readonly fetched: string[] = [];
    /** Updates applied, in order */
    readonly patches: PatchRecord[] = [];

    constructor(quads: RDF.Quad[] = []) {
        this.store = new Store(quads);
    }

    static fromNTriples(text: string): MemoryRepository {
        return new MemoryRepository(new Parser({ format: 'N-Triples' }).parse(text));
    }

    /**
     * Quads about the resource and about the objects under it: subjects
     * equal to the URI or starting with `<uri>#` or `<uri>/`.
     */
    async getGraph(uri: string): Promise<RDF.Quad[]> {
        this.fetched.push(uri);
        const quads = this.store
            .getQuads(null, null, null, null)
            .filter((quad) => belongsTo(quad.subject.value, uri));
        if (quads.length === 0) {
            throw new RepositoryError(`Resource <${uri}> not found`, uri, 404);
        }
        return quads;
    }

    async patch(uri: string, update: string): Promise<void> {
        const { deletions, insertions } = parseSparqlUpdate(update);
        this.store.removeQuads(deletions);
        this.store.addQuads(insertions);
        this.patches.push({ uri, update });
    }

    /** Objects of a subject/predicate pair, as canonical strings. */
    valuesOf(subject: string, predicate: string): string[] {
        return this.store
            .getObjects(DataFactory.namedNode(subject), DataFactory.namedNode(predicate), null)
            .map((term) => term.value);
    }
}

function belongsTo(subject: string, uri: string): boolean {
    return subject === uri || subject.startsWith(`${uri}#`) || subject.startsWith(`${uri}/`);
}
