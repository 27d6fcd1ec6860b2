/**
 * Repository collaborator.
 *
 * The import driver reads each resource's current graph and sends one
 * update per changed row through this interface.
 */

import type * as RDF from '@rdfjs/types';

export interface Repository {
    /** Fetch the graph describing a resource, embedded objects included. */
    getGraph(uri: string): Promise<RDF.Quad[]>;
    /**
     * Apply a SPARQL Update to a resource.
     * Rejects with a RepositoryError if the repository refuses it.
     */
    patch(uri: string, update: string): Promise<void>;
}

export type GraphFormat = 'n-triples' | 'json-ld';

export const GRAPH_MEDIA_TYPES: Record<GraphFormat, string> = {
    'n-triples': 'application/n-triples',
    'json-ld': 'application/ld+json',
};
