/**
 * In-memory view of a repository resource.
 *
 * A Resource is built from the graph fetched for one row. Its properties
 * hold the current values as terms; the diff engine reads them and, once
 * a row has been applied, replaces them with the row's values.
 */

import type * as RDF from '@rdfjs/types';
import { DataFactory, Store } from 'n3';
import { RDF_TYPE } from './namespaces.js';
import { fromRdfTerm, toNTriplesTerm } from './terms.js';
import { ModelDescriptor, PropertyDefinition, Term } from './types.js';

const { namedNode } = DataFactory;

// ── Property ──────────────────────────────────────────────────────

export class Property {
    private terms: Term[] = [];

    constructor(readonly definition: PropertyDefinition, terms: Iterable<Term> = []) {
        this.terms = this.dedupe(terms);
    }

    get name(): string {
        return this.definition.name;
    }

    get predicate(): string {
        return this.definition.predicate;
    }

    get values(): readonly Term[] {
        return this.terms;
    }

    /** Distinct canonical strings of the current values, in order. */
    strings(): string[] {
        return [...new Set(this.terms.map((term) => this.definition.codec.stringify(term)))];
    }

    toTerm(value: string): Term {
        return this.definition.codec.toTerm(value);
    }

    /**
     * Replace the values. Terms sharing a canonical string but differing in
     * language tag or datatype are all kept; exact duplicates are dropped.
     */
    replaceTerms(terms: Iterable<Term>): void {
        this.terms = this.dedupe(terms);
    }

    private dedupe(terms: Iterable<Term>): Term[] {
        const seen = new Set<string>();
        const result: Term[] = [];
        for (const term of terms) {
            const key = toNTriplesTerm(term);
            if (!seen.has(key)) {
                seen.add(key);
                result.push(term);
            }
        }
        return result;
    }
}

// ── Embedded objects ──────────────────────────────────────────────

export class EmbeddedObject {
    constructor(
        readonly uri: string,
        readonly properties: Map<string, Property>
    ) {}

    property(name: string): Property | undefined {
        return this.properties.get(name);
    }
}

// ── Resource ──────────────────────────────────────────────────────

function readProperty(store: Store, subject: string, definition: PropertyDefinition): Property {
    const terms: Term[] = [];
    for (const object of store.getObjects(namedNode(subject), namedNode(definition.predicate), null)) {
        const term = fromRdfTerm(object);
        if (term) terms.push(term);
    }
    return new Property(definition, terms);
}

function readProperties(
    store: Store,
    subject: string,
    definitions: Map<string, PropertyDefinition>
): Map<string, Property> {
    const properties = new Map<string, Property>();
    for (const [name, definition] of definitions) {
        properties.set(name, readProperty(store, subject, definition));
    }
    return properties;
}

export class Resource {
    constructor(
        readonly uri: string,
        readonly model: ModelDescriptor,
        readonly properties: Map<string, Property>,
        /** Embedded attribute → embedded object URI → object */
        readonly embedded: Map<string, Map<string, EmbeddedObject>>,
        /** rdf:type values found in the graph */
        readonly types: string[] = []
    ) {}

    /**
     * Build a resource from the quads of its fetched graph. Embedded
     * objects are read from the same graph.
     */
    static fromGraph(model: ModelDescriptor, quads: Iterable<RDF.Quad>, uri: string): Resource {
        const store = new Store([...quads]);
        const properties = readProperties(store, uri, model.properties);

        const embedded = new Map<string, Map<string, EmbeddedObject>>();
        for (const [name, definition] of model.embedded) {
            const objects = new Map<string, EmbeddedObject>();
            for (const object of store.getObjects(namedNode(uri), namedNode(definition.predicate), null)) {
                if (object.termType !== 'NamedNode' || objects.has(object.value)) continue;
                objects.set(
                    object.value,
                    new EmbeddedObject(object.value, readProperties(store, object.value, definition.properties))
                );
            }
            embedded.set(name, objects);
        }

        const types = store
            .getObjects(namedNode(uri), namedNode(RDF_TYPE), null)
            .filter((term) => term.termType === 'NamedNode')
            .map((term) => term.value);

        return new Resource(uri, model, properties, embedded, types);
    }

    property(name: string): Property | undefined {
        return this.properties.get(name);
    }

    /** Whether the graph types the resource as the model expects; untyped models match anything. */
    matchesModelTypes(): boolean {
        return this.model.types.length === 0 || this.model.types.some((type) => this.types.includes(type));
    }

    embeddedObject(attribute: string, uri: string): EmbeddedObject | undefined {
        return this.embedded.get(attribute)?.get(uri);
    }

    toString(): string {
        return `${this.model.name} <${this.uri}>`;
    }
}
