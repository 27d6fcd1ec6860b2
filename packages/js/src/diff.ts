/**
 * Property Diff Engine
 *
 * Compares the values a resource currently holds against the values of
 * an edited row and records the triples to delete and insert. Changes to
 * the in-memory resource are staged in a RowDiff, so that later columns
 * see what earlier columns changed, and only applied by `commit()`. A row
 * that fails part-way leaves the resource as it was.
 */

import { DeltaGraph } from './delta.js';
import { IndexOverflowError } from './errors.js';
import { LookupIndex } from './index-builder.js';
import { propertyForPath } from './models.js';
import { VALUE_SEPARATOR } from './namespaces.js';
import { Property, Resource } from './resource.js';
import { AttributePath, PropertyDefinition, Term, TermCodec } from './types.js';

/**
 * Split a cell into its values. Entries that are empty or whitespace
 * only are dropped; the others are kept as written.
 */
export function splitCell(text: string): string[] {
    return text.split(VALUE_SEPARATOR).filter((value) => value.trim().length > 0);
}

function unique(values: readonly string[]): string[] {
    return [...new Set(values)];
}

/** Every held term whose canonical string is `value`. */
function termsFor(terms: readonly Term[], codec: TermCodec, value: string): Term[] {
    return terms.filter((term) => codec.stringify(term) === value);
}

// ── Row diff ──────────────────────────────────────────────────────

export class RowDiff {
    readonly delta = new DeltaGraph();
    private readonly staged = new Map<Property, Term[]>();

    /** Values of a property as the row has left them so far. */
    valuesOf(property: Property): readonly Term[] {
        return this.staged.get(property) ?? property.values;
    }

    /**
     * Record the values a property holds once the row is applied. Values
     * already held keep every existing term; new ones go through the codec.
     */
    stage(property: Property, values: readonly string[]): void {
        const current = this.valuesOf(property);
        const codec = property.definition.codec;
        this.staged.set(
            property,
            unique(values).flatMap((value) => {
                const held = termsFor(current, codec, value);
                return held.length > 0 ? held : [codec.toTerm(value)];
            })
        );
    }

    /** Apply the staged values to the in-memory resource. */
    commit(): void {
        for (const [property, terms] of this.staged) {
            property.replaceTerms(terms);
        }
        this.staged.clear();
    }
}

// ── Direct properties ─────────────────────────────────────────────

/**
 * Diff a property held directly by the resource. Values removed from the
 * cell are deleted with every term the resource holds for them; values
 * added go through the property's codec.
 */
export function diffDirect(
    resource: Resource,
    property: Property,
    newValues: readonly string[],
    rowDiff: RowDiff
): void {
    const codec = property.definition.codec;
    const current = rowDiff.valuesOf(property);
    const oldSet = new Set(current.map((term) => codec.stringify(term)));
    const newSet = new Set(newValues);

    for (const value of oldSet) {
        if (newSet.has(value)) continue;
        for (const term of termsFor(current, codec, value)) {
            rowDiff.delta.delete({ subject: resource.uri, predicate: property.predicate, object: term });
        }
    }
    for (const value of newSet) {
        if (oldSet.has(value)) continue;
        rowDiff.delta.insert({
            subject: resource.uri,
            predicate: property.predicate,
            object: codec.toTerm(value),
        });
    }

    rowDiff.stage(property, newValues);
}

// ── Embedded properties ───────────────────────────────────────────

/**
 * Diff an embedded property (`outer.inner`). Position `i` of the cell
 * updates the embedded object the index holds at position `i`. Columns
 * whose outer attribute is not in the index are left alone.
 */
export function diffEmbedded(
    index: LookupIndex,
    path: Required<AttributePath>,
    definition: PropertyDefinition,
    newValues: readonly string[],
    rowDiff: RowDiff
): void {
    const positions = index.get(path.outer);
    if (!positions) return;

    newValues.forEach((newValue, position) => {
        const object = positions.get(position);
        if (!object) {
            throw new IndexOverflowError(path.outer, position);
        }

        let property = object.property(path.inner);
        if (!property) {
            property = new Property(definition);
            object.properties.set(path.inner, property);
        }
        const held = rowDiff.valuesOf(property);
        const oldTerm: Term | undefined = held[0];
        if (oldTerm !== undefined && definition.codec.stringify(oldTerm) === newValue) return;

        const newTerm = definition.codec.toTerm(newValue);
        for (const term of held) {
            rowDiff.delta.delete({ subject: object.uri, predicate: definition.predicate, object: term });
        }
        rowDiff.delta.insert({ subject: object.uri, predicate: definition.predicate, object: newTerm });
        rowDiff.stage(property, [newValue]);
    });
}

// ── Whole rows ────────────────────────────────────────────────────

export interface DiffRowResult {
    diff: RowDiff;
    /** Triples removed from both sides by cancellation */
    cancelled: number;
}

/**
 * Diff every mapped column of a row against the resource, then cancel
 * triples that are both deleted and inserted.
 */
export function diffRow(
    resource: Resource,
    values: Record<string, string>,
    index: LookupIndex
): DiffRowResult {
    const diff = new RowDiff();

    for (const [header, path] of resource.model.headerMap) {
        const cell = values[header];
        if (cell === undefined) continue;
        const newValues = splitCell(cell);
        const definition = propertyForPath(resource.model, path);

        if (path.inner === undefined) {
            let property = resource.property(path.outer);
            if (!property) {
                property = new Property(definition);
                resource.properties.set(path.outer, property);
            }
            diffDirect(resource, property, newValues, diff);
        } else {
            diffEmbedded(index, { outer: path.outer, inner: path.inner }, definition, newValues, diff);
        }
    }

    const cancelled = diff.delta.cancel();
    return { diff, cancelled };
}
