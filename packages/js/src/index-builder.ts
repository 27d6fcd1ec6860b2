/**
 * Embedded-Object Index Builder
 *
 * Decodes a row's index descriptor (`part[0]=#p1;part[1]=#p2`) into the
 * embedded objects each position of a multi-valued embedded column
 * refers to.
 */

import { IndexParseError, LookupError } from './errors.js';
import { EmbeddedObject, Resource } from './resource.js';

/** Embedded attribute → position → embedded object */
export type LookupIndex = Map<string, Map<number, EmbeddedObject>>;

const ENTRY_KEY = /^(\w+)\[(\d+)\]$/;

export interface IndexEntry {
    attribute: string;
    position: number;
    reference: string;
}

/**
 * Parse an index descriptor without resolving it. Blank entries are
 * skipped, so an empty descriptor yields no entries.
 */
export function parseIndexDescriptor(descriptor: string): IndexEntry[] {
    const entries: IndexEntry[] = [];
    for (const rawEntry of descriptor.split(';')) {
        const entry = rawEntry.trim();
        if (entry.length === 0) continue;

        const separator = entry.indexOf('=');
        if (separator === -1) {
            throw new IndexParseError(entry, 'expected key=reference');
        }
        const key = entry.slice(0, separator).trim();
        const reference = entry.slice(separator + 1).trim();

        const match = ENTRY_KEY.exec(key);
        if (!match) {
            throw new IndexParseError(entry, `key "${key}" does not match name[position]`);
        }
        entries.push({ attribute: match[1], position: Number(match[2]), reference });
    }
    return entries;
}

/**
 * Build the lookup index for a resource. Each reference is resolved
 * against the resource URI by concatenation.
 */
export function buildLookupIndex(resource: Resource, descriptor: string): LookupIndex {
    const index: LookupIndex = new Map();

    for (const { attribute, position, reference } of parseIndexDescriptor(descriptor)) {
        if (!resource.model.embedded.has(attribute)) {
            throw new IndexParseError(
                `${attribute}[${position}]=${reference}`,
                `"${attribute}" is not an embedded attribute of ${resource.model.name}`
            );
        }

        const uri = resource.uri + reference;
        const object = resource.embeddedObject(attribute, uri);
        if (!object) {
            throw new LookupError(attribute, uri);
        }

        let positions = index.get(attribute);
        if (!positions) {
            positions = new Map();
            index.set(attribute, positions);
        }
        if (positions.has(position)) {
            throw new IndexParseError(
                `${attribute}[${position}]=${reference}`,
                'position is listed more than once'
            );
        }
        positions.set(position, object);
    }

    return index;
}
