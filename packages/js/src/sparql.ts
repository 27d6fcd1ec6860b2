/**
 * Update Serializer
 *
 * Renders a row's delta as a single SPARQL Update request, and reads
 * requests of that same shape back into quads.
 */

import { Parser, Quad } from 'n3';
import { DeltaGraph } from './delta.js';
import { UpdateParseError } from './errors.js';
import { toNTriplesLine } from './terms.js';
import { Triple } from './types.js';

export const SPARQL_UPDATE_MEDIA_TYPE = 'application/sparql-update';

/** N-Triples lines for a set of triples, without a trailing newline. */
export function serializeTriples(triples: readonly Triple[]): string {
    return triples.map(toNTriplesLine).join('\n');
}

/**
 * Build `DELETE { … } INSERT { … } WHERE {}` from a delta. An empty side
 * is rendered as an empty block; callers check `delta.isEmpty()` before
 * sending anything.
 *
 * @example
 * ```ts
 * buildSparqlUpdate(delta);
 * // DELETE {  } INSERT { <http://example.org/1> <http://purl.org/dc/terms/title> "B" . } WHERE {}
 * ```
 */
export function buildSparqlUpdate(delta: DeltaGraph): string {
    const deletes = serializeTriples(delta.deletions);
    const inserts = serializeTriples(delta.insertions);
    return `DELETE { ${deletes} } INSERT { ${inserts} } WHERE {}`;
}

// ── Parsing ───────────────────────────────────────────────────────

export interface ParsedUpdate {
    deletions: Quad[];
    insertions: Quad[];
}

function skipWhitespace(text: string, position: number): number {
    while (position < text.length && /\s/.test(text[position])) position += 1;
    return position;
}

function expectKeyword(text: string, position: number, keyword: string): number {
    const start = skipWhitespace(text, position);
    if (text.slice(start, start + keyword.length).toUpperCase() !== keyword) {
        throw new UpdateParseError(`Expected ${keyword} at offset ${start}`);
    }
    return start + keyword.length;
}

/**
 * Read a `{ … }` block starting at `position`, skipping over braces that
 * appear inside quoted literals and IRIs. Returns the block's content and
 * the offset just past its closing brace.
 */
function readBlock(text: string, position: number): [string, number] {
    const open = skipWhitespace(text, position);
    if (text[open] !== '{') {
        throw new UpdateParseError(`Expected "{" at offset ${open}`);
    }

    let inLiteral = false;
    let inIri = false;
    for (let i = open + 1; i < text.length; i += 1) {
        const ch = text[i];
        if (inLiteral) {
            if (ch === '\\') i += 1;
            else if (ch === '"') inLiteral = false;
        } else if (inIri) {
            if (ch === '>') inIri = false;
        } else if (ch === '"') {
            inLiteral = true;
        } else if (ch === '<') {
            inIri = true;
        } else if (ch === '}') {
            return [text.slice(open + 1, i), i + 1];
        }
    }
    throw new UpdateParseError('Unterminated block');
}

function parseTriples(block: string): Quad[] {
    try {
        return new Parser({ format: 'N-Triples' }).parse(block);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new UpdateParseError(`Invalid triples in update: ${reason}`, { cause: error });
    }
}

/**
 * Parse an update produced by `buildSparqlUpdate`. Other update forms are
 * rejected with an UpdateParseError.
 */
export function parseSparqlUpdate(update: string): ParsedUpdate {
    let position = expectKeyword(update, 0, 'DELETE');
    const [deletes, afterDelete] = readBlock(update, position);
    position = expectKeyword(update, afterDelete, 'INSERT');
    const [inserts, afterInsert] = readBlock(update, position);
    position = expectKeyword(update, afterInsert, 'WHERE');
    const [where, end] = readBlock(update, position);

    if (where.trim().length > 0) {
        throw new UpdateParseError('Only an empty WHERE clause is supported');
    }
    if (skipWhitespace(update, end) !== update.length) {
        throw new UpdateParseError(`Unexpected content at offset ${end}`);
    }

    return { deletions: parseTriples(deletes), insertions: parseTriples(inserts) };
}
