/**
 * Term Codec
 *
 * Converts plain cell text into the RDF term a property requires, and
 * back into the canonical string used for comparison. Also converts
 * n3 terms read from a repository graph and renders terms as N-Triples.
 */

import type * as RDF from '@rdfjs/types';
import { TermConversionError } from './errors.js';
import {
    XSD_STRING, XSD_INTEGER, XSD_DECIMAL, XSD_BOOLEAN,
    XSD_DATE, XSD_DATE_TIME, XSD_G_YEAR, RDF_NS,
} from './namespaces.js';
import { Term, Triple, TermCodec, PropertyDefinitionInput } from './types.js';

const RDF_LANG_STRING = `${RDF_NS}langString`;

// Scheme, colon, then no whitespace or characters N-Triples forbids in an IRI.
const ABSOLUTE_IRI = /^[A-Za-z][A-Za-z0-9+.-]*:[^\s<>"{}|^`\\]+$/;

const TIMEZONE = '(Z|[+-]\\d{2}:\\d{2})?';

const LEXICAL_FORMS: Record<string, RegExp> = {
    [XSD_INTEGER]: /^[+-]?\d+$/,
    [XSD_DECIMAL]: /^[+-]?(\d+(\.\d*)?|\.\d+)$/,
    [XSD_BOOLEAN]: /^(true|false|1|0)$/,
    [XSD_DATE]: new RegExp(`^-?\\d{4,}-\\d{2}-\\d{2}${TIMEZONE}$`),
    [XSD_DATE_TIME]: new RegExp(`^-?\\d{4,}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}(\\.\\d+)?${TIMEZONE}$`),
    [XSD_G_YEAR]: new RegExp(`^-?\\d{4,}${TIMEZONE}$`),
};

// ── Codecs ────────────────────────────────────────────────────────

export function isAbsoluteIri(value: string): boolean {
    return ABSOLUTE_IRI.test(value);
}

/** Canonical string of a term: the URI of a reference, the lexical value of a literal. */
export function termToString(term: Term): string {
    return term.value;
}

/**
 * Build the codec for a property definition.
 *
 * @example
 * ```ts
 * const codec = createCodec({ predicate: DCTERMS_DATE, datatype: XSD_DATE });
 * codec.toTerm('1918-03-02');
 * // { type: 'literal', value: '1918-03-02', datatype: 'http://www.w3.org/2001/XMLSchema#date' }
 * ```
 */
export function createCodec(definition: PropertyDefinitionInput): TermCodec {
    if (definition.kind === 'reference') {
        return referenceCodec();
    }
    return literalCodec(definition.datatype, definition.lang);
}

function referenceCodec(): TermCodec {
    const description = 'a resource reference';
    return {
        description,
        toTerm(value: string): Term {
            if (!isAbsoluteIri(value)) {
                throw new TermConversionError(value, description);
            }
            return { type: 'uri', value };
        },
        stringify: termToString,
    };
}

function literalCodec(datatype?: string, lang?: string): TermCodec {
    const effectiveDatatype = datatype === XSD_STRING ? undefined : datatype;
    const lexicalForm = effectiveDatatype ? LEXICAL_FORMS[effectiveDatatype] : undefined;

    const description = effectiveDatatype ? `a literal of type <${effectiveDatatype}>` : 'a literal';

    return {
        description,
        toTerm(value: string): Term {
            if (lexicalForm && !lexicalForm.test(value)) {
                throw new TermConversionError(value, description);
            }
            if (lang) {
                return { type: 'literal', value, lang };
            }
            if (effectiveDatatype) {
                return { type: 'literal', value, datatype: effectiveDatatype };
            }
            return { type: 'literal', value };
        },
        stringify: termToString,
    };
}

// ── RDF/JS interop ────────────────────────────────────────────────

/**
 * Convert a term from a parsed graph. Blank nodes, variables and
 * quoted triples have no cell representation and yield undefined.
 */
export function fromRdfTerm(term: RDF.Term): Term | undefined {
    if (term.termType === 'NamedNode') {
        return { type: 'uri', value: term.value };
    }
    if (term.termType !== 'Literal') {
        return undefined;
    }
    if (term.language) {
        return { type: 'literal', value: term.value, lang: term.language };
    }
    const datatype = term.datatype.value;
    if (datatype === XSD_STRING || datatype === RDF_LANG_STRING) {
        return { type: 'literal', value: term.value };
    }
    return { type: 'literal', value: term.value, datatype };
}

// ── N-Triples ─────────────────────────────────────────────────────

function escapeLiteral(value: string): string {
    return value
        .replace(/\\/g, '\\\\')
        .replace(/"/g, '\\"')
        .replace(/\n/g, '\\n')
        .replace(/\r/g, '\\r');
}

export function toNTriplesTerm(term: Term): string {
    if (term.type === 'uri') {
        return `<${term.value}>`;
    }
    const quoted = `"${escapeLiteral(term.value)}"`;
    if (term.lang) {
        return `${quoted}@${term.lang}`;
    }
    if (term.datatype) {
        return `${quoted}^^<${term.datatype}>`;
    }
    return quoted;
}

/** One N-Triples line (without the trailing newline); also a triple's identity. */
export function toNTriplesLine(triple: Triple): string {
    return `<${triple.subject}> <${triple.predicate}> ${toNTriplesTerm(triple.object)} .`;
}
