import { Parser } from 'n3';
import { defineModel } from '../src/models';
import { DCTERMS_NS, RDFS_NS, XSD_DATE } from '../src/namespaces';
import { Resource } from '../src/resource';
import { ModelDescriptor } from '../src/types';

export const BOOK = 'http://example.org/book1';
export const TITLE = `${DCTERMS_NS}title`;
export const SUBJECT = `${DCTERMS_NS}subject`;
export const DATE = `${DCTERMS_NS}date`;
export const HAS_PART = `${DCTERMS_NS}hasPart`;
export const LABEL = `${RDFS_NS}label`;

export const Book = defineModel({
    name: 'test.Book',
    properties: {
        title: { predicate: TITLE },
        subject: { predicate: SUBJECT, kind: 'reference' },
        date: { predicate: DATE, datatype: XSD_DATE },
    },
    embedded: {
        part: {
            predicate: HAS_PART,
            properties: { label: { predicate: LABEL } },
        },
    },
    headerMap: {
        Title: 'title',
        Subject: 'subject',
        Date: 'date',
        'Part Label': 'part.label',
    },
});

/** Same attributes, with two columns writing the title. */
export const TwoTitleBook = defineModel({
    name: 'test.TwoTitleBook',
    properties: { title: { predicate: TITLE } },
    headerMap: { Title: 'title', 'Title Again': 'title' },
});

export const BOOK_GRAPH = [
    `<${BOOK}> <${TITLE}> "A" .`,
    `<${BOOK}> <${HAS_PART}> <${BOOK}/part1> .`,
    `<${BOOK}> <${HAS_PART}> <${BOOK}/part2> .`,
    `<${BOOK}/part1> <${LABEL}> "Part One" .`,
    `<${BOOK}/part2> <${LABEL}> "Part Two" .`,
].join('\n');

export function parseNTriples(text: string) {
    return new Parser({ format: 'N-Triples' }).parse(text);
}

export function loadResource(
    text: string = BOOK_GRAPH,
    model: ModelDescriptor = Book,
    uri: string = BOOK
): Resource {
    return Resource.fromGraph(model, parseNTriples(text), uri);
}
