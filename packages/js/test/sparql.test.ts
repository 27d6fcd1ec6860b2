import { DeltaGraph } from '../src/delta';
import { UpdateParseError } from '../src/errors';
import { XSD_DATE } from '../src/namespaces';
import { buildSparqlUpdate, parseSparqlUpdate, serializeTriples } from '../src/sparql';
import { BOOK, DATE, TITLE } from './fixtures';

const S = `<${BOOK}>`;
const P = `<${TITLE}>`;

describe('Update serializer', () => {
    describe('buildSparqlUpdate()', () => {
        it('renders deletions and insertions as one request', () => {
            const delta = new DeltaGraph()
                .delete({ subject: BOOK, predicate: TITLE, object: { type: 'literal', value: 'A' } })
                .insert({ subject: BOOK, predicate: TITLE, object: { type: 'literal', value: 'B' } });

            expect(buildSparqlUpdate(delta)).toBe(
                `DELETE { ${S} ${P} "A" . } INSERT { ${S} ${P} "B" . } WHERE {}`
            );
        });

        it('renders an empty side as an empty block', () => {
            const delta = new DeltaGraph().insert({
                subject: BOOK,
                predicate: TITLE,
                object: { type: 'literal', value: 'B' },
            });
            expect(buildSparqlUpdate(delta)).toBe(`DELETE {  } INSERT { ${S} ${P} "B" . } WHERE {}`);
        });

        it('puts one triple on each line', () => {
            expect(
                serializeTriples([
                    { subject: BOOK, predicate: TITLE, object: { type: 'literal', value: 'A' } },
                    { subject: BOOK, predicate: DATE, object: { type: 'literal', value: '2001-01-01', datatype: XSD_DATE } },
                ])
            ).toBe(`${S} ${P} "A" .\n${S} <${DATE}> "2001-01-01"^^<${XSD_DATE}> .`);
        });
    });

    describe('parseSparqlUpdate()', () => {
        it('reads both blocks back', () => {
            const delta = new DeltaGraph()
                .delete({ subject: BOOK, predicate: TITLE, object: { type: 'literal', value: 'A' } })
                .insert({ subject: BOOK, predicate: DATE, object: { type: 'literal', value: '2001-01-01', datatype: XSD_DATE } });

            const { deletions, insertions } = parseSparqlUpdate(buildSparqlUpdate(delta));

            expect(deletions).toHaveLength(1);
            expect(deletions[0].subject.value).toBe(BOOK);
            expect(deletions[0].object.value).toBe('A');
            expect(insertions).toHaveLength(1);
            expect(insertions[0].predicate.value).toBe(DATE);
            expect(insertions[0].object.termType).toBe('Literal');
        });

        it('skips braces inside literals', () => {
            const update = `DELETE {  } INSERT { ${S} ${P} "a } b { c" . } WHERE {}`;
            const { insertions } = parseSparqlUpdate(update);
            expect(insertions.map((quad) => quad.object.value)).toEqual(['a } b { c']);
        });

        it('reads empty blocks as no triples', () => {
            expect(parseSparqlUpdate('DELETE {  } INSERT {  } WHERE {}')).toEqual({ deletions: [], insertions: [] });
        });

        it('rejects a non-empty WHERE clause', () => {
            expect(() => parseSparqlUpdate(`DELETE { } INSERT { } WHERE { ?s ?p ?o }`)).toThrow(
                'Only an empty WHERE clause is supported'
            );
        });

        it('rejects other update forms', () => {
            expect(() => parseSparqlUpdate(`INSERT DATA { ${S} ${P} "B" . }`)).toThrow(UpdateParseError);
            expect(() => parseSparqlUpdate(`INSERT DATA { ${S} ${P} "B" . }`)).toThrow('Expected DELETE at offset 0');
        });

        it('rejects unterminated blocks', () => {
            expect(() => parseSparqlUpdate(`DELETE { ${S} ${P} "A" .`)).toThrow('Unterminated block');
        });

        it('rejects invalid triples', () => {
            expect(() => parseSparqlUpdate('DELETE { not a triple } INSERT { } WHERE {}')).toThrow(UpdateParseError);
        });
    });
});
