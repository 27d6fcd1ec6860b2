import { IndexParseError, LookupError } from '../src/errors';
import { buildLookupIndex, parseIndexDescriptor } from '../src/index-builder';
import { BOOK, loadResource } from './fixtures';

describe('Index builder', () => {
    describe('parseIndexDescriptor()', () => {
        it('parses key=reference entries', () => {
            expect(parseIndexDescriptor('part[0]=/part1;part[1]=/part2')).toEqual([
                { attribute: 'part', position: 0, reference: '/part1' },
                { attribute: 'part', position: 1, reference: '/part2' },
            ]);
        });

        it('yields nothing for an empty descriptor', () => {
            expect(parseIndexDescriptor('')).toEqual([]);
        });

        it('skips blank entries and trims whitespace', () => {
            expect(parseIndexDescriptor(' part[0] = /part1 ;; ')).toEqual([
                { attribute: 'part', position: 0, reference: '/part1' },
            ]);
        });

        it('rejects entries without "="', () => {
            expect(() => parseIndexDescriptor('part[0]')).toThrow(
                'Invalid index entry "part[0]": expected key=reference'
            );
        });

        it('rejects keys without a position', () => {
            expect(() => parseIndexDescriptor('part=/part1')).toThrow(IndexParseError);
            expect(() => parseIndexDescriptor('part=/part1')).toThrow('key "part" does not match name[position]');
        });
    });

    describe('buildLookupIndex()', () => {
        it('resolves references against the resource URI', () => {
            const resource = loadResource();
            const index = buildLookupIndex(resource, 'part[0]=/part2;part[1]=/part1');

            expect(index.get('part')?.get(0)?.uri).toBe(`${BOOK}/part2`);
            expect(index.get('part')?.get(1)?.uri).toBe(`${BOOK}/part1`);
        });

        it('is empty for an empty descriptor', () => {
            expect(buildLookupIndex(loadResource(), '').size).toBe(0);
        });

        it('throws LookupError for objects the resource does not hold', () => {
            expect(() => buildLookupIndex(loadResource(), 'part[0]=/part9')).toThrow(LookupError);
            expect(() => buildLookupIndex(loadResource(), 'part[0]=/part9')).toThrow(
                `No embedded "part" object with URI <${BOOK}/part9>`
            );
        });

        it('rejects attributes that are not embedded', () => {
            expect(() => buildLookupIndex(loadResource(), 'title[0]=/part1')).toThrow(
                'Invalid index entry "title[0]=/part1": "title" is not an embedded attribute of test.Book'
            );
        });

        it('rejects a position listed twice', () => {
            expect(() => buildLookupIndex(loadResource(), 'part[0]=/part1;part[0]=/part2')).toThrow(
                'Invalid index entry "part[0]=/part2": position is listed more than once'
            );
        });
    });
});
