import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ZodError } from 'zod';
import { LdSyncClient } from '../src/client';
import { UnknownModelError } from '../src/errors';
import { MemoryRepository } from '../src/memory-repository';
import { ModelRegistry } from '../src/registry';
import { parseTable } from '../src/table';
import { BOOK, BOOK_GRAPH, Book, LABEL, TITLE } from './fixtures';

describe('LdSyncClient', () => {
    let repository: MemoryRepository;
    let client: LdSyncClient;

    beforeEach(() => {
        repository = MemoryRepository.fromNTriples(BOOK_GRAPH);
        client = new LdSyncClient({ repository, registry: new ModelRegistry([Book]) });
    });

    it('lists registered models', () => {
        expect(client.models()).toEqual(['test.Book']);
    });

    it('uses the built-in models by default', () => {
        expect(new LdSyncClient({ repository }).models()).toEqual(['letter.Letter', 'newspaper.Issue']);
    });

    describe('importFile', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'ldsync-client-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('imports a delimited file', async () => {
            const path = join(dir, 'books.csv');
            writeFileSync(path, `URI;Title\n${BOOK};C\n`);

            const report = await client.importFile(path, { model: 'test.Book', delimiter: ';' });

            expect(report).toEqual({ rows: 1, updated: 1, unchanged: 0, failed: 0, failures: [] });
            expect(repository.valuesOf(BOOK, TITLE)).toEqual(['C']);
        });

        it('validates options', async () => {
            await expect(client.importFile(join(dir, 'none.csv'), { model: 'test.Book', limit: 0 })).rejects.toThrow(
                ZodError
            );
        });

        it('rejects unknown models before reading the file', async () => {
            await expect(client.importFile(join(dir, 'none.csv'), { model: 'test.Map' })).rejects.toThrow(
                UnknownModelError
            );
        });
    });

    describe('importTable', () => {
        it('imports rows already in memory', async () => {
            const table = parseTable(`URI,INDEX,Part Label\n${BOOK},part[0]=/part1,Intro\n`);

            const report = await client.importTable(table, { model: 'test.Book' });

            expect(report.updated).toBe(1);
            expect(repository.valuesOf(`${BOOK}/part1`, LABEL)).toEqual(['Intro']);
        });
    });

    describe('preview', () => {
        it('returns the update without sending it', async () => {
            const preview = await client.preview('test.Book', BOOK, { Title: 'B' });

            expect(preview.update).toBe(
                `DELETE { <${BOOK}> <${TITLE}> "A" . } INSERT { <${BOOK}> <${TITLE}> "B" . } WHERE {}`
            );
            expect(preview.delta.size).toEqual({ deletions: 1, insertions: 1 });
            expect(repository.patches).toEqual([]);
        });

        it('has no update when nothing changes', async () => {
            const preview = await client.preview('test.Book', BOOK, { Title: 'A' });
            expect(preview.update).toBeUndefined();
            expect(preview.resource.toString()).toBe(`test.Book <${BOOK}>`);
        });
    });
});
