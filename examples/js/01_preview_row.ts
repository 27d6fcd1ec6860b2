/**
 * Example 01: Previewing a Row
 * ============================
 *
 * Shows the SPARQL Update one edited row would produce, without sending
 * it. The repository is an in-process store seeded with one letter.
 *
 * Run: npx ts-node examples/js/01_preview_row.ts
 */

import { LdSyncClient, MemoryRepository } from '../../packages/js/src';

const LETTER = 'http://example.org/letters/42';

const repository = MemoryRepository.fromNTriples([
    `<${LETTER}> <http://purl.org/dc/terms/title> "Letter to the editor" .`,
    `<${LETTER}> <http://purl.org/dc/terms/date> "1918-03-02"^^<http://www.w3.org/2001/XMLSchema#date> .`,
].join('\n'));

async function main(): Promise<void> {
    const client = new LdSyncClient({ repository });

    // ── 1. A row that changes the title and adds a subject ──────────

    const preview = await client.preview('letter.Letter', LETTER, {
        Title: 'Letter to the editor|Letter on rationing',
        Subject: 'http://example.org/topics/rationing',
        Date: '1918-03-02',
    });

    console.log('=== 1. Delta ===\n');
    console.log('Deletions: ', preview.delta.size.deletions);
    console.log('Insertions:', preview.delta.size.insertions);
    console.log('\nUpdate:\n', preview.update);

    // ── 2. A row that matches the repository ────────────────────────

    const unchanged = await client.preview('letter.Letter', LETTER, { Title: 'Letter to the editor' });
    console.log('\n=== 2. Unchanged row ===\n');
    console.log('Update:', unchanged.update ?? '(nothing to send)');
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
