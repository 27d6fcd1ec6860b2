/**
 * Example 02: Updating Newspaper Pages
 * ====================================
 *
 * Imports a small table against the built-in `newspaper.Issue` model.
 * The INDEX column tells which embedded page each position of the
 * "Page Title" cell refers to.
 *
 * Run: npx ts-node examples/js/02_newspaper_pages.ts
 */

import {
    LdSyncClient,
    MemoryRepository,
    createLogger,
    parseTable,
} from '../../packages/js/src';

const ISSUE = 'http://example.org/issues/1918-03-02';
const TITLE = 'http://purl.org/dc/terms/title';
const HAS_MEMBER = 'http://pcdm.org/models#hasMember';

const repository = MemoryRepository.fromNTriples([
    `<${ISSUE}> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://purl.org/ontology/bibo/Issue> .`,
    `<${ISSUE}> <${TITLE}> "Evening Ledger" .`,
    `<${ISSUE}> <${HAS_MEMBER}> <${ISSUE}#page-1> .`,
    `<${ISSUE}> <${HAS_MEMBER}> <${ISSUE}#page-2> .`,
    `<${ISSUE}#page-1> <${TITLE}> "Page 1" .`,
    `<${ISSUE}#page-2> <${TITLE}> "Page 2" .`,
].join('\n'));

const table = parseTable([
    'URI,INDEX,Title,Page Title',
    `${ISSUE},page[0]=#page-2;page[1]=#page-1,Evening Ledger,Sports|Front Page`,
].join('\n'));

async function main(): Promise<void> {
    const client = new LdSyncClient({ repository, logger: createLogger({ level: 'debug' }) });
    const report = await client.importTable(table, { model: 'newspaper.Issue' });

    console.log('\n=== Report ===\n');
    console.log(JSON.stringify(report, null, 2));

    console.log('\n=== Page titles now ===\n');
    console.log('page-1:', repository.valuesOf(`${ISSUE}#page-1`, TITLE));
    console.log('page-2:', repository.valuesOf(`${ISSUE}#page-2`, TITLE));
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
