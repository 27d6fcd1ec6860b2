import axios from 'axios';
import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { RepositoryError } from '../src/errors';
import { HttpRepository, parseGraph } from '../src/http-repository';
import { MemoryRepository } from '../src/memory-repository';
import { BOOK, BOOK_GRAPH, LABEL, TITLE } from './fixtures';

interface RecordedRequest {
    method?: string;
    url?: string;
    data: unknown;
    accept: unknown;
    contentType: unknown;
}

/** An axios adapter answering from a fixed handler, recording each request. */
function stubAdapter(
    respond: (config: InternalAxiosRequestConfig) => { status: number; data: string }
): { adapter: AxiosAdapter; requests: RecordedRequest[] } {
    const requests: RecordedRequest[] = [];
    const adapter: AxiosAdapter = async (config) => {
        requests.push({
            method: config.method,
            url: config.url,
            data: config.data,
            accept: config.headers.get('Accept'),
            contentType: config.headers.get('Content-Type'),
        });
        const { status, data } = respond(config);
        const response = { data, status, statusText: String(status), headers: {}, config };
        if (status >= 400) {
            throw new axios.AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
        }
        return response;
    };
    return { adapter, requests };
}

describe('MemoryRepository', () => {
    it('returns the quads of a resource and of the objects under it', async () => {
        const repository = MemoryRepository.fromNTriples(
            `${BOOK_GRAPH}\n<http://example.org/book10> <${TITLE}> "Other" .`
        );
        const graph = await repository.getGraph(BOOK);

        expect(graph).toHaveLength(5);
        expect(repository.fetched).toEqual([BOOK]);
    });

    it('throws a 404 RepositoryError for unknown resources', async () => {
        const repository = MemoryRepository.fromNTriples(BOOK_GRAPH);
        await expect(repository.getGraph('http://example.org/missing')).rejects.toMatchObject({
            code: 'REPOSITORY',
            status: 404,
            message: 'Resource <http://example.org/missing> not found',
        });
    });

    it('applies updates to its store', async () => {
        const repository = MemoryRepository.fromNTriples(BOOK_GRAPH);
        await repository.patch(
            BOOK,
            `DELETE { <${BOOK}/part1> <${LABEL}> "Part One" . } INSERT { <${BOOK}/part1> <${LABEL}> "Intro" . } WHERE {}`
        );

        expect(repository.valuesOf(`${BOOK}/part1`, LABEL)).toEqual(['Intro']);
        expect(repository.patches).toHaveLength(1);
    });
});

describe('HttpRepository', () => {
    it('fetches N-Triples with a matching Accept header', async () => {
        const { adapter, requests } = stubAdapter(() => ({ status: 200, data: BOOK_GRAPH }));
        const repository = new HttpRepository({ client: axios.create({ adapter }) });

        const graph = await repository.getGraph(BOOK);

        expect(graph).toHaveLength(5);
        expect(requests).toHaveLength(1);
        expect(requests[0].method).toBe('get');
        expect(requests[0].url).toBe(BOOK);
        expect(requests[0].accept).toBe('application/n-triples');
    });

    it('sends updates with PATCH as SPARQL Update', async () => {
        const { adapter, requests } = stubAdapter(() => ({ status: 204, data: '' }));
        const repository = new HttpRepository({ client: axios.create({ adapter }) });
        const update = `DELETE {  } INSERT { <${BOOK}> <${TITLE}> "B" . } WHERE {}`;

        await repository.patch(BOOK, update);

        expect(requests[0].method).toBe('patch');
        expect(requests[0].data).toBe(update);
        expect(requests[0].contentType).toBe('application/sparql-update');
    });

    it('wraps HTTP failures in RepositoryError', async () => {
        const { adapter } = stubAdapter(() => ({ status: 404, data: 'Not Found' }));
        const repository = new HttpRepository({ client: axios.create({ adapter }) });

        const failure = repository.getGraph(BOOK);
        await expect(failure).rejects.toThrow(RepositoryError);
        await expect(failure).rejects.toMatchObject({
            message: `Cannot fetch <${BOOK}>: HTTP 404`,
            status: 404,
            uri: BOOK,
        });
    });

    it('wraps rejected updates in RepositoryError', async () => {
        const { adapter } = stubAdapter(() => ({ status: 409, data: 'Conflict' }));
        const repository = new HttpRepository({ client: axios.create({ adapter }) });

        await expect(repository.patch(BOOK, 'DELETE {  } INSERT {  } WHERE {}')).rejects.toMatchObject({
            message: `Cannot update <${BOOK}>: HTTP 409`,
            status: 409,
        });
    });

    it('reports graphs that do not parse', async () => {
        const { adapter } = stubAdapter(() => ({ status: 200, data: '<not a graph' }));
        const repository = new HttpRepository({ client: axios.create({ adapter }) });

        await expect(repository.getGraph(BOOK)).rejects.toThrow(`Cannot parse graph of <${BOOK}>`);
    });
});

describe('parseGraph()', () => {
    it('reads JSON-LD against the resource URI', async () => {
        const body = JSON.stringify({
            '@id': BOOK,
            [TITLE]: 'A',
            'http://purl.org/dc/terms/hasPart': { '@id': `${BOOK}/part1` },
        });

        const quads = await parseGraph(body, 'json-ld', BOOK);

        expect(quads.map((quad) => [quad.subject.value, quad.predicate.value, quad.object.value]).sort()).toEqual([
            [BOOK, 'http://purl.org/dc/terms/hasPart', `${BOOK}/part1`],
            [BOOK, TITLE, 'A'],
        ]);
    });

    it('rejects JSON that is not a document', async () => {
        await expect(parseGraph('42', 'json-ld', BOOK)).rejects.toThrow(
            `Cannot parse graph of <${BOOK}>: JSON-LD body is not an object or array`
        );
    });
});
