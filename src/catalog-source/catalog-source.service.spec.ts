import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ResponseCache } from '../cache/response-cache';
import { TerminalFetchError, TransientFetchError } from '../common/errors/catalog.errors';
import { rawProducts } from '../testing/catalog-fixtures';
import { CatalogResponder, fakeCatalogHttp, pagedCatalog } from '../testing/fake-catalog-http';
import { testConfig } from '../testing/test-config';
import { CatalogSourceService } from './catalog-source.service';
import { RawProductBatch } from './catalog-source.types';

describe('CatalogSourceService', () => {
    let root: string;
    let cache: ResponseCache;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-source-'));
        cache = await ResponseCache.open(root);
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.rm(root, { recursive: true, force: true });
    });

    function createSource(responder: CatalogResponder, overrides: Record<string, unknown> = {}) {
        const fake = fakeCatalogHttp(responder);
        const source = new CatalogSourceService(fake.http, cache, testConfig(overrides));
        return { source, requests: fake.requests };
    }

    async function collect(stream: AsyncIterable<RawProductBatch>): Promise<RawProductBatch[]> {
        const batches: RawProductBatch[] = [];
        for await (const batch of stream) {
            batches.push(batch);
        }
        return batches;
    }

    it('fetches a page with limit and skip', async () => {
        const { source, requests } = createSource(pagedCatalog(rawProducts(25)));

        const batch = await source.fetchPage(10, 10);

        expect(requests).toEqual([{ skip: 10, limit: 10 }]);
        expect(batch.total).toBe(25);
        expect(batch.fromCache).toBe(false);
        expect(batch.records.map((record) => record.externalId)).toEqual([
            11, 12, 13, 14, 15, 16, 17, 18, 19, 20,
        ]);
    });

    it('accepts a bare array payload without a total', async () => {
        const { source } = createSource(() => ({ status: 200, data: rawProducts(2) }));

        const batch = await source.fetchPage(0, 10);

        expect(batch.total).toBeNull();
        expect(batch.records).toHaveLength(2);
    });

    it('serves repeated requests from the cache', async () => {
        const { source, requests } = createSource(pagedCatalog(rawProducts(5)), {
            CACHE_ENABLED: true,
        });

        const first = await source.fetchPage(0, 10);
        const second = await source.fetchPage(0, 10);

        expect(requests).toHaveLength(1);
        expect(second.fromCache).toBe(true);
        expect(second.records).toEqual(first.records);
        expect(cache.stats()).toEqual({ hits: 1, misses: 1, writes: 1 });
    });

    it('refetches a page once its cache window has passed', async () => {
        const clock = jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
        const { source, requests } = createSource(pagedCatalog(rawProducts(5)), {
            CACHE_ENABLED: true,
            CACHE_MAX_AGE_MS: 60_000,
        });

        await source.fetchPage(0, 10);
        clock.mockReturnValue(1_700_000_030_000);
        const sameWindow = await source.fetchPage(0, 10);
        clock.mockReturnValue(1_700_000_060_000);
        const nextWindow = await source.fetchPage(0, 10);

        expect(requests).toHaveLength(2);
        expect(sameWindow.fromCache).toBe(true);
        expect(nextWindow.fromCache).toBe(false);
        expect(cache.stats()).toEqual({ hits: 1, misses: 2, writes: 2 });
    });

    it('ignores a cached entry older than the maximum age', async () => {
        const maxAgeMs = 60_000;
        const now = 1_700_000_000_000;
        jest.spyOn(Date, 'now').mockReturnValue(now);
        const key = ResponseCache.keyFor('https://catalog.test/products', {
            limit: 10,
            skip: 0,
            window: Math.floor(now / maxAgeMs),
        });
        const file = path.join(root, key.slice(0, 2), `${key}.json`);
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(
            file,
            JSON.stringify({
                key,
                fetchedAt: new Date(now - 2 * maxAgeMs).toISOString(),
                payload: { products: [], total: 0 },
            }),
        );
        const { source, requests } = createSource(pagedCatalog(rawProducts(5)), {
            CACHE_ENABLED: true,
            CACHE_MAX_AGE_MS: maxAgeMs,
        });

        const batch = await source.fetchPage(0, 10);

        expect(requests).toHaveLength(1);
        expect(batch.fromCache).toBe(false);
        expect(batch.records).toHaveLength(5);
    });

    it('retries transient failures', async () => {
        let calls = 0;
        const { source, requests } = createSource((request) => {
            calls++;
            if (calls === 1) return new Error('connect ECONNREFUSED');
            if (calls === 2) return { status: 503, data: 'unavailable' };
            return pagedCatalog(rawProducts(3))(request);
        });

        const batch = await source.fetchPage(0, 10);

        expect(requests).toHaveLength(3);
        expect(batch.records).toHaveLength(3);
    });

    it('gives up after the configured attempts', async () => {
        const { source, requests } = createSource(() => ({ status: 429, data: {} }));

        const failure = source.fetchPage(20, 10);

        await expect(failure).rejects.toBeInstanceOf(TransientFetchError);
        await expect(failure).rejects.toMatchObject({ offset: 20, status: 429 });
        expect(requests).toHaveLength(3);
    });

    it('does not retry client errors', async () => {
        const { source, requests } = createSource(() => ({ status: 404, data: {} }));

        await expect(source.fetchPage(0, 10)).rejects.toBeInstanceOf(TerminalFetchError);
        expect(requests).toHaveLength(1);
    });

    it('rejects a malformed payload as terminal', async () => {
        const { source } = createSource(() => ({ status: 200, data: { items: [] } }));

        await expect(source.fetchPage(0, 10)).rejects.toBeInstanceOf(TerminalFetchError);
    });

    it('streams pages until the total is reached', async () => {
        const { source, requests } = createSource(pagedCatalog(rawProducts(25)));

        const batches = await collect(source.batches({ limit: 10 }));

        expect(batches.map((batch) => batch.offset)).toEqual([0, 10, 20]);
        expect(batches.map((batch) => batch.records.length)).toEqual([10, 10, 5]);
        expect(requests).toHaveLength(3);
    });

    it('strides over pages for round-robin workers', async () => {
        const { source } = createSource(pagedCatalog(rawProducts(55)));

        const batches = await collect(source.batches({ startOffset: 10, limit: 10, stride: 2 }));

        expect(batches.map((batch) => batch.offset)).toEqual([10, 30, 50]);
    });

    it('reads a source that caps its page size up to the total', async () => {
        const { source, requests } = createSource(pagedCatalog(rawProducts(25), 5));

        const batches = await collect(source.batches({ limit: 10 }));

        expect(batches.map((batch) => batch.offset)).toEqual([0, 5, 10, 15, 20]);
        expect(batches.flatMap((batch) => batch.records)).toHaveLength(25);
        expect(requests.map((request) => request.skip)).toEqual([0, 5, 10, 15, 20]);
    });

    it('stops an array stream on a short page', async () => {
        const products = rawProducts(15);
        const { source, requests } = createSource(({ skip, limit }) => ({
            status: 200,
            data: products.slice(skip, skip + limit),
        }));

        const batches = await collect(source.batches({ limit: 10 }));

        expect(batches.map((batch) => batch.records.length)).toEqual([10, 5]);
        expect(requests).toHaveLength(2);
    });

    it('stops once the signal aborts', async () => {
        const controller = new AbortController();
        const { source } = createSource(pagedCatalog(rawProducts(50)));

        const seen: number[] = [];
        for await (const batch of source.batches({ limit: 10, signal: controller.signal })) {
            seen.push(batch.offset);
            controller.abort();
        }

        expect(seen).toEqual([0]);
    });
});
