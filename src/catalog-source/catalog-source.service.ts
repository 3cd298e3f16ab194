import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance, AxiosResponse } from 'axios';
import { CacheEntry, CacheParams, ResponseCache } from '../cache/response-cache';
import {
    TerminalFetchError,
    TransientFetchError,
} from '../common/errors/catalog.errors';
import { errorMessage } from '../common/utils/error.util';
import { RetryOptions, withRetry } from '../common/utils/retry.util';
import { isRecord, normalizeSourceProduct } from './catalog-normalizer';
import {
    BatchStreamOptions,
    RawProductBatch,
} from './catalog-source.types';

export const CATALOG_HTTP = Symbol('CATALOG_HTTP');

interface CatalogPayload {
    products: unknown[];
    total: number | null;
}

@Injectable()
export class CatalogSourceService {
    private readonly logger = new Logger(CatalogSourceService.name);
    private readonly url: string;
    private readonly cacheEnabled: boolean;
    /** Oldest cached response still served; 0 keeps entries forever. */
    private readonly cacheMaxAgeMs: number;
    private readonly retry: RetryOptions;
    readonly pageSize: number;

    constructor(
        @Inject(CATALOG_HTTP) private readonly http: AxiosInstance,
        private readonly cache: ResponseCache,
        private readonly configService: ConfigService,
    ) {
        this.url = this.configService.get<string>(
            'CATALOG_API_URL',
            'https://dummyjson.com/products',
        );
        this.pageSize = this.configService.get<number>('CATALOG_PAGE_SIZE', 100);
        this.cacheEnabled = this.configService.get<boolean>('CACHE_ENABLED', true);
        this.cacheMaxAgeMs = this.configService.get<number>('CACHE_MAX_AGE_MS', 21_600_000);
        this.retry = {
            maxAttempts: this.configService.get<number>('CATALOG_FETCH_MAX_ATTEMPTS', 3),
            baseDelayMs: this.configService.get<number>('CATALOG_FETCH_BASE_DELAY_MS', 200),
            maxDelayMs: this.configService.get<number>('CATALOG_FETCH_MAX_DELAY_MS', 5000),
        };
    }

    async fetchPage(offset: number, limit: number = this.pageSize): Promise<RawProductBatch> {
        const params: CacheParams = { limit, skip: offset };
        const now = Date.now();
        const key = ResponseCache.keyFor(this.url, this.cacheParams(params, now));

        if (this.cacheEnabled) {
            const cached = await this.cache.get(key);
            if (cached && this.isFresh(cached, now)) {
                try {
                    return this.toBatch(cached.payload, offset, limit, true);
                } catch (error) {
                    this.logger.warn(
                        `Cached page at offset ${offset} is unusable, refetching: ${errorMessage(error)}`,
                    );
                }
            }
        }

        const payload = await withRetry(() => this.request(params, offset), {
            ...this.retry,
            shouldRetry: (error) => error instanceof TransientFetchError,
            onRetry: (error, attempt, delayMs) =>
                this.logger.warn(
                    `Retry ${attempt}/${(this.retry.maxAttempts ?? 3) - 1} for offset ${offset} in ${delayMs}ms: ${errorMessage(error)}`,
                ),
        });
        const batch = this.toBatch(payload, offset, limit, false);

        if (this.cacheEnabled) {
            try {
                await this.cache.put(key, payload);
            } catch (error) {
                this.logger.warn(
                    `Could not cache page at offset ${offset}: ${errorMessage(error)}`,
                );
            }
        }

        this.logger.debug(
            `Fetched ${batch.records.length} products at offset ${offset}`,
        );
        return batch;
    }

    /**
     * Lazily walks the catalog from `startOffset`, advancing `stride` pages at a
     * time. With a known total and a single stream, it advances by the records
     * actually received, so a source that caps its page size is read in full.
     * Stops at the total, on an empty page, on a short page when the total is
     * unknown, or once `signal` aborts. Fetch errors carry their offset so a
     * caller can resume after it.
     */
    async *batches(
        options: BatchStreamOptions = {},
    ): AsyncGenerator<RawProductBatch, void, undefined> {
        const limit = options.limit ?? this.pageSize;
        const stride = Math.max(1, options.stride ?? 1);
        let offset = options.startOffset ?? 0;

        while (!options.signal?.aborted) {
            const batch = await this.fetchPage(offset, limit);
            if (batch.records.length === 0) {
                return;
            }
            yield batch;

            const received = batch.records.length;
            if (batch.total === null) {
                // Without a total, a short page is the only end marker.
                if (received < limit) return;
                offset += stride * limit;
                continue;
            }

            if (stride > 1 && received < limit && offset + received < batch.total) {
                this.logger.warn(
                    `Page at offset ${offset} returned ${received} of ${limit} records; ` +
                        `offsets ${offset + received}-${offset + limit - 1} are not read by this stream`,
                );
            }
            const next = stride === 1 ? offset + received : offset + stride * limit;
            if (next >= batch.total) {
                return;
            }
            offset = next;
        }
    }

    /**
     * Entries are immutable, so expiry is part of the key: each `cacheMaxAgeMs`
     * window addresses its own set of pages.
     */
    private cacheParams(params: CacheParams, now: number): CacheParams {
        if (this.cacheMaxAgeMs === 0) {
            return params;
        }
        return { ...params, window: Math.floor(now / this.cacheMaxAgeMs) };
    }

    private isFresh(entry: CacheEntry, now: number): boolean {
        if (this.cacheMaxAgeMs === 0) {
            return true;
        }
        const age = now - Date.parse(entry.fetchedAt);
        if (Number.isNaN(age) || age > this.cacheMaxAgeMs) {
            this.logger.debug(`Cache entry ${entry.key} is stale, refetching`);
            return false;
        }
        return true;
    }

    private async request(params: CacheParams, offset: number): Promise<unknown> {
        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.get<unknown>(this.url, {
                params,
                validateStatus: () => true,
            });
        } catch (error) {
            throw new TransientFetchError(
                `Catalog request at offset ${offset} failed: ${errorMessage(error)}`,
                offset,
                undefined,
                { cause: error },
            );
        }

        const { status } = response;
        if (status >= 500 || status === 429) {
            throw new TransientFetchError(
                `Catalog responded ${status} at offset ${offset}`,
                offset,
                status,
            );
        }
        if (status < 200 || status >= 300) {
            throw new TerminalFetchError(
                `Catalog responded ${status} at offset ${offset}`,
                offset,
                status,
            );
        }
        return response.data;
    }

    private toBatch(
        payload: unknown,
        offset: number,
        limit: number,
        fromCache: boolean,
    ): RawProductBatch {
        const { products, total } = this.readPayload(payload, offset);
        return {
            offset,
            limit,
            total,
            records: products.map(normalizeSourceProduct),
            fromCache,
        };
    }

    private readPayload(payload: unknown, offset: number): CatalogPayload {
        if (Array.isArray(payload)) {
            return { products: payload, total: null };
        }
        if (isRecord(payload) && Array.isArray(payload.products)) {
            const { total } = payload;
            return {
                products: payload.products,
                total: typeof total === 'number' && total >= 0 ? total : null,
            };
        }
        throw new TerminalFetchError(
            `Catalog payload at offset ${offset} is neither a product array nor { products }`,
            offset,
        );
    }
}
