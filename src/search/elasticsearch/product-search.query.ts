import { estypes } from '@elastic/elasticsearch';
import { ProductSort } from '../../product/types/product-view.types';
import {
    FacetBucket,
    IndexResult,
    PRICE_RANGES,
    SearchBackendResult,
    SearchDocument,
    SearchFacets,
    SearchQuery,
} from '../search.types';

/**
 * Elasticsearch's default `index.max_result_window`. A page reaching past it is
 * requested with `size: 0`, so it answers with the total and facets but no
 * items.
 */
export const MAX_RESULT_WINDOW = 10_000;

const FACET_SIZE = 50;

interface TermsBucket {
    key: string | number;
    doc_count: number;
}

interface RangeBucket {
    key: string;
    doc_count: number;
}

export interface ProductAggregations {
    byCategory?: { buckets: TermsBucket[] };
    byBrand?: { buckets: TermsBucket[] };
    byPrice?: { buckets: RangeBucket[] };
}

export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^\p{L}\p{N}]+/u)
        .filter((token) => token.length > 0);
}

function escapeWildcard(token: string): string {
    return token.replace(/[\\*?]/g, (match) => `\\${match}`);
}

function textQuery(text: string, useWildcard: boolean): estypes.QueryDslQueryContainer {
    const exact: estypes.QueryDslQueryContainer = {
        multi_match: {
            query: text,
            fields: ['title^3', 'description'],
            type: 'best_fields',
        },
    };
    if (!useWildcard) {
        return exact;
    }

    const partial = tokenize(text).flatMap((token): estypes.QueryDslQueryContainer[] => [
        { prefix: { title: { value: token, boost: 0.5 } } },
        { prefix: { description: { value: token, boost: 0.5 } } },
        { wildcard: { title: { value: `*${escapeWildcard(token)}*`, boost: 0.2 } } },
        { wildcard: { description: { value: `*${escapeWildcard(token)}*`, boost: 0.2 } } },
    ]);
    return {
        bool: {
            should: [exact, ...partial],
            minimum_should_match: 1,
        },
    };
}

function filtersFor(query: SearchQuery): estypes.QueryDslQueryContainer[] {
    const filter: estypes.QueryDslQueryContainer[] = [];
    if (query.category) {
        filter.push({ term: { categorySlugs: query.category } });
    }
    if (query.brand) {
        filter.push({ term: { 'brand.keyword': query.brand } });
    }
    if (query.minPrice !== undefined || query.maxPrice !== undefined) {
        filter.push({
            range: { finalPrice: { gte: query.minPrice, lte: query.maxPrice } },
        });
    }
    return filter;
}

export function sortFor(sort: ProductSort): estypes.SortCombinations[] {
    const tail: estypes.SortCombinations[] = [
        { rating: { order: 'desc' } },
        { id: { order: 'asc' } },
    ];
    switch (sort) {
        case 'price_asc':
            return [{ finalPrice: { order: 'asc' } }, ...tail];
        case 'price_desc':
            return [{ finalPrice: { order: 'desc' } }, ...tail];
        case 'newest':
            return [{ createdAt: { order: 'desc' } }, ...tail];
        case 'rating_desc':
            return tail;
        case 'relevance':
            return [{ _score: { order: 'desc' } }, ...tail];
    }
}

export function buildSearchRequest(index: string, query: SearchQuery): estypes.SearchRequest {
    const text = query.text?.trim();
    const beyondWindow = query.offset + query.limit > MAX_RESULT_WINDOW;

    return {
        index,
        from: beyondWindow ? 0 : query.offset,
        size: beyondWindow ? 0 : query.limit,
        track_total_hits: true,
        query: {
            bool: {
                must: text ? [textQuery(text, query.useWildcard)] : [{ match_all: {} }],
                filter: filtersFor(query),
            },
        },
        sort: sortFor(query.sort),
        aggs: {
            byCategory: { terms: { field: 'categorySlugs', size: FACET_SIZE } },
            byBrand: { terms: { field: 'brand.keyword', size: FACET_SIZE } },
            byPrice: {
                range: {
                    field: 'finalPrice',
                    ranges: PRICE_RANGES.map((range) => ({ ...range })),
                },
            },
        },
    };
}

function termBuckets(buckets: TermsBucket[] | undefined): FacetBucket[] {
    return (buckets ?? []).map((bucket) => ({
        key: String(bucket.key),
        count: bucket.doc_count,
    }));
}

export function parseFacets(aggregations: ProductAggregations | undefined): SearchFacets {
    const priceCounts = new Map(
        (aggregations?.byPrice?.buckets ?? []).map((bucket) => [bucket.key, bucket.doc_count]),
    );
    return {
        categories: termBuckets(aggregations?.byCategory?.buckets),
        brands: termBuckets(aggregations?.byBrand?.buckets),
        priceRanges: PRICE_RANGES.map(({ key }) => ({
            key,
            count: priceCounts.get(key) ?? 0,
        })),
    };
}

export function parseSearchResponse(
    response: estypes.SearchResponse<SearchDocument, ProductAggregations>,
): SearchBackendResult {
    const { total } = response.hits;
    return {
        documents: response.hits.hits.flatMap((hit) => (hit._source ? [hit._source] : [])),
        total: typeof total === 'number' ? total : (total?.value ?? 0),
        facets: parseFacets(response.aggregations),
    };
}

/** Splits a bulk response into succeeded and failed ids; items follow request order. */
export function collectBulkResult(
    response: estypes.BulkResponse,
    documents: readonly SearchDocument[],
): IndexResult {
    const result: IndexResult = { succeeded: [], failed: [] };
    response.items.forEach((item, i) => {
        const action = item.index;
        const id = documents[i]?.id ?? Number(action?._id);
        if (!action) {
            result.failed.push({ id, reason: 'missing bulk response item' });
        } else if (action.error) {
            result.failed.push({
                id,
                reason: `${action.error.type}: ${action.error.reason ?? 'unknown reason'}`,
            });
        } else if (action.status >= 300) {
            result.failed.push({ id, reason: `bulk status ${action.status}` });
        } else {
            result.succeeded.push(id);
        }
    });
    return result;
}

export const TITLE_SUGGESTION = 'titleSuggest';

/** Completion-suggester lookup on the start of product titles. */
export function buildSuggestRequest(
    index: string,
    prefix: string,
    size: number,
): estypes.SearchRequest {
    return {
        index,
        size: 0,
        _source: false,
        suggest: {
            [TITLE_SUGGESTION]: {
                prefix,
                completion: { field: 'title.suggest', size, skip_duplicates: true },
            },
        },
    };
}

export function parseSuggestions(response: estypes.SearchResponse<SearchDocument>): string[] {
    const titles: string[] = [];
    for (const entry of response.suggest?.[TITLE_SUGGESTION] ?? []) {
        const options: Array<{ text: string }> = Array.isArray(entry.options)
            ? entry.options
            : [entry.options];
        titles.push(...options.map((option) => option.text));
    }
    return titles;
}
