import { estypes } from '@elastic/elasticsearch';
import { SearchDocument, SearchQuery } from '../search.types';
import {
    buildSearchRequest,
    buildSuggestRequest,
    collectBulkResult,
    MAX_RESULT_WINDOW,
    parseSearchResponse,
    parseSuggestions,
    ProductAggregations,
    sortFor,
    tokenize,
} from './product-search.query';

const baseQuery: SearchQuery = {
    useWildcard: false,
    sort: 'relevance',
    offset: 0,
    limit: 20,
};

function document(id: number): SearchDocument {
    return {
        id,
        externalId: id,
        title: `Product ${id}`,
        description: null,
        brand: 'Acme',
        sku: null,
        price: 10,
        discountPercentage: 0,
        finalPrice: 10,
        rating: 4,
        stock: 10,
        availabilityStatus: 'in_stock',
        categoryNames: ['Audio'],
        categorySlugs: ['audio'],
        tags: [],
        thumbnail: null,
        createdAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.000Z',
    };
}

describe('buildSearchRequest', () => {
    it('weights the title over the description', () => {
        const request = buildSearchRequest('products', { ...baseQuery, text: 'wireless headphones' });

        expect(request.query).toEqual({
            bool: {
                must: [
                    {
                        multi_match: {
                            query: 'wireless headphones',
                            fields: ['title^3', 'description'],
                            type: 'best_fields',
                        },
                    },
                ],
                filter: [],
            },
        });
        expect(request).toMatchObject({ index: 'products', from: 0, size: 20, track_total_hits: true });
    });

    it('adds lower-boosted prefix and infix clauses per token for wildcard queries', () => {
        const request = buildSearchRequest('products', { ...baseQuery, text: 'head', useWildcard: true });

        expect(request.query).toEqual({
            bool: {
                must: [
                    {
                        bool: {
                            should: [
                                {
                                    multi_match: {
                                        query: 'head',
                                        fields: ['title^3', 'description'],
                                        type: 'best_fields',
                                    },
                                },
                                { prefix: { title: { value: 'head', boost: 0.5 } } },
                                { prefix: { description: { value: 'head', boost: 0.5 } } },
                                { wildcard: { title: { value: '*head*', boost: 0.2 } } },
                                { wildcard: { description: { value: '*head*', boost: 0.2 } } },
                            ],
                            minimum_should_match: 1,
                        },
                    },
                ],
                filter: [],
            },
        });
    });

    it('turns category, brand and price into filters', () => {
        const request = buildSearchRequest('products', {
            ...baseQuery,
            category: 'audio',
            brand: 'Sonic',
            minPrice: 50,
        });

        expect(request.query).toEqual({
            bool: {
                must: [{ match_all: {} }],
                filter: [
                    { term: { categorySlugs: 'audio' } },
                    { term: { 'brand.keyword': 'Sonic' } },
                    { range: { finalPrice: { gte: 50, lte: undefined } } },
                ],
            },
        });
    });

    it('asks only for totals and facets beyond the result window', () => {
        const request = buildSearchRequest('products', {
            ...baseQuery,
            offset: MAX_RESULT_WINDOW,
            limit: 20,
        });

        expect(request.from).toBe(0);
        expect(request.size).toBe(0);
        expect(request.aggs).toBeDefined();
    });

    it('buckets final prices', () => {
        const request = buildSearchRequest('products', baseQuery);

        expect(request.aggs?.byPrice).toEqual({
            range: {
                field: 'finalPrice',
                ranges: [
                    { key: '<50', to: 50 },
                    { key: '50-200', from: 50, to: 200 },
                    { key: '>200', from: 200 },
                ],
            },
        });
    });
});

describe('sortFor', () => {
    it('ends every sort with rating and id tie-breakers', () => {
        expect(sortFor('relevance')).toEqual([
            { _score: { order: 'desc' } },
            { rating: { order: 'desc' } },
            { id: { order: 'asc' } },
        ]);
        expect(sortFor('price_asc')[0]).toEqual({ finalPrice: { order: 'asc' } });
        expect(sortFor('newest')[0]).toEqual({ createdAt: { order: 'desc' } });
        expect(sortFor('rating_desc')).toEqual([
            { rating: { order: 'desc' } },
            { id: { order: 'asc' } },
        ]);
    });
});

describe('tokenize', () => {
    it('splits on non-word characters', () => {
        expect(tokenize('Wireless  Headphones-Pro!')).toEqual(['wireless', 'headphones', 'pro']);
    });
});

describe('parseSearchResponse', () => {
    it('reads documents, total and facets', () => {
        const response: estypes.SearchResponse<SearchDocument, ProductAggregations> = {
            took: 3,
            timed_out: false,
            _shards: { total: 1, successful: 1, failed: 0 },
            hits: {
                total: { value: 42, relation: 'eq' },
                hits: [{ _index: 'products', _id: '1', _source: document(1) }],
            },
            aggregations: {
                byCategory: { buckets: [{ key: 'audio', doc_count: 30 }] },
                byBrand: { buckets: [{ key: 'Acme', doc_count: 42 }] },
                byPrice: {
                    buckets: [
                        { key: '<50', doc_count: 40 },
                        { key: '>200', doc_count: 2 },
                    ],
                },
            },
        };

        expect(parseSearchResponse(response)).toEqual({
            documents: [document(1)],
            total: 42,
            facets: {
                categories: [{ key: 'audio', count: 30 }],
                brands: [{ key: 'Acme', count: 42 }],
                priceRanges: [
                    { key: '<50', count: 40 },
                    { key: '50-200', count: 0 },
                    { key: '>200', count: 2 },
                ],
            },
        });
    });
});

describe('collectBulkResult', () => {
    it('separates rejected documents from written ones', () => {
        const response: estypes.BulkResponse = {
            took: 5,
            errors: true,
            items: [
                { index: { _index: 'products', _id: '1', status: 201 } },
                {
                    index: {
                        _index: 'products',
                        _id: '2',
                        status: 400,
                        error: { type: 'mapper_parsing_exception', reason: 'failed to parse field [rating]' },
                    },
                },
                { index: { _index: 'products', _id: '3', status: 200 } },
            ],
        };

        expect(collectBulkResult(response, [document(1), document(2), document(3)])).toEqual({
            succeeded: [1, 3],
            failed: [{ id: 2, reason: 'mapper_parsing_exception: failed to parse field [rating]' }],
        });
    });
});

describe('title suggestions', () => {
    it('asks the completion suggester without hits', () => {
        expect(buildSuggestRequest('products', 'desk', 5)).toEqual({
            index: 'products',
            size: 0,
            _source: false,
            suggest: {
                titleSuggest: {
                    prefix: 'desk',
                    completion: { field: 'title.suggest', size: 5, skip_duplicates: true },
                },
            },
        });
    });

    it('reads option texts in order', () => {
        const response: estypes.SearchResponse<SearchDocument> = {
            took: 1,
            timed_out: false,
            _shards: { total: 1, successful: 1, failed: 0 },
            hits: { hits: [] },
            suggest: {
                titleSuggest: [
                    {
                        text: 'desk',
                        offset: 0,
                        length: 4,
                        options: [
                            { text: 'Desk Lamp', _id: '3', _score: 1 },
                            { text: 'Desk Organizer', _id: '7', _score: 1 },
                        ],
                    },
                ],
            },
        };

        expect(parseSuggestions(response)).toEqual(['Desk Lamp', 'Desk Organizer']);
    });

    it('returns nothing without a suggest section', () => {
        expect(
            parseSuggestions({
                took: 1,
                timed_out: false,
                _shards: { total: 1, successful: 1, failed: 0 },
                hits: { hits: [] },
            }),
        ).toEqual([]);
    });
});
