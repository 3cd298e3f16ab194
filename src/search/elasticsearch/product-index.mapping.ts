import { estypes } from '@elastic/elasticsearch';

export const PRODUCT_INDEX_SETTINGS: estypes.IndicesIndexSettings = {
    analysis: {
        analyzer: {
            product_analyzer: {
                type: 'custom',
                tokenizer: 'standard',
                filter: ['lowercase', 'asciifolding'],
            },
        },
    },
};

const analyzedWithKeyword: estypes.MappingProperty = {
    type: 'text',
    analyzer: 'product_analyzer',
    fields: {
        keyword: {
            type: 'keyword',
            ignore_above: 256,
        },
    },
};

export const PRODUCT_INDEX_PROPERTIES: Record<string, estypes.MappingProperty> = {
    id: { type: 'integer' },
    externalId: { type: 'integer' },
    title: {
        type: 'text',
        analyzer: 'product_analyzer',
        fields: {
            keyword: {
                type: 'keyword',
                ignore_above: 256,
            },
            suggest: { type: 'completion' },
        },
    },
    description: {
        type: 'text',
        analyzer: 'product_analyzer',
    },
    brand: analyzedWithKeyword,
    sku: { type: 'keyword' },
    price: { type: 'scaled_float', scaling_factor: 100 },
    discountPercentage: { type: 'float' },
    finalPrice: { type: 'scaled_float', scaling_factor: 100 },
    rating: { type: 'float' },
    stock: { type: 'integer' },
    availabilityStatus: { type: 'keyword' },
    categoryNames: analyzedWithKeyword,
    categorySlugs: { type: 'keyword' },
    tags: { type: 'keyword' },
    thumbnail: { type: 'keyword', index: false },
    createdAt: { type: 'date' },
    updatedAt: { type: 'date' },
};
