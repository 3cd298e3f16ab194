import { AvailabilityStatus } from '../common/utils/catalog.util';
import { ProductSort, ProductSummary } from '../product/types/product-view.types';

/** Denormalized projection of a product row; `id` is the internal product id. */
export interface SearchDocument {
    id: number;
    externalId: number;
    title: string;
    description: string | null;
    brand: string | null;
    sku: string | null;
    price: number;
    discountPercentage: number;
    finalPrice: number;
    rating: number;
    stock: number;
    availabilityStatus: AvailabilityStatus;
    categoryNames: string[];
    categorySlugs: string[];
    tags: string[];
    thumbnail: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface IndexFailure {
    id: number;
    reason: string;
}

export interface IndexResult {
    succeeded: number[];
    failed: IndexFailure[];
}

export interface FacetBucket {
    key: string;
    count: number;
}

export interface SearchFacets {
    categories: FacetBucket[];
    brands: FacetBucket[];
    priceRanges: FacetBucket[];
}

export const PRICE_RANGES: ReadonlyArray<{ key: string; from?: number; to?: number }> = [
    { key: '<50', to: 50 },
    { key: '50-200', from: 50, to: 200 },
    { key: '>200', from: 200 },
];

/** Backend-level query: pagination already resolved to offset/limit. */
export interface SearchQuery {
    text?: string;
    category?: string;
    brand?: string;
    minPrice?: number;
    maxPrice?: number;
    useWildcard: boolean;
    sort: ProductSort;
    offset: number;
    limit: number;
}

export interface SearchBackendResult {
    documents: SearchDocument[];
    total: number;
    facets: SearchFacets;
}

export interface SearchParams {
    text?: string;
    category?: string;
    brand?: string;
    minPrice?: number;
    maxPrice?: number;
    useWildcard?: boolean;
    sort?: ProductSort;
    page?: number;
    perPage?: number;
}

export interface SearchResult {
    items: ProductSummary[];
    total: number;
    page: number;
    perPage: number;
    /** Omitted on degraded responses. */
    facets?: SearchFacets;
    degraded: boolean;
}
