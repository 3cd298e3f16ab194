import { AvailabilityStatus } from '../../common/utils/catalog.util';

export interface CategoryRef {
    name: string;
    slug: string;
}

export interface CategorySummary extends CategoryRef {
    productCount: number;
}

export interface ProductSummary {
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
    categories: CategoryRef[];
    tags: string[];
    thumbnail: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface ProductReviewView {
    rating: number;
    comment: string | null;
    reviewerName: string | null;
    reviewerEmail: string | null;
    reviewedAt: string | null;
}

export interface ProductDetail extends ProductSummary {
    images: string[];
    reviews: ProductReviewView[];
    dimensions: { width: number; height: number; depth: number } | null;
    weight: number | null;
    warrantyInformation: string | null;
    shippingInformation: string | null;
    returnPolicy: string | null;
    minimumOrderQuantity: number;
    barcode: string | null;
    qrCode: string | null;
}

export type ProductSort =
    | 'relevance'
    | 'price_asc'
    | 'price_desc'
    | 'rating_desc'
    | 'newest';

export interface ProductFilterQuery {
    text?: string;
    category?: string;
    brand?: string;
    minPrice?: number;
    maxPrice?: number;
    sort?: ProductSort;
    page?: number;
    perPage?: number;
}

export interface Page<T> {
    items: T[];
    total: number;
    page: number;
    perPage: number;
}
