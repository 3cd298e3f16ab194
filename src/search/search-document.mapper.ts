import { Product } from '../product/entities';
import { ProductSummary } from '../product/types/product-view.types';
import { SearchDocument } from './search.types';

export function toSearchDocument(product: Product): SearchDocument {
    const categories = [...(product.categories ?? [])].sort((a, b) =>
        a.slug.localeCompare(b.slug),
    );
    return {
        id: product.id,
        externalId: product.externalId,
        title: product.title,
        description: product.description,
        brand: product.brand,
        sku: product.sku,
        price: product.price,
        discountPercentage: product.discountPercentage,
        finalPrice: product.finalPrice,
        rating: product.rating,
        stock: product.stock,
        availabilityStatus: product.availabilityStatus,
        categoryNames: categories.map((category) => category.name),
        categorySlugs: categories.map((category) => category.slug),
        tags: (product.tags ?? []).map((tag) => tag.name).sort(),
        thumbnail: product.thumbnail,
        createdAt: product.createdAt.toISOString(),
        updatedAt: product.updatedAt.toISOString(),
    };
}

export function documentToSummary(document: SearchDocument): ProductSummary {
    return {
        id: document.id,
        externalId: document.externalId,
        title: document.title,
        description: document.description,
        brand: document.brand,
        sku: document.sku,
        price: document.price,
        discountPercentage: document.discountPercentage,
        finalPrice: document.finalPrice,
        rating: document.rating,
        stock: document.stock,
        availabilityStatus: document.availabilityStatus,
        categories: document.categorySlugs.map((slug, i) => ({
            name: document.categoryNames[i] ?? slug,
            slug,
        })),
        tags: document.tags,
        thumbnail: document.thumbnail,
        createdAt: document.createdAt,
        updatedAt: document.updatedAt,
    };
}
