import { Product } from './entities/product.entity';
import { ProductDetail, ProductSummary } from './types/product-view.types';

export function toProductSummary(product: Product): ProductSummary {
    const categories = product.categories ?? [];
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
        categories: categories
            .map(({ name, slug }) => ({ name, slug }))
            .sort((a, b) => a.slug.localeCompare(b.slug)),
        tags: (product.tags ?? []).map((tag) => tag.name).sort(),
        thumbnail: product.thumbnail,
        createdAt: product.createdAt.toISOString(),
        updatedAt: product.updatedAt.toISOString(),
    };
}

export function toProductDetail(product: Product): ProductDetail {
    const images = [...(product.images ?? [])]
        .filter((image) => !image.isThumbnail)
        .sort((a, b) => a.position - b.position)
        .map((image) => image.url);

    return {
        ...toProductSummary(product),
        images,
        reviews: (product.reviews ?? [])
            .sort((a, b) => a.id - b.id)
            .map((review) => ({
                rating: review.rating,
                comment: review.comment,
                reviewerName: review.reviewerName,
                reviewerEmail: review.reviewerEmail,
                reviewedAt: review.reviewedAt
                    ? new Date(review.reviewedAt).toISOString()
                    : null,
            })),
        dimensions: product.dimensions
            ? {
                  width: product.dimensions.width,
                  height: product.dimensions.height,
                  depth: product.dimensions.depth,
              }
            : null,
        weight: product.weight,
        warrantyInformation: product.warrantyInformation,
        shippingInformation: product.shippingInformation,
        returnPolicy: product.returnPolicy,
        minimumOrderQuantity: product.minimumOrderQuantity,
        barcode: product.barcode,
        qrCode: product.qrCode,
    };
}
