/** Raw product in the catalog's wire shape (snake_case keys allowed). */
export type RawProduct = Record<string, unknown>;

export function rawProduct(id: number, overrides: RawProduct = {}): RawProduct {
    return {
        id,
        title: `Product ${id}`,
        description: `Description of product ${id}`,
        category: 'smartphones',
        price: 10 * id,
        discountPercentage: 10,
        rating: 4,
        stock: 20,
        tags: ['tech'],
        brand: 'Acme',
        sku: `SKU-${id}`,
        images: [`https://cdn.catalog.test/${id}/1.png`],
        thumbnail: `https://cdn.catalog.test/${id}/thumb.png`,
        ...overrides,
    };
}

export function rawProducts(count: number, firstId = 1): RawProduct[] {
    return Array.from({ length: count }, (_, i) => rawProduct(firstId + i));
}
