import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { normalizeSourceProduct } from '../../catalog-source/catalog-normalizer';
import { SourceRecord } from '../../catalog-source/catalog-source.types';
import { rawProduct, rawProducts } from '../../testing/catalog-fixtures';
import { sqliteTestingModule } from '../../testing/sqlite-testing.module';
import {
    Category,
    Product,
    ProductDimensions,
    ProductImage,
    ProductReview,
    ProductTag,
} from '../entities';
import { ProductModule } from '../product.module';
import { ProductPersistenceService } from './product-persistence.service';

describe('ProductPersistenceService', () => {
    let moduleRef: TestingModule;
    let service: ProductPersistenceService;
    let dataSource: DataSource;

    const records = (raw: Record<string, unknown>[]): SourceRecord[] =>
        raw.map(normalizeSourceProduct);

    beforeEach(async () => {
        moduleRef = await Test.createTestingModule({
            imports: [sqliteTestingModule(), ProductModule],
        }).compile();

        service = moduleRef.get(ProductPersistenceService);
        dataSource = moduleRef.get(DataSource);
    });

    afterEach(async () => {
        await moduleRef.close();
    });

    it('inserts products with derived columns and facets', async () => {
        const result = await service.upsertProducts(
            records([
                rawProduct(1, {
                    stock: 3,
                    tags: ['Audio', 'audio', ' wireless '],
                    reviews: [
                        { rating: 5, comment: 'Great', reviewerName: 'Sam', date: '2024-05-23T08:56:21.618Z' },
                    ],
                    dimensions: { width: 10, height: 20, depth: 3.5 },
                }),
            ]),
        );

        expect(result).toMatchObject({ inserted: 1, updated: 0, failed: [] });
        const product = await dataSource.getRepository(Product).findOneOrFail({
            where: { externalId: 1 },
            relations: { categories: true, tags: true, images: true, reviews: true, dimensions: true },
        });
        expect(result.productIds).toEqual([product.id]);
        expect(product.finalPrice).toBe(9);
        expect(product.availabilityStatus).toBe('low_stock');
        expect(product.categories.map((category) => category.slug)).toEqual(['smartphones']);
        expect(product.tags.map((tag) => tag.name).sort()).toEqual(['audio', 'wireless']);
        expect(product.images).toHaveLength(2);
        expect(product.images.filter((image) => image.isThumbnail)).toHaveLength(1);
        expect(product.reviews[0]).toMatchObject({ rating: 5, comment: 'Great', reviewerName: 'Sam' });
        expect(product.dimensions).toMatchObject({ width: 10, height: 20, depth: 3.5 });
    });

    it('is idempotent across repeated runs', async () => {
        const batch = records(rawProducts(10));

        const first = await service.upsertProducts(batch);
        const counts = async () => ({
            products: await dataSource.getRepository(Product).count(),
            categories: await dataSource.getRepository(Category).count(),
            images: await dataSource.getRepository(ProductImage).count(),
            tags: await dataSource.getRepository(ProductTag).count(),
        });
        const before = await counts();
        const second = await service.upsertProducts(batch);

        expect(first).toMatchObject({ inserted: 10, updated: 0 });
        expect(second).toMatchObject({ inserted: 0, updated: 10, failed: [] });
        expect(second.productIds).toEqual(first.productIds);
        expect(await counts()).toEqual(before);
        expect(before).toEqual({ products: 10, categories: 1, images: 20, tags: 10 });
    });

    it('keeps the valid records of a batch with one invalid record', async () => {
        const raw = rawProducts(10);
        raw[4] = rawProduct(5, { price: -1 });

        const result = await service.upsertProducts(records(raw));

        expect(result.inserted).toBe(9);
        expect(result.failed).toEqual([
            {
                externalId: 5,
                sku: 'SKU-5',
                reason: 'Invalid product: price: price must not be less than 0',
            },
        ]);
        expect(await dataSource.getRepository(Product).count()).toBe(9);
    });

    it('reports a record whose SKU belongs to another product', async () => {
        await service.upsertProducts(records([rawProduct(1)]));

        const result = await service.upsertProducts(records([rawProduct(2, { sku: 'SKU-1' })]));

        expect(result.inserted).toBe(0);
        expect(result.failed).toEqual([
            { externalId: 2, sku: 'SKU-1', reason: 'SKU SKU-1 already belongs to product 1' },
        ]);
    });

    it('shares categories by slug', async () => {
        await service.upsertProducts(
            records([
                rawProduct(1, { category: 'Home Decoration' }),
                rawProduct(2, { category: 'home decoration' }),
            ]),
        );

        const categories = await dataSource.getRepository(Category).find();
        expect(categories).toHaveLength(1);
        expect(categories[0]).toMatchObject({ name: 'Home Decoration', slug: 'home-decoration' });
    });

    it('replaces facets on update', async () => {
        await service.upsertProducts(
            records([rawProduct(1, { tags: ['old'], dimensions: { width: 1, height: 1, depth: 1 } })]),
        );

        await service.upsertProducts(records([rawProduct(1, { tags: ['new'], price: 20 })]));

        const product = await dataSource.getRepository(Product).findOneOrFail({
            where: { externalId: 1 },
            relations: { tags: true },
        });
        expect(product.tags.map((tag) => tag.name)).toEqual(['new']);
        expect(product.finalPrice).toBe(18);
        expect(await dataSource.getRepository(ProductDimensions).count()).toBe(0);
        expect(await dataSource.getRepository(ProductReview).count()).toBe(0);
    });
});
