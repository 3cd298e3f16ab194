import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { DataSource, DeepPartial, EntityManager, In, QueryFailedError } from 'typeorm';
import { SourceRecord } from '../../catalog-source/catalog-source.types';
import { SourceProductDto } from '../../catalog-source/dto/source-product.dto';
import { PersistenceConflict } from '../../common/errors/catalog.errors';
import {
    computeFinalPrice,
    deriveAvailability,
    slugify,
} from '../../common/utils/catalog.util';
import { errorMessage } from '../../common/utils/error.util';
import {
    Category,
    Product,
    ProductDimensions,
    ProductImage,
    ProductReview,
    ProductTag,
} from '../entities';

export interface UpsertFailure {
    externalId: number | null;
    sku: string | null;
    reason: string;
}

export interface UpsertResult {
    inserted: number;
    updated: number;
    failed: UpsertFailure[];
    /** Internal ids of every product written by this call, in input order. */
    productIds: number[];
}

const UNIQUE_VIOLATION_CODES = new Set([
    '23505', // postgres
    'SQLITE_CONSTRAINT_UNIQUE',
    'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

function flattenViolations(errors: ValidationError[], parent = ''): string[] {
    return errors.flatMap((error) => {
        const property = parent ? `${parent}.${error.property}` : error.property;
        const own = Object.values(error.constraints ?? {}).map(
            (message) => `${property}: ${message}`,
        );
        return [...own, ...flattenViolations(error.children ?? [], property)];
    });
}

function identityOf(record: SourceRecord): Pick<UpsertFailure, 'externalId' | 'sku'> {
    const { externalId, sku } = record;
    return {
        externalId: typeof externalId === 'number' ? externalId : null,
        sku: typeof sku === 'string' ? sku : null,
    };
}

function isUniqueViolation(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) return false;
    const { driverError } = error;
    return (
        typeof driverError === 'object' &&
        driverError !== null &&
        'code' in driverError &&
        typeof driverError.code === 'string' &&
        UNIQUE_VIOLATION_CODES.has(driverError.code)
    );
}

@Injectable()
export class ProductPersistenceService {
    private readonly logger = new Logger(ProductPersistenceService.name);

    constructor(private readonly dataSource: DataSource) {}

    /**
     * Validates and upserts each record in its own transaction. A bad record is
     * rolled back and reported in `failed`; the rest of the batch still commits.
     */
    async upsertProducts(records: readonly SourceRecord[]): Promise<UpsertResult> {
        const result: UpsertResult = {
            inserted: 0,
            updated: 0,
            failed: [],
            productIds: [],
        };

        for (const record of records) {
            const dto = plainToInstance(SourceProductDto, record);
            const violations = await validate(dto, { whitelist: true });
            if (violations.length > 0) {
                result.failed.push({
                    ...identityOf(record),
                    reason: `Invalid product: ${flattenViolations(violations).join('; ')}`,
                });
                continue;
            }

            try {
                const { productId, created } = await this.upsertOne(dto);
                result.productIds.push(productId);
                if (created) {
                    result.inserted++;
                } else {
                    result.updated++;
                }
            } catch (error) {
                const conflict =
                    error instanceof PersistenceConflict
                        ? error
                        : isUniqueViolation(error)
                          ? new PersistenceConflict(
                                `Unique constraint violated for product ${dto.externalId}: ${errorMessage(error)}`,
                                dto.externalId,
                                { cause: error },
                            )
                          : undefined;
                const reason = conflict ? conflict.message : errorMessage(error);
                this.logger.warn(`Product ${dto.externalId} not saved: ${reason}`);
                result.failed.push({
                    externalId: dto.externalId,
                    sku: dto.sku ?? null,
                    reason,
                });
            }
        }

        this.logger.log(
            `Upserted ${records.length} products: ${result.inserted} inserted, ${result.updated} updated, ${result.failed.length} failed`,
        );
        return result;
    }

    private async upsertOne(
        dto: SourceProductDto,
    ): Promise<{ productId: number; created: boolean }> {
        const queryRunner = this.dataSource.createQueryRunner();
        await queryRunner.connect();
        await queryRunner.startTransaction();

        try {
            const manager = queryRunner.manager;
            // Categories first, so the product can always resolve them.
            const categories = await this.upsertCategories(manager, dto.categories ?? []);

            const existing = await this.findExisting(manager, dto);
            const product = manager.merge(
                Product,
                existing ?? manager.create(Product),
                this.toColumns(dto),
            );
            product.categories = categories;
            const saved = await manager.save(Product, product);

            await this.replaceFacets(manager, saved.id, dto);

            await queryRunner.commitTransaction();
            return { productId: saved.id, created: existing === null };
        } catch (error) {
            await queryRunner.rollbackTransaction();
            throw error;
        } finally {
            await queryRunner.release();
        }
    }

    private async findExisting(
        manager: EntityManager,
        dto: SourceProductDto,
    ): Promise<Product | null> {
        const byExternalId = await manager.findOne(Product, {
            where: { externalId: dto.externalId },
        });
        if (byExternalId || !dto.sku) {
            return byExternalId;
        }

        const bySku = await manager.findOne(Product, { where: { sku: dto.sku } });
        if (bySku) {
            throw new PersistenceConflict(
                `SKU ${dto.sku} already belongs to product ${bySku.externalId}`,
                dto.externalId,
            );
        }
        return null;
    }

    private async upsertCategories(
        manager: EntityManager,
        names: string[],
    ): Promise<Category[]> {
        const bySlug = new Map<string, string>();
        for (const raw of names) {
            const name = raw.trim();
            const slug = slugify(name);
            if (slug && !bySlug.has(slug)) {
                bySlug.set(slug, name);
            }
        }
        if (bySlug.size === 0) {
            return [];
        }

        await manager
            .createQueryBuilder()
            .insert()
            .into(Category)
            .values([...bySlug].map(([slug, name]) => ({ slug, name })))
            .orIgnore()
            .execute();

        return manager.find(Category, {
            where: { slug: In([...bySlug.keys()]) },
            order: { slug: 'ASC' },
        });
    }

    private toColumns(dto: SourceProductDto): DeepPartial<Product> {
        const discountPercentage = dto.discountPercentage ?? 0;
        return {
            externalId: dto.externalId,
            title: dto.title.trim(),
            description: dto.description ?? null,
            price: dto.price,
            discountPercentage,
            finalPrice: computeFinalPrice(dto.price, discountPercentage),
            rating: dto.rating ?? 0,
            stock: dto.stock,
            brand: dto.brand?.trim() || null,
            sku: dto.sku?.trim() || null,
            availabilityStatus: deriveAvailability(dto.stock),
            weight: dto.weight ?? null,
            warrantyInformation: dto.warrantyInformation ?? null,
            shippingInformation: dto.shippingInformation ?? null,
            returnPolicy: dto.returnPolicy ?? null,
            minimumOrderQuantity: dto.minimumOrderQuantity ?? 1,
            thumbnail: dto.thumbnail ?? null,
            barcode: dto.barcode ?? null,
            qrCode: dto.qrCode ?? null,
        };
    }

    /** Facets have no identity of their own: drop the old set, write the new one. */
    private async replaceFacets(
        manager: EntityManager,
        productId: number,
        dto: SourceProductDto,
    ): Promise<void> {
        await manager.delete(ProductImage, { productId });
        await manager.delete(ProductTag, { productId });
        await manager.delete(ProductReview, { productId });
        await manager.delete(ProductDimensions, { productId });

        const urls = [...new Set(dto.images ?? [])];
        const images = urls.map((url, position) => ({
            productId,
            url,
            position,
            isThumbnail: false,
        }));
        if (dto.thumbnail) {
            images.push({
                productId,
                url: dto.thumbnail,
                position: images.length,
                isThumbnail: true,
            });
        }
        if (images.length > 0) {
            await manager.insert(ProductImage, images);
        }

        const tags = [
            ...new Set(
                (dto.tags ?? [])
                    .map((tag) => tag.trim().toLowerCase())
                    .filter((tag) => tag.length > 0),
            ),
        ];
        if (tags.length > 0) {
            await manager.insert(
                ProductTag,
                tags.map((name) => ({ productId, name })),
            );
        }

        const reviews = dto.reviews ?? [];
        if (reviews.length > 0) {
            await manager.insert(
                ProductReview,
                reviews.map((review) => ({
                    productId,
                    rating: review.rating,
                    comment: review.comment ?? null,
                    reviewerName: review.reviewerName ?? null,
                    reviewerEmail: review.reviewerEmail ?? null,
                    reviewedAt: review.reviewedAt ? new Date(review.reviewedAt) : null,
                })),
            );
        }

        if (dto.dimensions) {
            await manager.insert(ProductDimensions, {
                productId,
                width: dto.dimensions.width,
                height: dto.dimensions.height,
                depth: dto.dimensions.depth,
            });
        }
    }
}
