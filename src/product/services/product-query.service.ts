import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, In, Repository, SelectQueryBuilder } from 'typeorm';
import { resolvePage } from '../../common/utils/catalog.util';
import { Category, Product } from '../entities';
import { toProductDetail, toProductSummary } from '../product.mapper';
import {
    CategorySummary,
    Page,
    ProductDetail,
    ProductFilterQuery,
    ProductSort,
    ProductSummary,
} from '../types/product-view.types';

function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

/** Read-only access to the relational store. */
@Injectable()
export class ProductQueryService {
    private readonly logger = new Logger(ProductQueryService.name);

    constructor(
        @InjectRepository(Product)
        private readonly productRepository: Repository<Product>,
        @InjectRepository(Category)
        private readonly categoryRepository: Repository<Category>,
    ) {}

    async getById(id: number): Promise<ProductDetail | null> {
        const product = await this.productRepository.findOne({
            where: { id },
            relations: {
                categories: true,
                tags: true,
                images: true,
                reviews: true,
                dimensions: true,
            },
        });

        if (!product) {
            this.logger.warn(`Product not found: ${id}`);
            return null;
        }
        return toProductDetail(product);
    }

    /** Every category ordered by name, with how many products it holds. */
    async listCategories(): Promise<CategorySummary[]> {
        const rows = await this.categoryRepository
            .createQueryBuilder('category')
            .leftJoin('category.products', 'product')
            .select('category.name', 'name')
            .addSelect('category.slug', 'slug')
            .addSelect('COUNT(product.id)', 'productCount')
            .groupBy('category.id')
            .addGroupBy('category.name')
            .addGroupBy('category.slug')
            .orderBy('category.name', 'ASC')
            .getRawMany<{ name: string; slug: string; productCount: number | string }>();

        return rows.map((row) => ({
            name: row.name,
            slug: row.slug,
            productCount: Number(row.productCount),
        }));
    }

    /**
     * Filter + substring search straight against the relational store. Serves
     * queries while the search backend is down.
     */
    async fallbackSearch(query: ProductFilterQuery): Promise<Page<ProductSummary>> {
        const window = resolvePage(query.page, query.perPage);
        const qb = this.productRepository.createQueryBuilder('product');

        if (query.category) {
            qb.andWhere(
                `product.id IN (SELECT pc.product_id FROM product_categories pc ` +
                    `INNER JOIN categories c ON c.id = pc.category_id WHERE c.slug = :category)`,
                { category: query.category },
            );
        }
        if (query.brand) {
            qb.andWhere('product.brand = :brand', { brand: query.brand });
        }
        if (query.minPrice !== undefined) {
            qb.andWhere('product.finalPrice >= :minPrice', { minPrice: query.minPrice });
        }
        if (query.maxPrice !== undefined) {
            qb.andWhere('product.finalPrice <= :maxPrice', { maxPrice: query.maxPrice });
        }
        const text = query.text?.trim().toLowerCase();
        if (text) {
            const pattern = `%${escapeLike(text)}%`;
            qb.andWhere(
                new Brackets((where) => {
                    where
                        .where("LOWER(product.title) LIKE :pattern ESCAPE '\\'", { pattern })
                        .orWhere("LOWER(product.description) LIKE :pattern ESCAPE '\\'", {
                            pattern,
                        });
                }),
            );
        }

        const total = await qb.getCount();
        if (window.offset >= total) {
            return { items: [], total, page: window.page, perPage: window.perPage };
        }

        const rows = await this.applySort(qb, query.sort ?? 'relevance')
            .select('product.id', 'id')
            .offset(window.offset)
            .limit(window.perPage)
            .getRawMany<{ id: number }>();
        const products = await this.findForIndexing(rows.map((row) => Number(row.id)));

        return {
            items: products.map(toProductSummary),
            total,
            page: window.page,
            perPage: window.perPage,
        };
    }

    /** Loads rows with what the search projection needs, keeping `ids` order. */
    async findForIndexing(ids: readonly number[]): Promise<Product[]> {
        if (ids.length === 0) {
            return [];
        }
        const products = await this.productRepository.find({
            where: { id: In([...ids]) },
            relations: { categories: true, tags: true },
        });
        const byId = new Map(products.map((product) => [product.id, product]));
        return ids.flatMap((id) => {
            const product = byId.get(id);
            return product ? [product] : [];
        });
    }

    async findIndexingPage(offset: number, limit: number): Promise<Product[]> {
        const rows = await this.productRepository.find({
            select: { id: true },
            order: { id: 'ASC' },
            skip: offset,
            take: limit,
        });
        return this.findForIndexing(rows.map((row) => row.id));
    }

    private applySort(
        qb: SelectQueryBuilder<Product>,
        sort: ProductSort,
    ): SelectQueryBuilder<Product> {
        switch (sort) {
            case 'price_asc':
                qb.orderBy('product.finalPrice', 'ASC');
                break;
            case 'price_desc':
                qb.orderBy('product.finalPrice', 'DESC');
                break;
            case 'newest':
                qb.orderBy('product.createdAt', 'DESC');
                break;
            case 'rating_desc':
            case 'relevance':
                qb.orderBy('product.rating', 'DESC');
                break;
        }
        if (sort !== 'rating_desc' && sort !== 'relevance') {
            qb.addOrderBy('product.rating', 'DESC');
        }
        return qb.addOrderBy('product.id', 'ASC');
    }
}
