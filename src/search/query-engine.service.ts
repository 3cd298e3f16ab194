import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SearchUnavailable } from '../common/errors/catalog.errors';
import { resolvePage } from '../common/utils/catalog.util';
import { errorMessage } from '../common/utils/error.util';
import { ProductQueryService } from '../product/services/product-query.service';
import { CategorySummary, ProductDetail } from '../product/types/product-view.types';
import { SEARCH_BACKEND, SearchBackend } from './search-backend.interface';
import { documentToSummary } from './search-document.mapper';
import { SearchParams, SearchQuery, SearchResult } from './search.types';

const DEFAULT_SUGGESTIONS = 5;
const MAX_SUGGESTIONS = 20;

@Injectable()
export class QueryEngineService {
    private readonly logger = new Logger(QueryEngineService.name);
    private readonly timeoutMs: number;

    constructor(
        @Inject(SEARCH_BACKEND) private readonly backend: SearchBackend,
        private readonly productQueryService: ProductQueryService,
        configService: ConfigService,
    ) {
        this.timeoutMs = configService.get<number>('SEARCH_TIMEOUT_MS', 2000);
    }

    async search(params: SearchParams): Promise<SearchResult> {
        const { page, perPage, offset } = resolvePage(params.page, params.perPage);
        const query: SearchQuery = {
            text: params.text?.trim() || undefined,
            category: params.category || undefined,
            brand: params.brand || undefined,
            minPrice: params.minPrice,
            maxPrice: params.maxPrice,
            useWildcard: params.useWildcard ?? false,
            sort: params.sort ?? 'relevance',
            offset,
            limit: perPage,
        };

        try {
            const result = await this.withDeadline(this.backend.search(query));
            return {
                items: result.documents.map(documentToSummary),
                total: result.total,
                page,
                perPage,
                facets: result.facets,
                degraded: false,
            };
        } catch (error) {
            if (error instanceof SearchUnavailable) {
                this.logger.warn(`Serving search from the relational store: ${error.message}`);
            } else {
                this.logger.error(`Search backend failed, falling back: ${errorMessage(error)}`);
            }
        }

        const fallback = await this.productQueryService.fallbackSearch({
            text: query.text,
            category: query.category,
            brand: query.brand,
            minPrice: query.minPrice,
            maxPrice: query.maxPrice,
            sort: query.sort,
            page,
            perPage,
        });
        return { ...fallback, degraded: true };
    }

    listByCategory(slug: string, page?: number, perPage?: number): Promise<SearchResult> {
        return this.search({ category: slug, page, perPage });
    }

    getById(id: number): Promise<ProductDetail | null> {
        return this.productQueryService.getById(id);
    }

    listCategories(): Promise<CategorySummary[]> {
        return this.productQueryService.listCategories();
    }

    /** Title completions for a typed prefix. Empty when the backend cannot answer. */
    async suggest(text: string, size = DEFAULT_SUGGESTIONS): Promise<string[]> {
        const prefix = text.trim();
        if (!prefix) {
            return [];
        }
        const limit = Math.min(Math.max(1, Math.floor(size)), MAX_SUGGESTIONS);
        try {
            return await this.withDeadline(this.backend.suggest(prefix, limit));
        } catch (error) {
            this.logger.warn(`No suggestions for "${prefix}": ${errorMessage(error)}`);
            return [];
        }
    }

    private async withDeadline<T>(pending: Promise<T>): Promise<T> {
        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(
                () =>
                    reject(
                        new SearchUnavailable(
                            `Search backend did not answer within ${this.timeoutMs}ms`,
                        ),
                    ),
                this.timeoutMs,
            );
        });
        try {
            return await Promise.race([pending, deadline]);
        } finally {
            clearTimeout(timer);
        }
    }
}
