import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errors } from '@elastic/elasticsearch';
import { IndexWriteError, SearchUnavailable } from '../../common/errors/catalog.errors';
import { errorMessage } from '../../common/utils/error.util';
import { ElasticsearchConfigService } from '../../config/elasticsearch.config';
import { SearchBackend } from '../search-backend.interface';
import {
    IndexResult,
    SearchBackendResult,
    SearchDocument,
    SearchQuery,
} from '../search.types';
import { PRODUCT_INDEX_PROPERTIES, PRODUCT_INDEX_SETTINGS } from './product-index.mapping';
import {
    buildSearchRequest,
    buildSuggestRequest,
    collectBulkResult,
    parseSearchResponse,
    parseSuggestions,
    ProductAggregations,
} from './product-search.query';

export function isUnavailableError(error: unknown): boolean {
    if (
        error instanceof errors.ConnectionError ||
        error instanceof errors.TimeoutError ||
        error instanceof errors.NoLivingConnectionsError
    ) {
        return true;
    }
    return error instanceof errors.ResponseError && (error.statusCode ?? 0) >= 500;
}

function isIndexAlreadyCreated(error: unknown): boolean {
    return (
        error instanceof errors.ResponseError &&
        error.message.includes('resource_already_exists_exception')
    );
}

@Injectable()
export class ElasticsearchSearchBackend implements SearchBackend {
    private readonly logger = new Logger(ElasticsearchSearchBackend.name);
    private readonly indexName: string;
    private readonly requestTimeout: number;

    constructor(
        private readonly elasticsearchConfigService: ElasticsearchConfigService,
        configService: ConfigService,
    ) {
        this.indexName = configService.get<string>('ELASTICSEARCH_INDEX', 'products');
        this.requestTimeout = configService.get<number>('SEARCH_TIMEOUT_MS', 2000);
    }

    async ensureMapping(): Promise<void> {
        const client = this.elasticsearchConfigService.getClient();
        const exists = await client.indices.exists({ index: this.indexName });

        if (!exists) {
            try {
                await client.indices.create({
                    index: this.indexName,
                    settings: PRODUCT_INDEX_SETTINGS,
                    mappings: { properties: PRODUCT_INDEX_PROPERTIES },
                });
                this.logger.log(`Index ${this.indexName} created`);
                return;
            } catch (error) {
                if (!isIndexAlreadyCreated(error)) {
                    throw error;
                }
            }
        }

        await client.indices.putMapping({
            index: this.indexName,
            properties: PRODUCT_INDEX_PROPERTIES,
        });
        this.logger.log(`Index ${this.indexName} mapping updated`);
    }

    async indexBatch(documents: SearchDocument[]): Promise<IndexResult> {
        if (documents.length === 0) {
            return { succeeded: [], failed: [] };
        }
        const client = this.elasticsearchConfigService.getClient();
        const operations = documents.flatMap((document) => [
            { index: { _index: this.indexName, _id: String(document.id) } },
            document,
        ]);

        try {
            const response = await client.bulk<SearchDocument>({ operations, refresh: true });
            return collectBulkResult(response, documents);
        } catch (error) {
            throw new IndexWriteError(
                `Bulk write of ${documents.length} documents failed: ${errorMessage(error)}`,
                undefined,
                { cause: error },
            );
        }
    }

    async search(query: SearchQuery): Promise<SearchBackendResult> {
        const client = this.elasticsearchConfigService.getClient();
        try {
            const response = await client.search<SearchDocument, ProductAggregations>(
                buildSearchRequest(this.indexName, query),
                { requestTimeout: this.requestTimeout },
            );
            return parseSearchResponse(response);
        } catch (error) {
            throw this.toSearchError(error);
        }
    }

    async suggest(prefix: string, size: number): Promise<string[]> {
        const client = this.elasticsearchConfigService.getClient();
        try {
            const response = await client.search<SearchDocument>(
                buildSuggestRequest(this.indexName, prefix, size),
                { requestTimeout: this.requestTimeout },
            );
            return parseSuggestions(response);
        } catch (error) {
            throw this.toSearchError(error);
        }
    }

    private toSearchError(error: unknown): unknown {
        if (isUnavailableError(error)) {
            return new SearchUnavailable(`Search backend unavailable: ${errorMessage(error)}`, {
                cause: error,
            });
        }
        return error;
    }
}
