import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { chunk } from '../common/utils/catalog.util';
import { errorMessage } from '../common/utils/error.util';
import { Product } from '../product/entities';
import { ProductQueryService } from '../product/services/product-query.service';
import { SEARCH_BACKEND, SearchBackend } from './search-backend.interface';
import { toSearchDocument } from './search-document.mapper';
import { IndexResult } from './search.types';

const REINDEX_PAGE_SIZE = 100;

export interface ReindexReport extends IndexResult {
    total: number;
}

@Injectable()
export class IndexerService {
    private readonly logger = new Logger(IndexerService.name);
    private readonly chunkSize: number;

    constructor(
        @Inject(SEARCH_BACKEND) private readonly backend: SearchBackend,
        private readonly productQueryService: ProductQueryService,
        configService: ConfigService,
    ) {
        this.chunkSize = configService.get<number>('INDEX_BULK_CHUNK_SIZE', 500);
    }

    async ensureMapping(): Promise<void> {
        await this.backend.ensureMapping();
    }

    /**
     * Projects and writes `products` chunk by chunk. A chunk whose bulk call
     * throws is reported as failed for every id in it; later chunks still run.
     */
    async indexBatch(products: readonly Product[]): Promise<IndexResult> {
        const result: IndexResult = { succeeded: [], failed: [] };

        for (const documents of chunk(products.map(toSearchDocument), this.chunkSize)) {
            try {
                const written = await this.backend.indexBatch(documents);
                result.succeeded.push(...written.succeeded);
                result.failed.push(...written.failed);
            } catch (error) {
                const reason = errorMessage(error);
                this.logger.error(`Index chunk of ${documents.length} documents failed: ${reason}`);
                result.failed.push(...documents.map((document) => ({ id: document.id, reason })));
            }
        }

        if (result.failed.length > 0) {
            this.logger.warn(
                `Indexed ${result.succeeded.length} documents, ${result.failed.length} failed`,
            );
        } else {
            this.logger.debug(`Indexed ${result.succeeded.length} documents`);
        }
        return result;
    }

    async reindexAll(): Promise<ReindexReport> {
        await this.ensureMapping();
        const report: ReindexReport = { total: 0, succeeded: [], failed: [] };

        for (let offset = 0; ; offset += REINDEX_PAGE_SIZE) {
            const products = await this.productQueryService.findIndexingPage(
                offset,
                REINDEX_PAGE_SIZE,
            );
            if (products.length === 0) {
                break;
            }
            const result = await this.indexBatch(products);
            report.total += products.length;
            report.succeeded.push(...result.succeeded);
            report.failed.push(...result.failed);
            if (products.length < REINDEX_PAGE_SIZE) {
                break;
            }
        }

        this.logger.log(
            `Reindexed ${report.total} products: ${report.succeeded.length} succeeded, ${report.failed.length} failed`,
        );
        return report;
    }
}
