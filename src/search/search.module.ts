import { Module } from '@nestjs/common';
import { ElasticsearchConfigService } from '../config/elasticsearch.config';
import { ProductModule } from '../product/product.module';
import { ElasticsearchSearchBackend } from './elasticsearch/elasticsearch-search.backend';
import { IndexerService } from './indexer.service';
import { QueryEngineService } from './query-engine.service';
import { SEARCH_BACKEND } from './search-backend.interface';

@Module({
    imports: [ProductModule],
    providers: [
        ElasticsearchConfigService,
        { provide: SEARCH_BACKEND, useClass: ElasticsearchSearchBackend },
        IndexerService,
        QueryEngineService,
    ],
    exports: [IndexerService, QueryEngineService],
})
export class SearchModule {}
