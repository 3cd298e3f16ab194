import { Module } from '@nestjs/common';
import { CatalogSourceModule } from '../catalog-source/catalog-source.module';
import { ProductModule } from '../product/product.module';
import { SearchModule } from '../search/search.module';
import { IngestionOrchestratorService } from './ingestion-orchestrator.service';
import { IngestionScheduler } from './ingestion.scheduler';

@Module({
    imports: [CatalogSourceModule, ProductModule, SearchModule],
    providers: [IngestionOrchestratorService, IngestionScheduler],
    exports: [IngestionOrchestratorService],
})
export class IngestionModule {}
