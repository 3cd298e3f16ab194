import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CATALOG_ENTITIES } from './entities';
import { ProductPersistenceService } from './services/product-persistence.service';
import { ProductQueryService } from './services/product-query.service';

@Module({
    imports: [TypeOrmModule.forFeature(CATALOG_ENTITIES)],
    providers: [ProductPersistenceService, ProductQueryService],
    exports: [ProductPersistenceService, ProductQueryService],
})
export class ProductModule {}
