import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import axios from 'axios';
import { ResponseCacheModule } from '../cache/response-cache.module';
import { CATALOG_HTTP, CatalogSourceService } from './catalog-source.service';

@Module({
    imports: [ConfigModule, ResponseCacheModule],
    providers: [
        {
            provide: CATALOG_HTTP,
            inject: [ConfigService],
            useFactory: (configService: ConfigService) =>
                axios.create({
                    timeout: configService.get<number>(
                        'CATALOG_REQUEST_TIMEOUT_MS',
                        30000,
                    ),
                    headers: { Accept: 'application/json' },
                }),
        },
        CatalogSourceService,
    ],
    exports: [CatalogSourceService],
})
export class CatalogSourceModule {}
