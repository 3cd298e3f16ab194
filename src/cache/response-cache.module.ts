import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ResponseCache } from './response-cache';

@Module({
    imports: [ConfigModule],
    providers: [
        {
            provide: ResponseCache,
            inject: [ConfigService],
            useFactory: (configService: ConfigService) =>
                ResponseCache.open(
                    configService.get<string>('CACHE_DIR', '.cache/catalog'),
                ),
        },
    ],
    exports: [ResponseCache],
})
export class ResponseCacheModule {}
