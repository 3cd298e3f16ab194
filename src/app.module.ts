import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { validate } from './config/env.validation';
import { typeOrmOptionsFactory } from './config/typeorm.config';
import { IngestionModule } from './ingestion/ingestion.module';
import { ProductModule } from './product/product.module';
import { SearchModule } from './search/search.module';

@Module({
    imports: [
        ConfigModule.forRoot({
            isGlobal: true,
            envFilePath: '.env',
            validate,
        }),
        TypeOrmModule.forRootAsync({
            inject: [ConfigService],
            useFactory: typeOrmOptionsFactory,
        }),
        ScheduleModule.forRoot(),
        ProductModule,
        SearchModule,
        IngestionModule,
    ],
})
export class AppModule {}
