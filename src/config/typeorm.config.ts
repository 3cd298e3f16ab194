import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';

export function typeOrmOptionsFactory(configService: ConfigService): TypeOrmModuleOptions {
    return {
        type: 'postgres',
        host: configService.getOrThrow<string>('POSTGRES_HOST'),
        port: configService.get<number>('POSTGRES_PORT', 5432),
        username: configService.getOrThrow<string>('POSTGRES_USER'),
        password: configService.get<string>('POSTGRES_PASSWORD', ''),
        database: configService.getOrThrow<string>('POSTGRES_NAME'),
        autoLoadEntities: true,
        synchronize: configService.get<boolean>('TYPEORM_SYNCHRONIZE', false),
    };
}
