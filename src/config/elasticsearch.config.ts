import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client, ClientOptions } from '@elastic/elasticsearch';
import { errorMessage } from '../common/utils/error.util';

@Injectable()
export class ElasticsearchConfigService implements OnModuleInit, OnModuleDestroy {
    private readonly client: Client;
    private readonly logger = new Logger(ElasticsearchConfigService.name);

    constructor(private readonly configService: ConfigService) {
        const host = this.configService.getOrThrow<string>('ELASTICSEARCH_HOST');
        const username = this.configService.get<string>('ELASTICSEARCH_USERNAME');
        const password = this.configService.get<string>('ELASTICSEARCH_PASSWORD');

        const options: ClientOptions = {
            node: host,
            maxRetries: 2,
            requestTimeout: 60000,
        };
        if (username && password) {
            this.logger.log('Configuring Elasticsearch with authentication');
            options.auth = { username, password };
        } else {
            this.logger.log('Configuring Elasticsearch without authentication');
        }
        this.client = new Client(options);
    }

    async onModuleInit(): Promise<void> {
        await this.testConnection();
    }

    async onModuleDestroy(): Promise<void> {
        await this.client.close();
    }

    /** Startup probe only: an unreachable cluster is logged, reads fall back. */
    async testConnection(): Promise<void> {
        try {
            const info = await this.client.info();
            this.logger.log(`Connected to Elasticsearch cluster: ${info.cluster_name}`);
        } catch (error) {
            this.logger.error(`Failed to connect to Elasticsearch: ${errorMessage(error)}`);
            this.logger.warn('Search will be served from the relational store until it is reachable');
        }
    }

    getClient(): Client {
        return this.client;
    }
}
