import { ConfigurationError } from '../common/errors/catalog.errors';
import { enabledLogLevels, validate } from './env.validation';

describe('validate', () => {
    const required = {
        POSTGRES_HOST: 'localhost',
        POSTGRES_USER: 'catalog',
        POSTGRES_NAME: 'catalog',
        ELASTICSEARCH_HOST: 'http://localhost:9200',
    };

    it('applies defaults and coerces types', () => {
        const config = validate({ ...required, CATALOG_PAGE_SIZE: '50', CACHE_ENABLED: 'false' });

        expect(config).toMatchObject({
            POSTGRES_PORT: 5432,
            POSTGRES_PASSWORD: '',
            TYPEORM_SYNCHRONIZE: false,
            ELASTICSEARCH_INDEX: 'products',
            SEARCH_TIMEOUT_MS: 2000,
            INDEX_BULK_CHUNK_SIZE: 500,
            CATALOG_API_URL: 'https://dummyjson.com/products',
            CATALOG_PAGE_SIZE: 50,
            CACHE_ENABLED: false,
            CACHE_MAX_AGE_MS: 21_600_000,
            INGESTION_CONCURRENCY: 2,
            INGESTION_DEADLINE_MS: 0,
            LOG_LEVEL: 'log',
        });
    });

    it('reports every problem at once', () => {
        let caught: unknown;
        try {
            validate({ POSTGRES_HOST: 'localhost', SEARCH_TIMEOUT_MS: 'soon' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        const message = caught instanceof Error ? caught.message : '';
        expect(message).toContain('"POSTGRES_USER" is required');
        expect(message).toContain('"POSTGRES_NAME" is required');
        expect(message).toContain('"ELASTICSEARCH_HOST" is required');
        expect(message).toContain('"SEARCH_TIMEOUT_MS" must be a number');
    });

    it('rejects unknown log levels', () => {
        expect(() => validate({ ...required, LOG_LEVEL: 'trace' })).toThrow(ConfigurationError);
    });
});

describe('enabledLogLevels', () => {
    it('enables every level up to the configured one', () => {
        expect(enabledLogLevels('error')).toEqual(['error']);
        expect(enabledLogLevels('log')).toEqual(['error', 'warn', 'log']);
        expect(enabledLogLevels('verbose')).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
    });
});
