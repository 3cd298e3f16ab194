import * as Joi from 'joi';
import { ConfigurationError } from '../common/errors/catalog.errors';

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

export const envSchema = Joi.object({
    POSTGRES_HOST: Joi.string().required(),
    POSTGRES_PORT: Joi.number().port().default(5432),
    POSTGRES_USER: Joi.string().required(),
    POSTGRES_PASSWORD: Joi.string().allow('').default(''),
    POSTGRES_NAME: Joi.string().required(),
    TYPEORM_SYNCHRONIZE: Joi.boolean().default(false),

    ELASTICSEARCH_HOST: Joi.string().uri().required(),
    ELASTICSEARCH_USERNAME: Joi.string().allow('').optional(),
    ELASTICSEARCH_PASSWORD: Joi.string().allow('').optional(),
    ELASTICSEARCH_INDEX: Joi.string().default('products'),
    SEARCH_TIMEOUT_MS: Joi.number().integer().min(1).default(2000),
    INDEX_BULK_CHUNK_SIZE: Joi.number().integer().min(1).default(500),

    CATALOG_API_URL: Joi.string().uri().default('https://dummyjson.com/products'),
    CATALOG_PAGE_SIZE: Joi.number().integer().min(1).max(1000).default(100),
    CATALOG_REQUEST_TIMEOUT_MS: Joi.number().integer().min(1).default(30000),
    CATALOG_FETCH_MAX_ATTEMPTS: Joi.number().integer().min(1).default(3),
    CATALOG_FETCH_BASE_DELAY_MS: Joi.number().integer().min(0).default(200),
    CATALOG_FETCH_MAX_DELAY_MS: Joi.number().integer().min(0).default(5000),
    CACHE_DIR: Joi.string().default('.cache/catalog'),
    CACHE_ENABLED: Joi.boolean().default(true),
    CACHE_MAX_AGE_MS: Joi.number().integer().min(0).default(21_600_000),

    INGESTION_CONCURRENCY: Joi.number().integer().min(1).max(16).default(2),
    INGESTION_DEADLINE_MS: Joi.number().integer().min(0).default(0),
    INGESTION_SCHEDULE_ENABLED: Joi.boolean().default(false),

    LOG_LEVEL: Joi.string()
        .valid(...LOG_LEVELS)
        .default('log'),
});

/**
 * `ConfigModule` validate hook. Returns the coerced values so numeric and
 * boolean keys come out of `ConfigService` typed.
 */
export function validate(config: Record<string, unknown>): Record<string, unknown> {
    const { error, value } = envSchema.validate(config, {
        abortEarly: false,
        allowUnknown: true,
    });
    if (error) {
        throw new ConfigurationError(
            `Invalid configuration: ${error.details.map((detail) => detail.message).join('; ')}`,
        );
    }
    return value;
}

/** Levels enabled at `level`, lowest severity last. */
export function enabledLogLevels(level: LogLevelName): LogLevelName[] {
    return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}

export function isLogLevelName(value: unknown): value is LogLevelName {
    return LOG_LEVELS.some((level) => level === value);
}
