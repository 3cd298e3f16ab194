import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { errorMessage, errorStack } from './common/utils/error.util';
import { enabledLogLevels, isLogLevelName } from './config/env.validation';
import { IngestionOrchestratorService } from './ingestion/ingestion-orchestrator.service';
import { IngestionState } from './ingestion/ingestion.types';
import { IndexerService } from './search/indexer.service';

type Command = 'once' | 'reindex' | 'serve';

function parseCommand(argv: string[]): Command {
    if (argv.includes('--once')) return 'once';
    if (argv.includes('--reindex')) return 'reindex';
    return 'serve';
}

async function bootstrap(): Promise<number> {
    const logger = new Logger('Bootstrap');
    const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
    const level = app.get(ConfigService).get<string>('LOG_LEVEL', 'log');
    app.useLogger(enabledLogLevels(isLogLevelName(level) ? level : 'log'));
    app.flushLogs();
    app.enableShutdownHooks();

    const command = parseCommand(process.argv.slice(2));
    if (command === 'serve') {
        logger.log('Catalog sync running; waiting for scheduled ingestion');
        return 0;
    }

    try {
        if (command === 'reindex') {
            const report = await app.get(IndexerService).reindexAll();
            return report.failed.length > 0 ? 1 : 0;
        }

        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort());
        process.once('SIGTERM', () => controller.abort());
        const report = await app.get(IngestionOrchestratorService).run({
            signal: controller.signal,
        });
        return report.state === IngestionState.ABORTED ? 1 : 0;
    } finally {
        await app.close();
    }
}

bootstrap().then(
    (code) => {
        if (code !== 0) {
            process.exitCode = code;
        }
    },
    (error: unknown) => {
        new Logger('Bootstrap').error(`Fatal: ${errorMessage(error)}`, errorStack(error));
        process.exitCode = 1;
    },
);
