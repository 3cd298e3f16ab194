import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { errorMessage, errorStack } from '../common/utils/error.util';
import { IngestionOrchestratorService } from './ingestion-orchestrator.service';

@Injectable()
export class IngestionScheduler {
    private readonly logger = new Logger(IngestionScheduler.name);
    private readonly enabled: boolean;

    constructor(
        private readonly orchestrator: IngestionOrchestratorService,
        configService: ConfigService,
    ) {
        this.enabled = configService.get<boolean>('INGESTION_SCHEDULE_ENABLED', false);
    }

    @Cron(CronExpression.EVERY_6_HOURS)
    async handleScheduledIngestion(): Promise<void> {
        if (!this.enabled) {
            return;
        }
        if (this.orchestrator.isRunning) {
            this.logger.warn('Previous ingestion run still active, skipping this tick');
            return;
        }

        this.logger.log('Running scheduled catalog ingestion');
        try {
            const report = await this.orchestrator.run();
            if (report.needsReindex) {
                this.logger.warn(
                    `Run ${report.runId} left ${report.indexFailures.length} products unindexed; a reindex is due`,
                );
            }
        } catch (error) {
            this.logger.error(
                `Scheduled ingestion failed: ${errorMessage(error)}`,
                errorStack(error),
            );
        }
    }
}
