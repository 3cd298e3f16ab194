import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { CatalogSourceService } from '../catalog-source/catalog-source.service';
import { RawProductBatch } from '../catalog-source/catalog-source.types';
import {
    FetchError,
    IngestionInProgressError,
    isFetchError,
} from '../common/errors/catalog.errors';
import { errorMessage } from '../common/utils/error.util';
import { ProductPersistenceService } from '../product/services/product-persistence.service';
import { ProductQueryService } from '../product/services/product-query.service';
import { IndexerService } from '../search/indexer.service';
import { transition } from './batch-state';
import {
    BatchReport,
    FetchFailure,
    IngestionRunOptions,
    IngestionState,
    RunReport,
} from './ingestion.types';

interface WorkerPlan {
    worker: number;
    startOffset: number;
    limit: number;
    stride: number;
    total: number | null;
}

function toFetchFailure(error: FetchError): FetchFailure {
    return { offset: error.offset, status: error.status, reason: error.message };
}

@Injectable()
export class IngestionOrchestratorService {
    private readonly logger = new Logger(IngestionOrchestratorService.name);
    private readonly concurrency: number;
    private readonly deadlineMs: number;
    private running = false;

    constructor(
        private readonly catalogSource: CatalogSourceService,
        private readonly persistence: ProductPersistenceService,
        private readonly productQueryService: ProductQueryService,
        private readonly indexer: IndexerService,
        configService: ConfigService,
    ) {
        this.concurrency = Math.max(1, configService.get<number>('INGESTION_CONCURRENCY', 2));
        this.deadlineMs = configService.get<number>('INGESTION_DEADLINE_MS', 0);
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * One fetch → persist → index pass over the catalog. Rejects with
     * `IngestionInProgressError` while another run is active.
     */
    async run(options: IngestionRunOptions = {}): Promise<RunReport> {
        if (this.running) {
            throw new IngestionInProgressError();
        }
        this.running = true;
        try {
            return await this.execute(options);
        } finally {
            this.running = false;
        }
    }

    private async execute(options: IngestionRunOptions): Promise<RunReport> {
        const runId = uuidv4();
        const startedAt = new Date();
        const controller = new AbortController();
        let abortReason: string | undefined;
        const abort = (reason: string) => {
            if (!controller.signal.aborted) {
                abortReason = reason;
                controller.abort();
            }
        };

        const onCancel = () => abort('cancelled');
        if (options.signal?.aborted) {
            onCancel();
        }
        options.signal?.addEventListener('abort', onCancel, { once: true });
        const deadlineMs = options.deadlineMs ?? this.deadlineMs;
        const timer =
            deadlineMs > 0
                ? setTimeout(() => abort(`deadline of ${deadlineMs}ms passed`), deadlineMs)
                : undefined;

        this.logger.log(`Ingestion run ${runId} started`);
        try {
            let needsReindex = false;
            try {
                await this.indexer.ensureMapping();
            } catch (error) {
                needsReindex = true;
                this.logger.error(
                    `Run ${runId}: could not ensure the index mapping: ${errorMessage(error)}`,
                );
            }

            const batches: BatchReport[] = [];
            const startOffset = options.startOffset ?? 0;
            let total: number | null = null;

            if (!controller.signal.aborted) {
                let first: RawProductBatch | undefined;
                try {
                    first = await this.catalogSource.fetchPage(startOffset);
                } catch (error) {
                    if (!isFetchError(error)) throw error;
                    this.logger.error(`Run ${runId}: first page failed: ${error.message}`);
                    batches.push(this.fetchFailureReport(error, IngestionState.ABORTED));
                    abort(`first page could not be fetched: ${error.message}`);
                }

                if (first && !controller.signal.aborted) {
                    total = first.total;
                    batches.push(await this.processBatch(first));

                    const plans = this.planWorkers(first, startOffset);
                    if (plans.length > 0 && !controller.signal.aborted) {
                        batches.push(...(await this.runWorkers(plans, controller.signal)));
                    }
                }
            }

            return this.summarize({
                runId,
                startedAt,
                total,
                batches: batches.sort((a, b) => a.offset - b.offset),
                needsReindex,
                abortReason,
            });
        } finally {
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', onCancel);
        }
    }

    /**
     * Pages after the first, dealt round-robin: worker w takes pages w, w+n,
     * w+2n... When the source reports a total but serves fewer records than
     * asked, the page size it actually serves becomes the step.
     */
    private planWorkers(first: RawProductBatch, startOffset: number): WorkerPlan[] {
        const received = first.records.length;
        const exhausted =
            first.total === null
                ? received < first.limit
                : received === 0 || startOffset + received >= first.total;
        if (exhausted) {
            return [];
        }

        const limit = first.total === null ? first.limit : Math.min(first.limit, received);
        if (limit < first.limit) {
            this.logger.log(`Catalog serves ${limit} records per page; paging by ${limit}`);
        }

        const plans: WorkerPlan[] = [];
        for (let worker = 0; worker < this.concurrency; worker++) {
            const offset = startOffset + (worker + 1) * limit;
            if (first.total !== null && offset >= first.total) break;
            plans.push({
                worker,
                startOffset: offset,
                limit,
                stride: this.concurrency,
                total: first.total,
            });
        }
        return plans;
    }

    private async runWorkers(plans: WorkerPlan[], signal: AbortSignal): Promise<BatchReport[]> {
        const settled = await Promise.allSettled(
            plans.map((plan) => this.runWorker(plan, signal)),
        );
        const reports: BatchReport[] = [];
        for (const outcome of settled) {
            if (outcome.status === 'rejected') {
                throw outcome.reason;
            }
            reports.push(...outcome.value);
        }
        return reports;
    }

    /**
     * Consumes one round-robin stream. A failed page is reported and the stream
     * resumes at this worker's next page; without a known total the worker
     * stops instead, since it cannot tell where the catalog ends.
     */
    private async runWorker(plan: WorkerPlan, signal: AbortSignal): Promise<BatchReport[]> {
        const reports: BatchReport[] = [];
        const step = plan.limit * plan.stride;
        let offset = plan.startOffset;

        while (!signal.aborted) {
            try {
                for await (const batch of this.catalogSource.batches({
                    startOffset: offset,
                    limit: plan.limit,
                    stride: plan.stride,
                    signal,
                })) {
                    if (signal.aborted) break;
                    reports.push(await this.processBatch(batch));
                    offset = batch.offset + step;
                }
                break;
            } catch (error) {
                if (!isFetchError(error)) throw error;
                this.logger.error(`Worker ${plan.worker}: ${error.message}`);
                reports.push(this.fetchFailureReport(error, IngestionState.PARTIALLY_FAILED));
                offset = error.offset + step;
                if (plan.total === null || offset >= plan.total) break;
            }
        }
        return reports;
    }

    private async processBatch(batch: RawProductBatch): Promise<BatchReport> {
        const report: BatchReport = {
            offset: batch.offset,
            state: transition(IngestionState.IDLE, IngestionState.FETCHING),
            fetched: batch.records.length,
            fromCache: batch.fromCache,
            inserted: 0,
            updated: 0,
            persistFailures: [],
            indexed: 0,
            indexFailures: [],
        };

        report.state = transition(report.state, IngestionState.PERSISTING);
        const upsert = await this.persistence.upsertProducts(batch.records);
        report.inserted = upsert.inserted;
        report.updated = upsert.updated;
        report.persistFailures = upsert.failed;

        report.state = transition(report.state, IngestionState.INDEXING);
        try {
            const products = await this.productQueryService.findForIndexing(upsert.productIds);
            const indexed = await this.indexer.indexBatch(products);
            report.indexed = indexed.succeeded.length;
            report.indexFailures = indexed.failed;
        } catch (error) {
            const reason = errorMessage(error);
            this.logger.error(`Indexing batch at offset ${batch.offset} failed: ${reason}`);
            report.indexFailures = upsert.productIds.map((id) => ({ id, reason }));
        }

        report.state = transition(
            report.state,
            report.persistFailures.length > 0
                ? IngestionState.PARTIALLY_FAILED
                : IngestionState.COMPLETED,
        );
        this.logger.verbose(`Batch at offset ${batch.offset} ${report.state}`);
        return report;
    }

    private fetchFailureReport(error: FetchError, outcome: IngestionState): BatchReport {
        return {
            offset: error.offset,
            state: transition(transition(IngestionState.IDLE, IngestionState.FETCHING), outcome),
            fetched: 0,
            fromCache: false,
            inserted: 0,
            updated: 0,
            persistFailures: [],
            indexed: 0,
            indexFailures: [],
            fetchFailure: toFetchFailure(error),
        };
    }

    private summarize(run: {
        runId: string;
        startedAt: Date;
        total: number | null;
        batches: BatchReport[];
        needsReindex: boolean;
        abortReason?: string;
    }): RunReport {
        const { batches } = run;
        const persistFailures = batches.flatMap((batch) => batch.persistFailures);
        const indexFailures = batches.flatMap((batch) => batch.indexFailures);
        const fetchFailures = batches.flatMap((batch) =>
            batch.fetchFailure ? [batch.fetchFailure] : [],
        );

        let state = IngestionState.COMPLETED;
        if (run.abortReason !== undefined) {
            state = IngestionState.ABORTED;
        } else if (batches.some((batch) => batch.state !== IngestionState.COMPLETED)) {
            state = IngestionState.PARTIALLY_FAILED;
        }

        const report: RunReport = {
            runId: run.runId,
            state,
            startedAt: run.startedAt,
            finishedAt: new Date(),
            total: run.total,
            batches,
            fetched: batches.reduce((sum, batch) => sum + batch.fetched, 0),
            inserted: batches.reduce((sum, batch) => sum + batch.inserted, 0),
            updated: batches.reduce((sum, batch) => sum + batch.updated, 0),
            persistFailures,
            fetchFailures,
            indexFailures,
            needsReindex: run.needsReindex || indexFailures.length > 0,
            abortReason: run.abortReason,
        };

        const message =
            `Ingestion run ${run.runId} ${state}: ${report.fetched} fetched, ` +
            `${report.inserted} inserted, ${report.updated} updated, ` +
            `${persistFailures.length} invalid, ${fetchFailures.length} pages failed, ` +
            `${indexFailures.length} not indexed`;
        if (state === IngestionState.COMPLETED) {
            this.logger.log(message);
        } else {
            this.logger.warn(run.abortReason ? `${message} (${run.abortReason})` : message);
        }
        return report;
    }
}
