import { EmbeddedChunk, type Chunk } from '../../domain/entities/Chunk';
import type { InsertPayload, VectorStore } from '../../domain/entities/VectorStore';
import {
    ConfigurationError,
    DataIntegrityError,
    EmbeddingFailedError,
    IngestionCancelledError,
    ProviderTransientError,
    StoreError,
    type BatchContext,
} from '../../domain/errors/IngestionErrors';
import type { EmbeddingProvider } from '../providers/EmbeddingProvider';
import { AppError } from '../../domain/errors/AppError';
import { AbortError, sleep, type Sleep } from '../utils/sleep';
import logger from '../../infrastructure/logger';

export interface IngestionPipelineConfig {
    batchSize: number;
    embeddingDimension: number;
    retryDelayMs: number;
    idField: string;
    vectorField: string;
    textField: string;
}

export interface IngestOptions {
    signal?: AbortSignal;
}

export interface IngestionReport {
    chunks: number;
    batches: number;
    inserted: number;
}

/**
 * Splits any iterable into consecutive arrays of at most `size` items, preserving order.
 */
export function* partition<T>(items: Iterable<T>, size: number): Generator<T[], void, undefined> {
    let batch: T[] = [];
    for (const item of items) {
        batch.push(item);
        if (batch.length === size) {
            yield batch;
            batch = [];
        }
    }
    if (batch.length > 0) {
        yield batch;
    }
}

/**
 * Embeds chunks batch by batch and writes each batch to the vector store.
 *
 * Batches run strictly in sequence. Transient provider failures are retried forever
 * with a fixed delay; every other failure stops the run with the count of entities
 * already stored attached to the error.
 */
export class BatchedIngestionPipeline {
    constructor(
        private readonly embeddingProvider: EmbeddingProvider,
        private readonly vectorStore: VectorStore,
        private readonly config: IngestionPipelineConfig,
        private readonly wait: Sleep = sleep
    ) {
        this.validateConfig();
    }

    async ingest(chunks: Iterable<Chunk>, options: IngestOptions = {}): Promise<number> {
        const report = await this.run(chunks, options);
        return report.inserted;
    }

    async run(chunks: Iterable<Chunk>, { signal }: IngestOptions = {}): Promise<IngestionReport> {
        const startedAt = Date.now();
        const report: IngestionReport = { chunks: 0, batches: 0, inserted: 0 };

        for (const batch of partition(chunks, this.config.batchSize)) {
            const batchIndex = report.batches;
            const context: BatchContext = {
                batchIndex,
                chunkId: batch[0]?.id,
                insertedCount: report.inserted,
            };

            if (signal?.aborted) {
                throw new IngestionCancelledError(context);
            }

            logger.debug('Embedding batch', { batchIndex, size: batch.length });
            const vectors = await this.embedWithRetry(batch, context, signal);
            const embedded = this.validateVectors(batch, vectors, context);

            report.inserted += await this.insert(embedded, context);
            report.chunks += batch.length;
            report.batches += 1;
        }

        logger.info('Ingestion completed', { ...report, durationMs: Date.now() - startedAt });
        return report;
    }

    private async embedWithRetry(batch: Chunk[], context: BatchContext, signal?: AbortSignal): Promise<number[][]> {
        const texts = batch.map(chunk => chunk.text);

        for (let attempt = 1; ; attempt++) {
            try {
                return await this.embeddingProvider.embed(texts);
            } catch (error) {
                if (!(error instanceof ProviderTransientError)) {
                    const message = error instanceof Error ? error.message : String(error);
                    const statusCode = error instanceof AppError ? error.statusCode : 502;
                    logger.error('Embedding provider failed', { ...context, error: message });
                    throw new EmbeddingFailedError(message, statusCode, context, { cause: error });
                }

                logger.warn('Embedding failed, retrying', {
                    batchIndex: context.batchIndex,
                    attempt,
                    retryDelayMs: this.config.retryDelayMs,
                    error: error.message,
                });
                await this.pause(context, signal);
            }
        }
    }

    private async pause(context: BatchContext, signal?: AbortSignal): Promise<void> {
        try {
            await this.wait(this.config.retryDelayMs, signal);
        } catch (error) {
            if (error instanceof AbortError) {
                throw new IngestionCancelledError(context);
            }
            throw error;
        }
        if (signal?.aborted) {
            throw new IngestionCancelledError(context);
        }
    }

    private validateVectors(batch: Chunk[], vectors: number[][], context: BatchContext): EmbeddedChunk[] {
        if (vectors.length !== batch.length) {
            throw new DataIntegrityError(
                `Embedding provider returned ${vectors.length} vectors for ${batch.length} texts in batch ${context.batchIndex}`,
                context,
                batch.length,
                vectors.length
            );
        }

        return batch.map((chunk, index) => {
            const embedding = vectors[index] ?? [];
            if (embedding.length !== this.config.embeddingDimension) {
                throw new DataIntegrityError(
                    `Embedding for chunk ${chunk.id} in batch ${context.batchIndex} has dimension ${embedding.length}, expected ${this.config.embeddingDimension}`,
                    { ...context, chunkId: chunk.id },
                    this.config.embeddingDimension,
                    embedding.length
                );
            }
            return new EmbeddedChunk(chunk, embedding);
        });
    }

    private async insert(embedded: EmbeddedChunk[], context: BatchContext): Promise<number> {
        const payload: InsertPayload = {
            idField: this.config.idField,
            vectorField: this.config.vectorField,
            textField: this.config.textField,
            ids: embedded.map(item => item.chunk.id),
            vectors: embedded.map(item => item.embedding),
            texts: embedded.map(item => item.chunk.text),
        };

        try {
            return await this.vectorStore.insert(payload);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Vector store insert failed', { ...context, error: message });
            throw new StoreError(message, context, { cause: error });
        }
    }

    private validateConfig(): void {
        const { batchSize, embeddingDimension, retryDelayMs, idField, vectorField, textField } = this.config;

        if (!Number.isInteger(batchSize) || batchSize <= 0) {
            throw new ConfigurationError(`batchSize must be a positive integer, got ${batchSize}`);
        }
        if (!Number.isInteger(embeddingDimension) || embeddingDimension <= 0) {
            throw new ConfigurationError(`embeddingDimension must be a positive integer, got ${embeddingDimension}`);
        }
        if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
            throw new ConfigurationError(`retryDelayMs must be a non-negative number, got ${retryDelayMs}`);
        }
        if ([idField, vectorField, textField].some(field => field.trim().length === 0)) {
            throw new ConfigurationError('idField, vectorField and textField cannot be empty');
        }
        if (this.embeddingProvider.dimension !== embeddingDimension) {
            throw new ConfigurationError(
                `Embedding provider produces ${this.embeddingProvider.dimension}-dimensional vectors, expected ${embeddingDimension}`
            );
        }
    }
}
