import { describe, it, expect } from 'vitest';
import { loadIngestionConfig, validateIngestionConfig } from '../src/application/config/ingestionConfig';
import { ConfigurationError } from '../src/domain/errors/IngestionErrors';

describe('Ingestion Configuration', () => {
    describe('loadIngestionConfig', () => {
        it('should use default values when env vars not set', () => {
            expect(loadIngestionConfig({})).toEqual({
                window: 20,
                stride: 4,
                batchSize: 64,
                embeddingDimension: 1536,
                retryDelayMs: 5000,
                collectionName: 'transcript_chunks',
                idField: 'id',
                vectorField: 'embedding',
                textField: 'text',
                indexType: 'IVF_FLAT',
                metricType: 'L2',
                indexParams: { nlist: 1024 },
                searchParams: { nprobe: 10 },
            });
        });

        it('should read values from environment variables', () => {
            const config = loadIngestionConfig({
                INGEST_WINDOW: '8',
                INGEST_STRIDE: '2',
                INGEST_BATCH_SIZE: '16',
                EMBEDDING_DIMENSION: '256',
                INGEST_RETRY_DELAY_MS: '0',
                MILVUS_COLLECTION: 'talks',
                MILVUS_METRIC_TYPE: 'COSINE',
            });

            expect(config).toMatchObject({
                window: 8,
                stride: 2,
                batchSize: 16,
                embeddingDimension: 256,
                retryDelayMs: 0,
                collectionName: 'talks',
                metricType: 'COSINE',
            });
        });
    });

    describe('validateIngestionConfig', () => {
        it('should accept the defaults', () => {
            const config = loadIngestionConfig({});
            expect(validateIngestionConfig(config)).toBe(config);
        });

        it.each([
            [{ INGEST_WINDOW: '0' }, 'INGEST_WINDOW must be a positive integer, got 0'],
            [{ INGEST_STRIDE: 'abc' }, 'INGEST_STRIDE must be a positive integer, got NaN'],
            [{ INGEST_BATCH_SIZE: '-4' }, 'INGEST_BATCH_SIZE must be a positive integer, got -4'],
            [{ INGEST_RETRY_DELAY_MS: '-1' }, 'INGEST_RETRY_DELAY_MS must be a non-negative integer, got -1'],
            [{ MILVUS_TEXT_FIELD: 'embedding' }, 'Milvus field names must be distinct, got id, embedding, embedding'],
        ])('should reject %o', (env, message) => {
            expect(() => validateIngestionConfig(loadIngestionConfig(env))).toThrow(new ConfigurationError(message));
        });
    });
});
