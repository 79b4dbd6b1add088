/**
 * Ingestion and collection configuration from environment variables
 */

import { ConfigurationError } from '../../domain/errors/IngestionErrors';

export interface IngestionConfig {
    window: number;
    stride: number;
    batchSize: number;
    embeddingDimension: number;
    retryDelayMs: number;
    collectionName: string;
    idField: string;
    vectorField: string;
    textField: string;
    indexType: string;
    metricType: string;
    indexParams: { nlist: number };
    searchParams: { nprobe: number };
}

type Env = Record<string, string | undefined>;

export function loadIngestionConfig(env: Env = process.env): IngestionConfig {
    return {
        window: parseInt(env.INGEST_WINDOW || '20', 10),
        stride: parseInt(env.INGEST_STRIDE || '4', 10),
        batchSize: parseInt(env.INGEST_BATCH_SIZE || '64', 10),
        embeddingDimension: parseInt(env.EMBEDDING_DIMENSION || '1536', 10),
        retryDelayMs: parseInt(env.INGEST_RETRY_DELAY_MS || '5000', 10),
        collectionName: env.MILVUS_COLLECTION || 'transcript_chunks',
        idField: env.MILVUS_ID_FIELD || 'id',
        vectorField: env.MILVUS_VECTOR_FIELD || 'embedding',
        textField: env.MILVUS_TEXT_FIELD || 'text',
        indexType: env.MILVUS_INDEX_TYPE || 'IVF_FLAT',
        metricType: env.MILVUS_METRIC_TYPE || 'L2',
        indexParams: { nlist: parseInt(env.MILVUS_INDEX_NLIST || '1024', 10) },
        searchParams: { nprobe: parseInt(env.MILVUS_SEARCH_NPROBE || '10', 10) },
    };
}

function requirePositiveInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
    }
}

/**
 * Validates ingestion configuration
 * Throws ConfigurationError if configuration is invalid
 */
export function validateIngestionConfig(config: IngestionConfig): IngestionConfig {
    requirePositiveInteger('INGEST_WINDOW', config.window);
    requirePositiveInteger('INGEST_STRIDE', config.stride);
    requirePositiveInteger('INGEST_BATCH_SIZE', config.batchSize);
    requirePositiveInteger('EMBEDDING_DIMENSION', config.embeddingDimension);
    requirePositiveInteger('MILVUS_INDEX_NLIST', config.indexParams.nlist);
    requirePositiveInteger('MILVUS_SEARCH_NPROBE', config.searchParams.nprobe);

    if (!Number.isInteger(config.retryDelayMs) || config.retryDelayMs < 0) {
        throw new ConfigurationError(`INGEST_RETRY_DELAY_MS must be a non-negative integer, got ${config.retryDelayMs}`);
    }

    const fields = [config.idField, config.vectorField, config.textField];
    if (fields.some((field) => field.trim().length === 0)) {
        throw new ConfigurationError('Milvus field names cannot be empty');
    }
    if (new Set(fields).size !== fields.length) {
        throw new ConfigurationError(`Milvus field names must be distinct, got ${fields.join(', ')}`);
    }

    return config;
}
