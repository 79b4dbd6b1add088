import 'dotenv/config';
import { ErrorCode, MilvusClient } from '@zilliz/milvus2-sdk-node';
import { VectorStoreError } from '../../domain/errors/IngestionErrors';

export type MilvusClientLike = Pick<
    MilvusClient,
    'insert' | 'search' | 'createIndex' | 'hasCollection' | 'createCollection' | 'dropCollection' | 'loadCollectionSync'
>;

export function createMilvusClient(): MilvusClient {
    return new MilvusClient({
        address: process.env.MILVUS_ADDRESS || 'localhost:19530',
        token: process.env.MILVUS_TOKEN || undefined,
    });
}

interface MilvusStatus {
    error_code: string | number;
    reason: string;
}

/**
 * Milvus reports most failures in the response status instead of rejecting
 */
export function assertSuccess(status: MilvusStatus, operation: string): void {
    if (status.error_code !== ErrorCode.SUCCESS) {
        throw new VectorStoreError(`Milvus ${operation} failed (${status.error_code}): ${status.reason}`);
    }
}
