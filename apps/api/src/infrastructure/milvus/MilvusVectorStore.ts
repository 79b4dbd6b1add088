import type { RowData } from '@zilliz/milvus2-sdk-node';
import {
    VectorStore,
    type IndexSpec,
    type InsertPayload,
    type SearchHit,
    type SearchRequest,
} from '../../domain/entities/VectorStore';
import { VectorStoreError } from '../../domain/errors/IngestionErrors';
import logger from '../logger';
import { assertSuccess, type MilvusClientLike } from './client';

export interface MilvusVectorStoreOptions {
    collectionName: string;
    idField: string;
    textField: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MilvusVectorStore extends VectorStore {
    constructor(
        private readonly client: MilvusClientLike,
        private readonly options: MilvusVectorStoreOptions
    ) {
        super();
    }

    async insert(payload: InsertPayload): Promise<number> {
        const { ids, vectors, texts } = payload;
        if (ids.length !== vectors.length || ids.length !== texts.length) {
            throw new VectorStoreError(
                `Insert payload is ragged: ${ids.length} ids, ${vectors.length} vectors, ${texts.length} texts`
            );
        }
        if (ids.length === 0) {
            return 0;
        }

        const rows: RowData[] = ids.map((id, index) => ({
            [payload.idField]: id,
            [payload.vectorField]: vectors[index] ?? [],
            [payload.textField]: texts[index] ?? '',
        }));

        const result = await this.client.insert({
            collection_name: this.options.collectionName,
            fields_data: rows,
        });
        assertSuccess(result.status, 'insert');

        const inserted = Number(result.insert_cnt);
        logger.debug('Inserted entities', { collection: this.options.collectionName, inserted });
        return Number.isNaN(inserted) ? ids.length : inserted;
    }

    async createIndex(spec: IndexSpec): Promise<void> {
        const status = await this.client.createIndex({
            collection_name: this.options.collectionName,
            field_name: spec.field,
            index_type: spec.indexType,
            metric_type: spec.metricType,
            params: spec.params,
        });
        assertSuccess(status, 'createIndex');
        logger.info('Index created', { collection: this.options.collectionName, ...spec });
    }

    async search(request: SearchRequest): Promise<SearchHit[][]> {
        const hits: SearchHit[][] = [];

        // one query per vector keeps the response shape flat
        for (const vector of request.vectors) {
            const result = await this.client.search({
                collection_name: this.options.collectionName,
                data: [vector],
                anns_field: request.field,
                metric_type: request.metricType,
                params: request.params,
                limit: request.limit,
                output_fields: request.outputFields,
            });
            assertSuccess(result.status, 'search');
            hits.push(this.toHits(result.results));
        }

        return hits;
    }

    private toHits(results: unknown[]): SearchHit[] {
        const rows = results.length > 0 && Array.isArray(results[0]) ? results[0] : results;

        return rows.filter(isRecord).map(row => {
            const { id, score, ...rest } = row;
            const fields: Record<string, unknown> = { ...rest };
            const text = fields[this.options.textField];
            delete fields[this.options.textField];
            delete fields[this.options.idField];

            return {
                id: String(id ?? row[this.options.idField]),
                score: typeof score === 'number' ? score : Number(score),
                text: typeof text === 'string' ? text : '',
                fields,
            };
        });
    }
}
