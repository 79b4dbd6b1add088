import { DataType } from '@zilliz/milvus2-sdk-node';
import { CollectionManager, type PrepareOptions } from '../../domain/entities/CollectionManager';
import type { VectorStore } from '../../domain/entities/VectorStore';
import logger from '../logger';
import { assertSuccess, type MilvusClientLike } from './client';

export interface CollectionSchemaOptions {
    collectionName: string;
    idField: string;
    vectorField: string;
    textField: string;
    embeddingDimension: number;
    indexType: string;
    metricType: string;
    indexParams: Record<string, number | string>;
}

const ID_MAX_LENGTH = 512;
const TEXT_MAX_LENGTH = 65535;

export class MilvusCollectionManager extends CollectionManager {
    constructor(
        private readonly client: MilvusClientLike,
        private readonly vectorStore: VectorStore,
        private readonly schema: CollectionSchemaOptions
    ) {
        super();
    }

    async prepare({ dropExisting = false }: PrepareOptions = {}): Promise<void> {
        const collection_name = this.schema.collectionName;
        const exists = await this.client.hasCollection({ collection_name });
        assertSuccess(exists.status, 'hasCollection');

        if (exists.value && dropExisting) {
            await this.drop();
        } else if (exists.value) {
            logger.debug('Collection already exists', { collection: collection_name });
            return;
        }

        const status = await this.client.createCollection({
            collection_name,
            fields: [
                {
                    name: this.schema.idField,
                    data_type: DataType.VarChar,
                    is_primary_key: true,
                    autoID: false,
                    max_length: ID_MAX_LENGTH,
                },
                {
                    name: this.schema.vectorField,
                    data_type: DataType.FloatVector,
                    dim: this.schema.embeddingDimension,
                },
                {
                    name: this.schema.textField,
                    data_type: DataType.VarChar,
                    max_length: TEXT_MAX_LENGTH,
                },
            ],
        });
        assertSuccess(status, 'createCollection');
        logger.info('Collection created', { collection: collection_name, dim: this.schema.embeddingDimension });
    }

    async finalize(): Promise<void> {
        await this.vectorStore.createIndex({
            field: this.schema.vectorField,
            indexType: this.schema.indexType,
            metricType: this.schema.metricType,
            params: this.schema.indexParams,
        });

        const status = await this.client.loadCollectionSync({ collection_name: this.schema.collectionName });
        assertSuccess(status, 'loadCollection');
        logger.info('Collection loaded', { collection: this.schema.collectionName });
    }

    async drop(): Promise<void> {
        const status = await this.client.dropCollection({ collection_name: this.schema.collectionName });
        assertSuccess(status, 'dropCollection');
        logger.info('Collection dropped', { collection: this.schema.collectionName });
    }
}
