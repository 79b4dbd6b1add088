import type { MilvusClient } from '@zilliz/milvus2-sdk-node';
import { MilvusRepositoryProvider } from './repositories/RepositoryProvider';
import { type SConstructor, UseCaseProvider } from '../application/useCases/UseCaseProvider';
import { VectorStore } from '../domain/entities/VectorStore';
import { CollectionManager } from '../domain/entities/CollectionManager';
import { MilvusVectorStore } from './milvus/MilvusVectorStore';
import { MilvusCollectionManager } from './milvus/MilvusCollectionManager';
import { createMilvusClient } from './milvus/client';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider';
import type { EmbeddingProvider } from '../application/providers/EmbeddingProvider';
import { IndexSegments } from '../application/useCases/IndexSegments';
import { SearchChunks } from '../application/useCases/SearchChunks';
import {
    type IngestionConfig,
    loadIngestionConfig,
    validateIngestionConfig,
} from '../application/config/ingestionConfig';

export class Core {
    public repositories = new MilvusRepositoryProvider();
    public useCases = new UseCaseProvider();
    private milvusClient?: MilvusClient;
    private embeddingProvider?: EmbeddingProvider;

    constructor(public readonly config: IngestionConfig = validateIngestionConfig(loadIngestionConfig())) {
        this.initializeRepositories();
        this.initializeServices();
    }

    private initializeRepositories() {
        this.repositories.register(VectorStore, () => new MilvusVectorStore(this.getMilvusClient(), {
            collectionName: this.config.collectionName,
            idField: this.config.idField,
            textField: this.config.textField,
        }));
        this.repositories.register(CollectionManager, () => new MilvusCollectionManager(
            this.getMilvusClient(),
            this.repositories.get(VectorStore),
            {
                collectionName: this.config.collectionName,
                idField: this.config.idField,
                vectorField: this.config.vectorField,
                textField: this.config.textField,
                embeddingDimension: this.config.embeddingDimension,
                indexType: this.config.indexType,
                metricType: this.config.metricType,
                indexParams: this.config.indexParams,
            }
        ));
    }

    private initializeServices() {
        this.useCases.register(IndexSegments, () => new IndexSegments(
            this.repositories,
            this.getEmbeddingProvider(),
            this.config,
        ));
        this.useCases.register(SearchChunks, () => new SearchChunks(
            this.repositories,
            this.getEmbeddingProvider(),
            this.config,
        ));
    }

    private getMilvusClient(): MilvusClient {
        this.milvusClient ??= createMilvusClient();
        return this.milvusClient;
    }

    private getEmbeddingProvider(): EmbeddingProvider {
        this.embeddingProvider ??= new OpenAIEmbeddingProvider({ dimension: this.config.embeddingDimension });
        return this.embeddingProvider;
    }

    public getUseCase<T>(serviceType: SConstructor<T>): T {
        return this.useCases.get(serviceType);
    }
}
