import { VectorStore, type SearchHit } from '../../domain/entities/VectorStore';
import { AppError } from '../../domain/errors/AppError';
import { ProviderTransientError } from '../../domain/errors/IngestionErrors';
import type { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import type { IngestionConfig } from '../config/ingestionConfig';
import type { EmbeddingProvider } from '../providers/EmbeddingProvider';
import { sleep, type Sleep } from '../utils/sleep';

const DEFAULT_LIMIT = 5;
const MAX_LIMIT = 100;
const MAX_QUERY_ATTEMPTS = 3;

export class SearchChunks {
    constructor(
        private repositories: RepositoryProvider,
        private embeddingProvider: EmbeddingProvider,
        private config: IngestionConfig,
        private wait: Sleep = sleep,
    ) {}

    async execute(query: string, { limit = DEFAULT_LIMIT }: { limit?: number } = {}): Promise<SearchHit[]> {
        const trimmed = query.trim();
        if (trimmed.length === 0) {
            throw new AppError('Query cannot be empty', 400);
        }
        if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
            throw new AppError(`limit must be an integer between 1 and ${MAX_LIMIT}`, 400);
        }

        const vector = await this.embedQuery(trimmed);
        const [hits = []] = await this.repositories.get(VectorStore).search({
            vectors: [vector],
            field: this.config.vectorField,
            metricType: this.config.metricType,
            params: this.config.searchParams,
            limit,
            outputFields: [this.config.textField],
        });

        return hits;
    }

    /**
     * Retries transient provider failures, at most MAX_QUERY_ATTEMPTS calls in total
     */
    private async embedQuery(query: string): Promise<number[]> {
        for (let attempt = 1; ; attempt++) {
            try {
                const [vector] = await this.embeddingProvider.embed([query]);
                if (!vector) {
                    throw new AppError('Embedding provider returned no vector for the query', 502);
                }
                return vector;
            } catch (error) {
                if (!(error instanceof ProviderTransientError) || attempt >= MAX_QUERY_ATTEMPTS) {
                    throw error;
                }
                await this.wait(this.config.retryDelayMs);
            }
        }
    }
}
