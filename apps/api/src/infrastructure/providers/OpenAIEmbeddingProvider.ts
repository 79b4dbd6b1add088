import 'dotenv/config';
import OpenAI from 'openai';
import type { EmbeddingProvider } from '../../application/providers/EmbeddingProvider';
import { ProviderError, ProviderTransientError } from '../../domain/errors/IngestionErrors';
import logger from '../logger';

// Request timeout, conflict, rate limit
const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export interface OpenAIEmbeddingOptions {
    model?: string;
    dimension?: number;
    client?: Pick<OpenAI, 'embeddings'>;
}

export function isTransientOpenAIError(error: unknown): boolean {
    if (error instanceof OpenAI.APIConnectionError) {
        return true;
    }
    if (error instanceof OpenAI.APIError && error.status !== undefined) {
        return TRANSIENT_STATUSES.has(error.status) || error.status >= 500;
    }
    return false;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    public readonly dimension: number;
    private readonly model: string;
    private readonly client: Pick<OpenAI, 'embeddings'>;

    constructor(options: OpenAIEmbeddingOptions = {}) {
        this.model = options.model ?? (process.env.OPENAI_EMBEDDING_MODEL || 'text-embedding-3-small');
        this.dimension = options.dimension ?? parseInt(process.env.EMBEDDING_DIMENSION || '1536', 10);
        this.client = options.client ?? new OpenAI({
            apiKey: process.env.OPENAI_API_KEY,
            baseURL: process.env.OPENAI_BASE_URL || undefined,
            maxRetries: 0, // retries belong to the ingestion pipeline
            timeout: 60 * 1000,
        });
    }

    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        try {
            const response = await this.client.embeddings.create({
                model: this.model,
                input: texts,
                ...(this.model.startsWith('text-embedding-3') ? { dimensions: this.dimension } : {}),
            });

            logger.debug('Embeddings created', {
                model: this.model,
                count: response.data.length,
                promptTokens: response.usage?.prompt_tokens,
            });

            return [...response.data]
                .sort((a, b) => a.index - b.index)
                .map(item => item.embedding);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            if (isTransientOpenAIError(error)) {
                throw new ProviderTransientError(`OpenAI embedding request failed: ${message}`, { cause: error });
            }
            throw new ProviderError(`OpenAI embedding request rejected: ${message}`, 502, { cause: error });
        }
    }
}
