import { AppError } from './AppError';

export interface BatchContext {
    batchIndex: number;
    chunkId: string | undefined;
    insertedCount: number;
}

/**
 * Invalid window, stride, batch size or other settings. Raised before any work starts.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 400);
    }
}

/**
 * The embedding provider rejected the call and retrying will not help (bad key, bad request...)
 */
export class ProviderError extends AppError {
    constructor(message: string, statusCode = 502, options?: { cause?: unknown }) {
        super(message, statusCode, options);
    }
}

/**
 * Network fault, rate limit or server-side failure of the embedding provider
 */
export class ProviderTransientError extends ProviderError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 503, options);
    }
}

abstract class BatchError extends AppError {
    public readonly batchIndex: number;
    public readonly chunkId: string | undefined;
    public readonly insertedCount: number;

    protected constructor(message: string, statusCode: number, context: BatchContext, options?: { cause?: unknown }) {
        super(message, statusCode, options);
        this.batchIndex = context.batchIndex;
        this.chunkId = context.chunkId;
        this.insertedCount = context.insertedCount;
    }

    override get details(): Record<string, unknown> {
        return {
            batchIndex: this.batchIndex,
            chunkId: this.chunkId,
            insertedCount: this.insertedCount,
        };
    }
}

export class DataIntegrityError extends BatchError {
    constructor(
        message: string,
        context: BatchContext,
        public readonly expected: number,
        public readonly actual: number
    ) {
        super(message, 502, context);
    }

    override get details(): Record<string, unknown> {
        return {
            ...super.details,
            expected: this.expected,
            actual: this.actual,
        };
    }
}

/**
 * A provider failure that is not retried, raised with the batch it stopped at.
 * Keeps the provider's status code and message; the provider error is the cause.
 */
export class EmbeddingFailedError extends BatchError {
    constructor(message: string, statusCode: number, context: BatchContext, options?: { cause?: unknown }) {
        super(message, statusCode, context, options);
    }
}

export class StoreError extends BatchError {
    constructor(message: string, context: BatchContext, options?: { cause?: unknown }) {
        super(message, 502, context, options);
    }
}

export class IngestionCancelledError extends BatchError {
    constructor(context: BatchContext) {
        super(`Ingestion cancelled before batch ${context.batchIndex}`, 499, context);
    }
}

/**
 * Raised by vector store adapters; the pipeline re-wraps it with batch context
 */
export class VectorStoreError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 502, options);
    }
}
