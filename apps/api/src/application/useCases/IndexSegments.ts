import type { SegmentInput } from '@clipsearch/types';
import { Segment } from '../../domain/entities/Segment';
import { CollectionManager } from '../../domain/entities/CollectionManager';
import { VectorStore } from '../../domain/entities/VectorStore';
import { AppError } from '../../domain/errors/AppError';
import type { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import type { IngestionConfig } from '../config/ingestionConfig';
import type { EmbeddingProvider } from '../providers/EmbeddingProvider';
import { BatchedIngestionPipeline, type IngestionReport } from '../services/BatchedIngestionPipeline';
import { WindowedAggregator } from '../services/WindowedAggregator';
import type { Sleep } from '../utils/sleep';

export interface IndexSegmentsOptions {
    window?: number;
    stride?: number;
    dropExisting?: boolean;
    signal?: AbortSignal;
}

export class IndexSegments {
    constructor(
        private repositories: RepositoryProvider,
        private embeddingProvider: EmbeddingProvider,
        private config: IngestionConfig,
        private wait?: Sleep,
    ) {}

    async execute(input: readonly SegmentInput[], options: IndexSegmentsOptions = {}): Promise<IngestionReport> {
        if (input.length === 0) {
            throw new AppError('At least one segment is required', 400);
        }

        // Both throw ConfigurationError before anything touches Milvus
        const aggregator = new WindowedAggregator({
            window: options.window ?? this.config.window,
            stride: options.stride ?? this.config.stride,
        });
        const pipeline = new BatchedIngestionPipeline(
            this.embeddingProvider,
            this.repositories.get(VectorStore),
            this.config,
            this.wait,
        );

        const segments = input.map(toSegment);
        const collections = this.repositories.get(CollectionManager);

        await collections.prepare({ dropExisting: options.dropExisting });
        const report = await pipeline.run(aggregator.aggregate(segments), { signal: options.signal });
        if (report.inserted > 0) {
            await collections.finalize();
        }

        return report;
    }
}

function toSegment(input: SegmentInput): Segment {
    return new Segment(input.id, input.groupKey, input.text, input.start, input.end, input.metadata ?? {});
}
