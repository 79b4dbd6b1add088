import { Chunk } from '../../domain/entities/Chunk';
import type { Segment } from '../../domain/entities/Segment';
import { ConfigurationError } from '../../domain/errors/IngestionErrors';

export interface WindowConfig {
    window: number;  // segments merged per chunk
    stride: number;  // step between window starts, <= window for overlap
}

export function validateWindowConfig(config: WindowConfig): void {
    if (!Number.isInteger(config.window) || config.window <= 0) {
        throw new ConfigurationError(`window must be a positive integer, got ${config.window}`);
    }
    if (!Number.isInteger(config.stride) || config.stride <= 0) {
        throw new ConfigurationError(`stride must be a positive integer, got ${config.stride}`);
    }
}

/**
 * Merges consecutive segments into overlapping chunks.
 * A window whose first and last segment belong to different groups is skipped, never truncated.
 */
export function aggregateSegments(
    segments: readonly Segment[],
    config: WindowConfig
): Generator<Chunk, void, undefined> {
    validateWindowConfig(config);
    return windows(segments, config);
}

function* windows(segments: readonly Segment[], { window, stride }: WindowConfig): Generator<Chunk, void, undefined> {
    const lastIndex = segments.length - 1;

    for (let i = 0; i < segments.length; i += stride) {
        const end = Math.min(lastIndex, i + window - 1);
        const first = segments[i];
        const last = segments[end];
        if (!first || !last || first.groupKey !== last.groupKey) {
            continue;
        }

        const text = segments
            .slice(i, end + 1)
            .map(segment => segment.text)
            .join(' ');

        yield new Chunk(
            first.id,
            first.groupKey,
            text,
            first.start,
            last.end,
            { ...first.metadata }
        );
    }
}

export class WindowedAggregator {
    constructor(private readonly config: WindowConfig) {
        validateWindowConfig(config);
    }

    aggregate(segments: readonly Segment[]): Generator<Chunk, void, undefined> {
        return windows(segments, this.config);
    }

    collect(segments: readonly Segment[]): Chunk[] {
        return Array.from(this.aggregate(segments));
    }
}
