import type { z } from 'zod';
import type { indexSegmentsSchema, searchChunksSchema, segmentSchema } from './schemas';

export * from './schemas';

/**
 * A short, time-coded piece of transcript as submitted by clients
 */
export type SegmentInput = z.input<typeof segmentSchema>;

export type IndexSegmentsRequest = z.infer<typeof indexSegmentsSchema>;

export type SearchChunksRequest = z.infer<typeof searchChunksSchema>;

/**
 * Outcome of one indexing run
 */
export interface IndexSegmentsResponse {
  chunks: number;
  inserted: number;
  batches: number;
}

/**
 * A ranked match returned by similarity search
 */
export interface SearchHitDto {
  id: string;
  score: number;
  text: string;
  fields: Record<string, unknown>;
}

export interface SearchChunksResponse {
  hits: SearchHitDto[];
}
