import type { SegmentMetadata } from './Segment';

export class Chunk {
    constructor(
        public readonly id: string,
        public readonly groupKey: string,
        public readonly text: string,
        public readonly start: number,
        public readonly end: number,
        public readonly metadata: SegmentMetadata
    ) {}
}

export class EmbeddedChunk {
    constructor(
        public readonly chunk: Chunk,
        public readonly embedding: number[]
    ) {}
}
