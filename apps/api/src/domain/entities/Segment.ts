export type SegmentMetadata = Record<string, unknown>;

/**
 * A short, time-ordered piece of text belonging to a group (e.g. one line of a video transcript)
 */
export class Segment {
    constructor(
        public readonly id: string,
        public readonly groupKey: string,
        public readonly text: string,
        public readonly start: number, // seconds from the start of the group
        public readonly end: number,
        public readonly metadata: SegmentMetadata = {}
    ) {}
}
