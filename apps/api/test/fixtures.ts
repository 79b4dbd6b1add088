import { Chunk } from '../src/domain/entities/Chunk';
import { Segment } from '../src/domain/entities/Segment';

export function segment(id: string, groupKey: string, text: string, start: number, metadata = {}): Segment {
    return new Segment(id, groupKey, text, start, start + 1, metadata);
}

export function chunks(count: number, prefix = 'c'): Chunk[] {
    return Array.from({ length: count }, (_, i) =>
        new Chunk(`${prefix}${i}`, 'video-1', `text ${i}`, i, i + 1, {})
    );
}

export function vector(dimension: number, fill = 0.5): number[] {
    return new Array<number>(dimension).fill(fill);
}
