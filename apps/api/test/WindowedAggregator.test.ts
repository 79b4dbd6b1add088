import { describe, it, expect } from 'vitest';
import { aggregateSegments, WindowedAggregator } from '../src/application/services/WindowedAggregator';
import { Chunk } from '../src/domain/entities/Chunk';
import { ConfigurationError } from '../src/domain/errors/IngestionErrors';
import { segment } from './fixtures';

describe('WindowedAggregator', () => {
    it('merges within a group and drops the window that crosses into the next one', () => {
        const segments = [
            segment('s0', 'A', 'hi', 0),
            segment('s1', 'A', 'there', 1),
            segment('s2', 'B', 'bye', 2),
        ];

        const result = new WindowedAggregator({ window: 2, stride: 1 }).collect(segments);

        expect(result).toEqual([
            new Chunk('s0', 'A', 'hi there', 0, 2, {}),
            new Chunk('s2', 'B', 'bye', 2, 3, {}),
        ]);
    });

    it('overlaps windows when stride is smaller than window and keeps the short tail', () => {
        const segments = [0, 1, 2, 3, 4].map(i => segment(`s${i}`, 'video', `t${i}`, i * 10));

        const result = new WindowedAggregator({ window: 3, stride: 2 }).collect(segments);

        expect(result.map(chunk => chunk.text)).toEqual(['t0 t1 t2', 't2 t3 t4', 't4']);
        expect(result.map(chunk => [chunk.start, chunk.end])).toEqual([[0, 21], [20, 41], [40, 41]]);
        expect(result.map(chunk => chunk.id)).toEqual(['s0', 's2', 's4']);
    });

    it('never truncates a window at a group boundary', () => {
        const segments = [
            segment('a0', 'A', 'a0', 0),
            segment('a1', 'A', 'a1', 1),
            segment('a2', 'A', 'a2', 2),
            segment('b0', 'B', 'b0', 0),
            segment('b1', 'B', 'b1', 1),
            segment('b2', 'B', 'b2', 2),
        ];

        const result = new WindowedAggregator({ window: 4, stride: 1 }).collect(segments);

        expect(result.map(chunk => chunk.text)).toEqual(['b0 b1 b2', 'b1 b2', 'b2']);
        expect(result.every(chunk => chunk.groupKey === 'B')).toBe(true);
    });

    it('copies passthrough metadata from the first segment of the window', () => {
        const intro = { title: 'Intro', url: 'https://example.com/v/1' };
        const segments = [
            segment('s0', 'v1', 'first', 0, intro),
            segment('s1', 'v1', 'second', 1, { title: 'Other' }),
        ];

        const [chunk] = new WindowedAggregator({ window: 2, stride: 2 }).collect(segments);

        expect(chunk?.metadata).toEqual(intro);
        expect(chunk?.metadata).not.toBe(intro);
    });

    it('produces nothing for an empty input', () => {
        expect(new WindowedAggregator({ window: 3, stride: 1 }).collect([])).toEqual([]);
    });

    it('emits chunks lazily', () => {
        const segments = [0, 1, 2, 3].map(i => segment(`s${i}`, 'g', `t${i}`, i));

        const iterator = aggregateSegments(segments, { window: 2, stride: 1 });

        expect(iterator.next().value).toEqual(new Chunk('s0', 'g', 't0 t1', 0, 2, {}));
        expect(iterator.next().value).toEqual(new Chunk('s1', 'g', 't1 t2', 1, 3, {}));
    });

    it.each([
        { window: 0, stride: 1 },
        { window: 2, stride: 0 },
        { window: -1, stride: 1 },
        { window: 2, stride: 1.5 },
    ])('rejects invalid configuration %o before iterating', (config) => {
        expect(() => new WindowedAggregator(config)).toThrow(ConfigurationError);
        expect(() => aggregateSegments([], config)).toThrow(ConfigurationError);
    });
});
