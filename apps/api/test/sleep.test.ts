import { describe, it, expect, vi } from 'vitest';
import { AbortError, sleep } from '../src/application/utils/sleep';

describe('sleep', () => {
    it('resolves after the given delay without blocking timers', async () => {
        vi.useFakeTimers();
        const done = vi.fn();

        const pending = sleep(1000).then(done);
        await vi.advanceTimersByTimeAsync(999);
        expect(done).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(1);
        await pending;
        expect(done).toHaveBeenCalledTimes(1);
    });

    it('rejects with AbortError when the signal fires', async () => {
        vi.useFakeTimers();
        const controller = new AbortController();

        const pending = sleep(5000, controller.signal);
        controller.abort();

        await expect(pending).rejects.toBeInstanceOf(AbortError);
    });

    it('rejects immediately for an already aborted signal', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(AbortError);
    });
});
