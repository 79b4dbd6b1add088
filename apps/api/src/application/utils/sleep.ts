export class AbortError extends Error {
    constructor(message = 'The operation was aborted') {
        super(message);
        this.name = 'AbortError';
    }
}

/**
 * An abortable `sleep` utility that pauses execution for a specified duration.
 * It will reject with an `AbortError` if the provided `AbortSignal` is triggered.
 * @param ms The number of milliseconds to sleep.
 * @param signal An optional `AbortSignal` to listen for cancellation.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            return reject(new AbortError());
        }

        const onAbort = () => {
            clearTimeout(timeoutId);
            reject(new AbortError());
        };
        const timeoutId = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export type Sleep = typeof sleep;
