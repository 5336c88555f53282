/**
 * Error raised when an AbortSignal fires while waiting.
 */
export class AbortedError extends Error {
    constructor(message = 'Operation aborted') {
        super(message);
        this.name = 'AbortError';
    }
}

/**
 * Sleep for the specified number of milliseconds.
 * Rejects with AbortedError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new AbortedError());
    }
    if (ms <= 0) {
        return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new AbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Pick a uniformly random integer in `[min, max]`.
 */
export function randomBetween([min, max]: readonly [number, number], random: () => number = Math.random): number {
    return Math.floor(min + random() * (max - min + 1));
}

/**
 * Settle with `promise`, or reject with AbortedError as soon as `signal` aborts.
 * The losing promise is left to settle on its own.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        return Promise.reject(new AbortedError());
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(new AbortedError());
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}
