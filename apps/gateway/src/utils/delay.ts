export const TIMED_OUT: unique symbol = Symbol('timed-out');

// Resolves false when the signal aborts before the delay elapses.
export function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise(resolve => {
        if (signal?.aborted) return resolve(false);

        const onAbort = () => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve(true);
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Waits for `work` at most `ms`. The work itself is left running when the
 * wait gives up; only the caller stops waiting.
 */
export async function waitAtMost<T>(work: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>(resolve => {
        timer = setTimeout(() => resolve(TIMED_OUT), ms);
    });

    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
