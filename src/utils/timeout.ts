/**
 * Timeout Utilities
 */

/**
 * Race a promise against a timeout, clearing the timer whichever side settles first.
 *
 * @param timeoutError - message for a plain Error, or a factory for a typed one
 *
 * @example
 * const result = await withTimeout(
 *   pending,
 *   30000,
 *   () => new RequestTimeoutError('tools/list', 30000)
 * );
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    timeoutError: string | (() => Error)
): Promise<T> {
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timeoutHandle = setTimeout(() => {
            reject(typeof timeoutError === 'string' ? new Error(timeoutError) : timeoutError());
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
    }
}

/**
 * Create a cancellable delay
 *
 * @returns Promise that resolves after the delay, and a cancel function that
 * resolves it early and clears the timer
 *
 * @example
 * const { promise, cancel } = cancellableDelay(5000);
 * // Later, if needed:
 * cancel();
 */
export function cancellableDelay(delayMs: number): {
    promise: Promise<void>
    cancel:  () => void
} {
    let timeoutHandle: NodeJS.Timeout | undefined;
    let resolveFn: (() => void) | undefined;

    const promise = new Promise<void>((resolve) => {
        resolveFn = resolve;
        timeoutHandle = setTimeout(resolve, delayMs);
    });

    const cancel = (): void => {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
        resolveFn?.();
    };

    return { promise, cancel };
}
