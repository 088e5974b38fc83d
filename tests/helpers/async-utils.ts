/**
 * Async testing utilities
 */

/**
 * Wait for a condition to become true within a timeout period
 *
 * @example
 * ```typescript
 * await waitFor(() => handler.mock.calls.length > 0, { timeout: 1000 });
 * ```
 */
export async function waitFor(
    condition: () => boolean | Promise<boolean>,
    options: { timeout?: number, interval?: number } = {}
): Promise<void> {
    const { timeout = 5000, interval = 10 } = options;
    const startTime = Date.now();

    while(Date.now() - startTime < timeout) {
        if(await condition()) {
            return;
        }
        await delay(interval);
    }

    throw new Error(`Condition not met within ${timeout}ms`);
}

export async function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
