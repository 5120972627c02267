/**
 * Maps `items` through `worker` with at most `limit` calls in flight.
 * Results keep the order of the input.
 */
export const mapWithConcurrency = async <T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
    const results: R[] = new Array<R>(items.length);
    let next = 0;

    const run = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    };

    const runners = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => run());
    await Promise.all(runners);
    return results;
};

export const sleep = (ms: number): Promise<void> =>
    new Promise(resolve => setTimeout(resolve, ms));
