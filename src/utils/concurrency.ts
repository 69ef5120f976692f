/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Results keep the input order. A rejected call rejects the whole run,
 * so workers that must not abort the batch catch their own errors.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    const queue = items.map((item, index) => [item, index] as const);
    const poolSize = Math.max(1, Math.min(limit, items.length));

    const runWorker = async (): Promise<void> => {
        for (let entry = queue.shift(); entry; entry = queue.shift()) {
            const [item, index] = entry;
            results[index] = await worker(item, index);
        }
    };

    await Promise.all(Array.from({ length: poolSize }, () => runWorker()));
    return results;
}
