/**
 * Run `task` over `items` with at most `limit` in flight.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await task(items[index], index);
        }
    };

    const workers = Array.from(
        { length: Math.max(1, Math.min(limit, items.length)) },
        () => worker()
    );
    await Promise.all(workers);
    return results;
}
