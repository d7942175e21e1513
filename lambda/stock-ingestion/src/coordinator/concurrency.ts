/**
 * Concurrency primitives for the coordinator
 */

/**
 * Run a worker over items with at most `concurrency` in flight.
 * Results keep the order of items.
 */
export async function runWithConcurrency<T, R>(
    items: T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    if (items.length === 0) return [];
    const results: R[] = new Array(items.length);
    let cursor = 0;

    const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
        while (true) {
            const index = cursor;
            cursor += 1;
            if (index >= items.length) return;
            results[index] = await worker(items[index], index);
        }
    });

    await Promise.all(workers);
    return results;
}

/**
 * One lock per key. Callers for the same key run one at a time in arrival order;
 * different keys never wait on each other.
 */
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }
}
