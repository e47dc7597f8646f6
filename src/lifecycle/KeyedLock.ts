/**
 * Async mutual exclusion per key. Callers holding different keys never wait
 * on each other; callers on the same key run in arrival order.
 */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) this.tails.delete(key);
        }
    }

    /**
     * Hold every key for the duration of the task. Keys are taken in sorted
     * order so two callers sharing any key cannot deadlock.
     */
    async runAll<T>(keys: readonly string[], task: () => Promise<T>): Promise<T> {
        const ordered = [...new Set(keys)].sort();
        const acquire = (index: number): Promise<T> =>
            index === ordered.length ? task() : this.run(ordered[index], () => acquire(index + 1));
        return acquire(0);
    }

    get activeKeys(): number {
        return this.tails.size;
    }
}
