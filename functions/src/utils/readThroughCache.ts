/**
 * Process-lifetime cache of immutable values, filled on first read.
 * Concurrent first reads of one key may both load; the last one to finish is kept.
 */
export class ReadThroughCache<K extends string, V> {
    private readonly entries = new Map<K, V>();

    constructor(private readonly loader: (key: K) => Promise<V>) {}

    async get(key: K): Promise<V> {
        const cached = this.entries.get(key);
        if (cached !== undefined) return cached;

        const value = await this.loader(key);
        this.entries.set(key, value);
        return value;
    }
}
