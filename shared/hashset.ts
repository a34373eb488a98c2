function createBins<T>(size: number): T[][] {
    return Array.from({ length: size }, () => []);
}

// hash must return a non-negative integer, equal items must hash equally
export class HashSet<T> implements Iterable<T> {
    private bins: T[][] = [];
    private count: number = 0;
    private loadFactor: number = 2;

    constructor(protected hash: (item: T) => number, protected equals: (a: T, b: T) => boolean, capacity: number = 16) {
        this.bins = createBins(Math.max(1, capacity));
    }

    get size(): number {
        return this.count;
    }

    resize(size: number): void {
        const oldBins = this.bins;
        this.bins = createBins(size);
        this.count = 0;
        for (const bin of oldBins) {
            for (const item of bin) {
                this.add(item);
            }
        }
    }

    index(value: T): number {
        return this.hash(value) % this.bins.length;
    }
    has(value: T): boolean {
        const bin = this.bins[this.index(value)]
        return bin.some(item => this.equals(item, value));
    }
    add(item: T): boolean {
        if (this.has(item)) {
            return false;
        }
        if (this.count > this.bins.length * this.loadFactor) {
            this.resize(this.bins.length * 2);
        }
        this.bins[this.index(item)].push(item);
        this.count++;
        return true;
    }
    get(item: T): T | undefined {
        const bin = this.bins[this.index(item)];
        return bin.find(i => this.equals(i, item));
    }

    *[Symbol.iterator](): Iterator<T> {
        for (const bin of this.bins) {
            for (const item of bin) {
                yield item
            }
        }
    }
}

type HashMapEntry<K,V> = [K, V|undefined]

export class HashMap<K,V> implements Iterable<[K, V]> {
    private entrySet: HashSet<HashMapEntry<K,V>>

    constructor(hash: (key: K) => number, equals: (a: K, b: K) => boolean, capacity: number = 16) {
        this.entrySet = new HashSet<HashMapEntry<K,V>>(
            ([k,_]) => hash(k),
            ([a,_], [b,__]) => equals(a,b),
            capacity
        )
    }

    get size(): number {
        return this.entrySet.size;
    }

    has(key: K): boolean {
        return this.entrySet.has([key, undefined]);
    }

    set(key: K, value: V): void {
        let entry = this.entrySet.get([key, undefined]);
        if (entry) {
            entry[1] = value;
        } else {
            this.entrySet.add([key, value]);
        }
    }

    get(key: K): V | undefined {
        let entry = this.entrySet.get([key, undefined]);
        return entry?.[1];
    }

    *keys(): IterableIterator<K> {
        for (const [key, _] of this) {
            yield key
        }
    }

    *values(): IterableIterator<V> {
        for (const [_, value] of this) {
            yield value
        }
    }

    *[Symbol.iterator](): Iterator<[K, V]> {
        for (const [key, value] of this.entrySet) {
            // entries are only created by set, so the value is always present
            if (value !== undefined) {
                yield [key, value]
            }
        }
    }
}
