// inspired by python's defaultdict
export class DefaultMap<K, V> {
    private readonly values: Map<K,V> = new Map();

    constructor(protected makeDefault: (key: K) => V) { }

    get(name: K): V {
        let value = this.values.get(name);
        if (value !== undefined) {
            return value;
        } else {
            let newValue = this.makeDefault(name);
            this.values.set(name, newValue);
            return newValue;
        }
    }

    // does not create the default
    peek(name: K): V | undefined {
        return this.values.get(name);
    }
}
