export type RandomFn = () => number

export function randInt(limit: number, random: RandomFn = Math.random): number {
    return Math.floor(random() * limit)
}

// in place shuffle
export function shuffle<T>(arr: T[], random: RandomFn = Math.random): T[] {
    for (let i = arr.length - 1; i >= 0; i--) {
        let j = randInt(i + 1, random)
        let temp = arr[i]
        arr[i] = arr[j]
        arr[j] = temp
    }
    return arr
}

export function assert(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new Error(message)
    }
}

export function assertExists<T>(value: T | null | undefined, message: string = "value should not be undefined"): asserts value is T {
    if (value === undefined || value === null) {
        throw new Error(message)
    }
}

export function ensured<T>(value: T | null | undefined, message?: string): T {
    assertExists(value, message)
    return value
}

export function range(limit: number): Iterable<number>;
export function range(start: number, limit: number): Iterable<number>;
export function* range(a: number, b?: number): Iterable<number> {
    let start: number
    let limit: number
    if (b === undefined) {
        start = 0
        limit = a
    } else {
        start = a
        limit = b
    }
    for (let i = start; i < limit; i++) {
        yield i
    }
}
