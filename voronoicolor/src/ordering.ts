import { DefaultMap } from "../../shared/defaultmap"
import { assertExists, ensured } from "../../shared/utils"
import { AdjacencyGraph } from "./adjacency"
import { createSiteKeyMap, formatKey, SiteKey } from "./site"

// planar graphs always have a vertex of degree < 6
export const DEFAULT_DEGREE_THRESHOLD = 6

export type OrderingOptions = {
    seen?: Iterable<SiteKey>
    threshold?: number
    onFallback?: (vertex: SiteKey, residualDegree: number) => void
}

// unseen vertices grouped by their number of unseen neighbors
class DegreeBuckets {
    private readonly buckets = new DefaultMap<number, Set<number>>(() => new Set())

    constructor(private readonly degrees: number[]) { }

    insert(vertex: number) {
        this.buckets.get(this.degrees[vertex]).add(vertex)
    }

    remove(vertex: number) {
        this.buckets.peek(this.degrees[vertex])?.delete(vertex)
    }

    decrement(vertex: number) {
        this.remove(vertex)
        this.degrees[vertex]--
        this.insert(vertex)
    }

    // lowest residual degree below limit, first inserted among equals
    lowest(limit: number): number | undefined {
        for (let degree = 0; degree < limit; degree++) {
            let bucket = this.buckets.peek(degree)
            if (bucket !== undefined && bucket.size > 0) {
                return bucket.values().next().value
            }
        }
        return undefined
    }
}

/**
 * Smallest-last elimination order of the unseen vertices.
 * Takes the vertex with fewest unseen neighbors while that is below threshold,
 * otherwise the first unseen vertex in the graph's vertex order.
 * Depends only on the vertex insertion order, not on hashing.
 * Colored in reverse, every vertex then sees fewer than threshold colored neighbors
 * unless a fallback was needed.
 */
export function degeneracyOrder(graph: AdjacencyGraph, options: OrderingOptions = {}): SiteKey[] {
    let threshold = options.threshold ?? DEFAULT_DEGREE_THRESHOLD
    let vertices = graph.vertices()
    let ids = createSiteKeyMap<number>(vertices.length)
    vertices.forEach((vertex, id) => ids.set(vertex, id))

    let seen = vertices.map(() => false)
    for (let key of options.seen ?? []) {
        let id = ids.get(key)
        assertExists(id, `pre-seen ${formatKey(key)} is not a vertex`)
        seen[id] = true
    }

    let neighborIds = vertices.map(vertex =>
        Array.from(graph.neighbors(vertex), neighbor => ensured(ids.get(neighbor))).sort((a, b) => a - b)
    )
    let degrees = neighborIds.map(neighbors => neighbors.filter(n => !seen[n]).length)
    let buckets = new DegreeBuckets(degrees)
    let remaining = 0
    for (let id = 0; id < vertices.length; id++) {
        if (!seen[id]) {
            buckets.insert(id)
            remaining++
        }
    }

    let order: SiteKey[] = []
    let cursor = 0 // all vertices before cursor are seen
    while (remaining > 0) {
        let next = buckets.lowest(threshold)
        if (next === undefined) {
            while (seen[cursor]) {
                cursor++
            }
            next = cursor
            options.onFallback?.(vertices[next], degrees[next])
        }
        buckets.remove(next)
        seen[next] = true
        remaining--
        order.push(vertices[next])
        for (let neighbor of neighborIds[next]) {
            if (!seen[neighbor]) {
                buckets.decrement(neighbor)
            }
        }
    }
    return order
}
