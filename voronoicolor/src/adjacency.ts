import { HashMap, HashSet } from "../../shared/hashset"
import { assert, ensured } from "../../shared/utils"
import { Positioned, samePosition } from "../../shared/vector"
import { bisector, sampleLine } from "./bisector"
import { KDTree } from "./kdtree"
import { Bounds, createSiteKeyMap, createSiteKeySet, formatKey, Site, SiteKey, siteKey } from "./site"

// undirected, every edge is stored in both directions
export class AdjacencyGraph {
    private readonly adjacency: HashMap<SiteKey, HashSet<SiteKey>>
    private readonly vertexList: SiteKey[] = []
    private edgeCount: number = 0

    constructor(capacity?: number) {
        this.adjacency = createSiteKeyMap<HashSet<SiteKey>>(capacity)
    }

    get vertexCount(): number {
        return this.adjacency.size
    }

    get size(): number {
        return this.edgeCount
    }

    addVertex(p: Positioned): void {
        if (!this.adjacency.has(p)) {
            let key = siteKey(p)
            this.adjacency.set(key, createSiteKeySet(8))
            this.vertexList.push(key)
        }
    }

    hasVertex(p: Positioned): boolean {
        return this.adjacency.has(p)
    }

    // adding an existing edge is a no-op
    link(a: Positioned, b: Positioned): void {
        assert(!samePosition(a, b), `self-loop at ${formatKey(a)}`)
        if (this.hasEdge(a, b)) {
            return
        }
        this.addVertex(a)
        this.addVertex(b)
        ensured(this.adjacency.get(a)).add(siteKey(b))
        ensured(this.adjacency.get(b)).add(siteKey(a))
        this.edgeCount++
    }

    hasEdge(a: Positioned, b: Positioned): boolean {
        return this.adjacency.get(a)?.has(b) ?? false
    }

    neighbors(p: Positioned): Iterable<SiteKey> {
        return ensured(this.adjacency.get(p), `${formatKey(p)} is not a vertex`)
    }

    degree(p: Positioned): number {
        return ensured(this.adjacency.get(p), `${formatKey(p)} is not a vertex`).size
    }

    // in insertion order
    vertices(): SiteKey[] {
        return [...this.vertexList]
    }

    // each edge once, as the pair it was first seen from
    *edges(): Generator<[SiteKey, SiteKey]> {
        let visited = createSiteKeySet(this.vertexCount)
        for (let vertex of this.vertexList) {
            visited.add(vertex)
            for (let neighbor of this.neighbors(vertex)) {
                if (!visited.has(neighbor)) {
                    yield [vertex, neighbor]
                }
            }
        }
    }
}

export const DEFAULT_TOLERANCE = 1

export type AdjacencyOptions = {
    // squared distance units, couples with the sampling step and coordinate scale
    tolerance?: number
    onBoundary?: (point: Positioned, a: Site, b: Site) => void
    onProgress?: (done: number, total: number) => void
}

export function assertDistinct(sites: readonly Positioned[]): void {
    let seen = createSiteKeySet(sites.length)
    for (let site of sites) {
        assert(seen.add(siteKey(site)), `duplicate site at ${formatKey(site)}`)
    }
}

/**
 * Records the two nearest sites of a sample as neighbors when
 * their squared distances differ by less than tolerance.
 */
export function recordSample(
    graph: AdjacencyGraph,
    index: KDTree<Site>,
    point: Positioned,
    tolerance: number,
): [Site, Site] | null {
    let [first, second] = index.kNearest(point, 2)
    if (Math.abs(first.distance - second.distance) < tolerance) {
        graph.link(first.item, second.item)
        return [first.item, second.item]
    }
    return null
}

export function buildAdjacency(
    sites: readonly Site[],
    bounds: Bounds,
    options: AdjacencyOptions = {},
    index: KDTree<Site> = new KDTree(sites),
): AdjacencyGraph {
    let tolerance = options.tolerance ?? DEFAULT_TOLERANCE
    assertDistinct(sites)

    let graph = new AdjacencyGraph(sites.length)
    for (let site of sites) {
        graph.addVertex(site)
    }
    for (let i = 0; i < sites.length; i++) {
        for (let j = i + 1; j < sites.length; j++) {
            for (let point of sampleLine(bisector(sites[i], sites[j]), bounds)) {
                let pair = recordSample(graph, index, point, tolerance)
                if (pair !== null) {
                    options.onBoundary?.(point, pair[0], pair[1])
                }
            }
        }
        options.onProgress?.(i + 1, sites.length)
    }
    return graph
}
