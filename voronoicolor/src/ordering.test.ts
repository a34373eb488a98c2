import { describe, expect, test } from '@jest/globals';
import { createSeededRandom } from '../../shared/random';
import { range } from '../../shared/utils';
import { AdjacencyGraph, buildAdjacency } from './adjacency';
import { degeneracyOrder } from './ordering';
import { formatKey, generateSites, SiteKey } from './site';

function point(i: number): SiteKey {
    return { x: i, y: 0 }
}

function graphOf(vertexCount: number, edges: [number, number][]): AdjacencyGraph {
    let graph = new AdjacencyGraph()
    for (let i of range(vertexCount)) {
        graph.addVertex(point(i))
    }
    for (let [a, b] of edges) {
        graph.link(point(a), point(b))
    }
    return graph
}

function completeGraph(n: number): AdjacencyGraph {
    let edges: [number, number][] = []
    for (let i of range(n)) {
        for (let j of range(i + 1, n)) {
            edges.push([i, j])
        }
    }
    return graphOf(n, edges)
}

// neighbors that come later in the order, i.e. are colored first
function laterNeighborCounts(graph: AdjacencyGraph, order: SiteKey[]): number[] {
    let position = new Map<string, number>(order.map((v, i) => [formatKey(v), i]))
    return order.map((v, i) =>
        Array.from(graph.neighbors(v)).filter(n => (position.get(formatKey(n)) ?? -1) > i).length
    )
}

describe('degeneracyOrder', () => {
    test('empty graph', () => {
        expect(degeneracyOrder(new AdjacencyGraph())).toEqual([])
    })

    test('star removes leaves before center', () => {
        let graph = graphOf(4, [[0, 1], [0, 2], [0, 3]])
        let order = degeneracyOrder(graph)
        expect(order.map(v => v.x)).toEqual([1, 2, 3, 0])
    })

    test('path peels from the ends', () => {
        let graph = graphOf(4, [[0, 1], [1, 2], [2, 3]])
        expect(degeneracyOrder(graph).map(v => v.x)).toEqual([0, 3, 1, 2])
    })

    test('pre-seen vertices are skipped and do not count', () => {
        let graph = graphOf(4, [[0, 1], [0, 2], [0, 3]])
        let order = degeneracyOrder(graph, { seen: [point(1), point(2)] })
        expect(order.map(v => v.x)).toEqual([0, 3])
    })

    test('unknown pre-seen vertex is rejected', () => {
        let graph = graphOf(2, [[0, 1]])
        expect(() => degeneracyOrder(graph, { seen: [point(5)] })).toThrow("pre-seen (5, 0) is not a vertex")
    })

    test('dense graph falls back to vertex order', () => {
        let graph = completeGraph(8)
        let fallbacks: number[] = []
        let order = degeneracyOrder(graph, { onFallback: (v, degree) => fallbacks.push(degree) })
        expect(order.map(v => v.x)).toEqual([0, 1, 2, 3, 4, 5, 6, 7])
        // K8 has residual degree 7 then 6, after that 5 is below the threshold
        expect(fallbacks).toEqual([7, 6])
    })

    test('threshold controls fallback', () => {
        let graph = graphOf(3, [[0, 1], [1, 2], [0, 2]])
        let fallbacks = 0
        degeneracyOrder(graph, { threshold: 1, onFallback: () => fallbacks++ })
        expect(fallbacks).toBe(2)
    })

    test('random site graphs are ordered completely with bounded back degree', () => {
        let bounds = { width: 160, height: 120 }
        for (let seed of [1, 2, 3]) {
            let sites = generateSites(30, bounds, createSeededRandom(seed))
            let graph = buildAdjacency(sites, bounds)
            let fallbacks = 0
            let order = degeneracyOrder(graph, { onFallback: () => fallbacks++ })
            expect(order.length).toBe(30)
            expect(new Set(order.map(formatKey)).size).toBe(30)
            expect(fallbacks).toBe(0)
            expect(Math.max(...laterNeighborCounts(graph, order))).toBeLessThan(6)
        }
    })
})
