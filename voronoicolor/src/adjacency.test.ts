import { describe, expect, test } from '@jest/globals';
import { createSeededRandom } from '../../shared/random';
import { AdjacencyGraph, buildAdjacency, recordSample } from './adjacency';
import { KDTree } from './kdtree';
import { createSite, formatKey, generateSites, Site } from './site';

function edgeSet(graph: AdjacencyGraph): string[] {
    return Array.from(graph.edges(), ([a, b]) => [formatKey(a), formatKey(b)].sort().join("-")).sort()
}

function square(): Site[] {
    return [createSite(0, 0), createSite(10, 0), createSite(0, 10), createSite(10, 10)]
}

describe('AdjacencyGraph', () => {
    test('links symmetrically once', () => {
        let graph = new AdjacencyGraph()
        graph.link({ x: 1, y: 2 }, { x: 3, y: 4 })
        graph.link({ x: 3, y: 4 }, { x: 1, y: 2 })
        expect(graph.size).toBe(1)
        expect(graph.vertexCount).toBe(2)
        expect(graph.hasEdge({ x: 1, y: 2 }, { x: 3, y: 4 })).toBe(true)
        expect(graph.hasEdge({ x: 3, y: 4 }, { x: 1, y: 2 })).toBe(true)
        expect(graph.degree({ x: 1, y: 2 })).toBe(1)
    })

    test('rejects self loops', () => {
        let graph = new AdjacencyGraph()
        expect(() => graph.link({ x: 1, y: 1 }, { x: 1, y: 1 })).toThrow("self-loop at (1, 1)")
    })

    test('unknown vertex has no neighbors', () => {
        let graph = new AdjacencyGraph()
        graph.addVertex({ x: 0, y: 0 })
        expect(graph.hasEdge({ x: 0, y: 0 }, { x: 1, y: 0 })).toBe(false)
        expect(() => graph.neighbors({ x: 1, y: 0 })).toThrow("(1, 0) is not a vertex")
    })
})

describe('recordSample', () => {
    test('links only near equidistant samples', () => {
        let sites = square()
        let index = new KDTree(sites)
        let graph = new AdjacencyGraph()
        expect(recordSample(graph, index, { x: 2, y: 1 }, 1)).toBeNull()
        expect(graph.size).toBe(0)
        expect(recordSample(graph, index, { x: 5, y: 2 }, 1)).toEqual([sites[0], sites[1]])
        expect(graph.hasEdge(sites[0], sites[1])).toBe(true)
    })

    test('tolerance is in squared distance units', () => {
        let sites = square()
        let index = new KDTree(sites)
        // squared distances 24.01 and 26.01
        let point = { x: 4.9, y: 0 }
        expect(recordSample(new AdjacencyGraph(), index, point, 1)).toBeNull()
        expect(recordSample(new AdjacencyGraph(), index, point, 2.5)).not.toBeNull()
    })
})

describe('buildAdjacency', () => {
    test('square of four sites is a 4-cycle', () => {
        let graph = buildAdjacency(square(), { width: 20, height: 20 })
        expect(graph.vertexCount).toBe(4)
        expect(edgeSet(graph)).toEqual([
            "(0, 0)-(0, 10)",
            "(0, 0)-(10, 0)",
            "(0, 10)-(10, 10)",
            "(10, 0)-(10, 10)",
        ])
        expect(graph.hasEdge({ x: 0, y: 0 }, { x: 10, y: 10 })).toBe(false)
        expect(graph.hasEdge({ x: 10, y: 0 }, { x: 0, y: 10 })).toBe(false)
    })

    test('single site has no edges', () => {
        let graph = buildAdjacency([createSite(3, 3)], { width: 10, height: 10 })
        expect(graph.vertexCount).toBe(1)
        expect(graph.size).toBe(0)
        expect([...graph.neighbors({ x: 3, y: 3 })]).toEqual([])
    })

    test('two sites share one edge', () => {
        let graph = buildAdjacency([createSite(5, 5), createSite(15, 5)], { width: 20, height: 20 })
        expect(edgeSet(graph)).toEqual(["(15, 5)-(5, 5)"])
    })

    test('duplicate sites are rejected', () => {
        expect(() => buildAdjacency([createSite(1, 1), createSite(2, 2), createSite(1, 1)], { width: 10, height: 10 }))
            .toThrow("duplicate site at (1, 1)")
    })

    test('reports boundary samples and progress', () => {
        let boundary: string[] = []
        let progress: number[] = []
        buildAdjacency([createSite(5, 5), createSite(15, 5)], { width: 20, height: 3 }, {
            onBoundary: (point, a, b) => boundary.push(`${formatKey(point)} ${formatKey(a)} ${formatKey(b)}`),
            onProgress: (done, total) => progress.push(done / total),
        })
        expect(boundary).toEqual([
            "(10, 0) (5, 5) (15, 5)",
            "(10, 1) (5, 5) (15, 5)",
            "(10, 2) (5, 5) (15, 5)",
        ])
        expect(progress).toEqual([0.5, 1])
    })

    describe('random sites', () => {
        let bounds = { width: 200, height: 150 }
        let sites = generateSites(40, bounds, createSeededRandom(2024))
        let graph = buildAdjacency(sites, bounds)

        test('every site is a vertex', () => {
            expect(graph.vertexCount).toBe(40)
            for (let site of sites) {
                expect(graph.hasVertex(site)).toBe(true)
            }
        })

        test('symmetric without self loops', () => {
            for (let vertex of graph.vertices()) {
                for (let neighbor of graph.neighbors(vertex)) {
                    expect(formatKey(neighbor)).not.toBe(formatKey(vertex))
                    expect(graph.hasEdge(neighbor, vertex)).toBe(true)
                }
            }
            let degreeSum = graph.vertices().reduce((sum, v) => sum + graph.degree(v), 0)
            expect(degreeSum).toBe(2 * graph.size)
        })

        test('deterministic for identical input', () => {
            let copies = sites.map(s => createSite(s.x, s.y))
            expect(edgeSet(buildAdjacency(copies, bounds))).toEqual(edgeSet(graph))
        })

        test('finds a connected neighborhood structure', () => {
            expect(graph.size).toBeGreaterThanOrEqual(40)
        })
    })
})
