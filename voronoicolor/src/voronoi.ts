import { createSeededRandom, deriveSeed } from "../../shared/random"
import { assert } from "../../shared/utils"
import { Positioned } from "../../shared/vector"
import { AdjacencyGraph, buildAdjacency, DEFAULT_TOLERANCE } from "./adjacency"
import { colorSites, isProperColoring, SiteColoring } from "./coloring"
import { KDTree } from "./kdtree"
import { degeneracyOrder, DEFAULT_DEGREE_THRESHOLD } from "./ordering"
import { Color, PALETTE } from "./palette"
import { Bounds, generateSites, Site, SiteKey } from "./site"

export type DiagramSettings = Bounds & {
    seed: number
    numPoints: number
    tolerance: number
    degreeThreshold: number
    palette: readonly Color[]
}

export const DEFAULT_SETTINGS: Omit<DiagramSettings, "seed"> = {
    width: 58 * 40,
    height: 20 * 40,
    numPoints: 20,
    tolerance: DEFAULT_TOLERANCE,
    degreeThreshold: DEFAULT_DEGREE_THRESHOLD,
    palette: PALETTE,
}

export type BuildListener = {
    onProgress?: (done: number, total: number) => void
    onFallback?: (vertex: SiteKey, residualDegree: number) => void
}

export class VoronoiColoring {
    private constructor(
        readonly bounds: Bounds,
        readonly sites: readonly Site[],
        readonly graph: AdjacencyGraph,
        readonly coloring: SiteColoring,
        readonly boundary: readonly Positioned[],
        private readonly index: KDTree<Site>,
    ) { }

    // sites from seed, then adjacency, then a coloring seeded by a derived stream
    static build(settings: DiagramSettings, listener: BuildListener = {}): VoronoiColoring {
        let sites = generateSites(settings.numPoints, settings, createSeededRandom(settings.seed))
        return VoronoiColoring.fromSites(sites, settings, deriveSeed(settings.seed, 1), listener)
    }

    static fromSites(
        sites: readonly Site[],
        settings: Bounds & Partial<Pick<DiagramSettings, "tolerance" | "degreeThreshold" | "palette">>,
        colorSeed: number,
        listener: BuildListener = {},
    ): VoronoiColoring {
        let index = new KDTree(sites)
        let boundary: Positioned[] = []
        let graph = buildAdjacency(sites, settings, {
            tolerance: settings.tolerance,
            onBoundary: point => boundary.push(point),
            onProgress: listener.onProgress,
        }, index)
        let order = degeneracyOrder(graph, {
            threshold: settings.degreeThreshold,
            onFallback: listener.onFallback,
        })
        let coloring = colorSites(graph, sites, colorSeed, { order, palette: settings.palette })
        assert(isProperColoring(graph, coloring), "adjacent sites share a color")
        let bounds = { width: settings.width, height: settings.height }
        return new VoronoiColoring(bounds, sites, graph, coloring, boundary, index)
    }

    nearestSite(point: Positioned): Site {
        return this.index.nearest(point)
    }
}
