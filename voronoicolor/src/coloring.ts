import { HashMap } from "../../shared/hashset"
import { createSeededRandom } from "../../shared/random"
import { assert, assertExists, shuffle } from "../../shared/utils"
import { AdjacencyGraph } from "./adjacency"
import { degeneracyOrder } from "./ordering"
import { Color, PALETTE } from "./palette"
import { createSiteKeyMap, formatKey, Site, SiteKey } from "./site"

export type SiteColoring = HashMap<SiteKey, Color>

export type ColoringOptions = {
    palette?: readonly Color[]
    order?: readonly SiteKey[]
}

// a vertex had every palette color among its colored neighbors
export class ColoringExhaustedError extends Error {
    constructor(readonly site: SiteKey, readonly paletteSize: number) {
        super(`no free color for ${formatKey(site)}, all ${paletteSize} colors taken by neighbors`)
        this.name = "ColoringExhaustedError"
    }
}

function takenColors(graph: AdjacencyGraph, vertex: SiteKey, coloring: SiteColoring): Set<Color> {
    let taken = new Set<Color>()
    for (let neighbor of graph.neighbors(vertex)) {
        let color = coloring.get(neighbor)
        if (color !== undefined) {
            taken.add(color)
        }
    }
    return taken
}

/**
 * Greedy coloring along the elimination order, last vertex first.
 * Each site gets a random palette color not used by an already colored neighbor.
 * Colors are written to the sites and returned by key.
 */
export function colorSites(
    graph: AdjacencyGraph,
    sites: readonly Site[],
    seed: number,
    options: ColoringOptions = {},
): SiteColoring {
    let palette = options.palette ?? PALETTE
    assert(palette.length > 0, "palette is empty")
    let bySite = createSiteKeyMap<Site>(sites.length)
    for (let site of sites) {
        assert(graph.hasVertex(site), `site ${formatKey(site)} is not in the graph`)
        bySite.set(site, site)
    }

    let order = options.order ?? degeneracyOrder(graph)
    let random = createSeededRandom(seed)
    let coloring: SiteColoring = createSiteKeyMap<Color>(order.length)
    for (let i = order.length - 1; i >= 0; i--) {
        let vertex = order[i]
        let taken = takenColors(graph, vertex, coloring)
        let color = shuffle([...palette], random).find(c => !taken.has(c))
        if (color === undefined) {
            throw new ColoringExhaustedError(vertex, palette.length)
        }
        coloring.set(vertex, color)
        let site = bySite.get(vertex)
        assertExists(site, `${formatKey(vertex)} has no site`)
        site.color = color
    }
    return coloring
}

export function isProperColoring(graph: AdjacencyGraph, coloring: SiteColoring): boolean {
    for (let [a, b] of graph.edges()) {
        let colorA = coloring.get(a)
        if (colorA === undefined || colorA === coloring.get(b)) {
            return false
        }
    }
    return true
}
