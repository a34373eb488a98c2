#!/usr/bin/env node
import { resolve } from "node:path"
import { parseConfig, RunConfig } from "./config"
import { writePng } from "./png"
import { rasterize } from "./render"
import { formatKey } from "./site"
import { VoronoiColoring } from "./voronoi"

export async function run(config: RunConfig): Promise<string> {
    let { settings } = config
    let diagram = VoronoiColoring.build(settings, {
        onProgress: (done, total) => console.log(`${done}/${total}`),
        onFallback: (vertex, degree) => console.warn(`dense graph: ordering ${formatKey(vertex)} with ${degree} unseen neighbors`),
    })
    console.log(`${diagram.graph.vertexCount} cells, ${diagram.graph.size} adjacencies`)

    let image = rasterize(diagram, {
        boundary: config.boundary ? diagram.boundary : undefined,
        grid: config.grid,
    })
    let path = resolve(config.output)
    await writePng(image, path)
    return path
}

async function main() {
    let config: RunConfig
    try {
        config = parseConfig(process.argv.slice(2))
    } catch (e) {
        console.error(e instanceof Error ? e.message : e)
        process.exit(1)
    }
    try {
        let path = await run(config)
        console.log("ok; seed is", config.settings.seed, "count is", config.settings.numPoints)
        console.log(path)
    } catch (e) {
        console.error(e)
        process.exit(1)
    }
}

if (require.main === module) {
    void main()
}
