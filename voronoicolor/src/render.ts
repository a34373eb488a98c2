import { assertExists } from "../../shared/utils"
import { Positioned } from "../../shared/vector"
import { BOUNDARY_COLOR, Color, GRID_COLOR } from "./palette"
import { Bounds, formatKey, Site } from "./site"

// RGBA rows top to bottom, same layout as canvas ImageData
export type RasterImage = Bounds & {
    data: Uint8ClampedArray
}

export type GridLines = {
    columns: number
    rows: number
}

export type RasterOptions = {
    boundary?: Iterable<Positioned>
    grid?: GridLines
}

export type ColoredDiagram = {
    bounds: Bounds
    boundary: readonly Positioned[]
    nearestSite(point: Positioned): Site
}

export function createImage(bounds: Bounds): RasterImage {
    return {
        width: bounds.width,
        height: bounds.height,
        data: new Uint8ClampedArray(bounds.width * bounds.height * 4),
    }
}

export function setPixel(image: RasterImage, x: number, y: number, color: Color) {
    if (x < 0 || y < 0 || x >= image.width || y >= image.height) {
        return
    }
    let offset = (y * image.width + x) * 4
    image.data[offset] = color.r
    image.data[offset + 1] = color.g
    image.data[offset + 2] = color.b
    image.data[offset + 3] = color.a
}

function drawGrid(image: RasterImage, grid: GridLines) {
    let columnStep = Math.max(1, Math.floor(image.width / grid.columns))
    let rowStep = Math.max(1, Math.floor(image.height / grid.rows))
    for (let x = 0; x < image.width; x += columnStep) {
        for (let y = 0; y < image.height; y++) {
            setPixel(image, x, y, GRID_COLOR)
        }
    }
    for (let y = 0; y < image.height; y += rowStep) {
        for (let x = 0; x < image.width; x++) {
            setPixel(image, x, y, GRID_COLOR)
        }
    }
}

/**
 * Fills every pixel with the color of its nearest site,
 * then draws boundary samples and grid lines on top.
 */
export function rasterize(diagram: ColoredDiagram, options: RasterOptions = {}): RasterImage {
    let image = createImage(diagram.bounds)
    for (let y = 0; y < image.height; y++) {
        for (let x = 0; x < image.width; x++) {
            let site = diagram.nearestSite({ x, y })
            assertExists(site.color, `site ${formatKey(site)} is not colored`)
            setPixel(image, x, y, site.color)
        }
    }
    for (let point of options.boundary ?? []) {
        setPixel(image, Math.floor(point.x), Math.floor(point.y), BOUNDARY_COLOR)
    }
    if (options.grid !== undefined) {
        drawGrid(image, options.grid)
    }
    return image
}
