import { midpoint, Positioned } from "../../shared/vector"
import { Bounds } from "./site"

// implicit line a*x + b*y = c
export type Line = {
    a: number
    b: number
    c: number
}

export function lineThrough(p: Positioned, q: Positioned): Line {
    return {
        a: p.y - q.y,
        b: q.x - p.x,
        c: p.y * q.x - q.y * p.x,
    }
}

// perpendicular to line, passing through p
export function perpendicular(line: Line, p: Positioned): Line {
    return {
        a: line.b,
        b: -line.a,
        c: line.b * p.x - line.a * p.y,
    }
}

export function bisector(p: Positioned, q: Positioned): Line {
    return perpendicular(lineThrough(p, q), midpoint(p, q))
}

export function isDegenerate(line: Line): boolean {
    return line.a == 0 && line.b == 0
}

/**
 * Points on the line at every integer step of the axis it is less steep against,
 * so the solved coordinate never divides by a small coefficient.
 * Points outside the bounds are skipped, so adjacencies only outside the area are not recorded.
 * Degenerate lines give nothing.
 */
export function* sampleLine(line: Line, bounds: Bounds): Generator<Positioned> {
    if (isDegenerate(line)) {
        return
    }
    let { a, b, c } = line
    if (Math.abs(b) > Math.abs(a)) {
        for (let x = 0; x < bounds.width; x++) {
            let y = (c - a * x) / b
            if (y >= 0 && y < bounds.height) {
                yield { x, y }
            }
        }
    } else {
        for (let y = 0; y < bounds.height; y++) {
            let x = (c - b * y) / a
            if (x >= 0 && x < bounds.width) {
                yield { x, y }
            }
        }
    }
}
