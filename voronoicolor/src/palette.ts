export type Color = Readonly<{
    r: number
    g: number
    b: number
    a: number
}>

function rgb(r: number, g: number, b: number): Color {
    return { r, g, b, a: 255 }
}

// six colors, so any graph of degeneracy 5 can be colored
export const PALETTE: readonly Color[] = [
    rgb(155, 17, 30),
    rgb(190, 83, 28),
    rgb(241, 196, 0),
    rgb(19, 104, 67),
    rgb(135, 206, 235),
    rgb(89, 49, 95),
]

export const BOUNDARY_COLOR: Color = rgb(0, 0, 0)
export const GRID_COLOR: Color = rgb(128, 128, 128)
