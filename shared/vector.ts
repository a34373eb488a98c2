export type Positioned = {
    x: number;
    y: number;
}

export function midpoint(a: Positioned, b: Positioned): Positioned {
    return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

export function distanceSqr(a: Positioned, b: Positioned): number {
    let dx = a.x - b.x;
    let dy = a.y - b.y;
    return dx * dx + dy * dy;
}

export function samePosition(a: Positioned, b: Positioned): boolean {
    return a.x === b.x && a.y === b.y;
}

// quantizes to 1/1024 units, positions closer than that only collide
export function hashPosition(p: Positioned): number {
    let hx = Math.imul(Math.floor(p.x * 1024) | 0, 73856093)
    let hy = Math.imul(Math.floor(p.y * 1024) | 0, 19349663)
    return (hx ^ hy) >>> 0
}
