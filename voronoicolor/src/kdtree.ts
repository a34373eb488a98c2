import { assert } from "../../shared/utils"
import { distanceSqr, Positioned } from "../../shared/vector"

type Axis = "x" | "y"

type Indexed<T> = {
    item: T
    index: number // insertion order, breaks distance ties
}

type KDNode<T> = Indexed<T> & {
    axis: Axis
    left: KDNode<T> | null
    right: KDNode<T> | null
}

type Candidate<T> = Indexed<T> & {
    distance: number
}

export type Neighbor<T> = {
    item: T
    distance: number // squared euclidean
}

function buildNode<T extends Positioned>(items: Indexed<T>[], depth: number): KDNode<T> | null {
    if (items.length == 0) {
        return null
    }
    let axis: Axis = depth % 2 == 0 ? "x" : "y"
    let sorted = [...items].sort((a, b) => a.item[axis] - b.item[axis])
    let median = Math.floor(sorted.length / 2)
    return {
        ...sorted[median],
        axis,
        left: buildNode(sorted.slice(0, median), depth + 1),
        right: buildNode(sorted.slice(median + 1), depth + 1),
    }
}

function isCloser<T>(a: Candidate<T>, b: Candidate<T>): boolean {
    return a.distance < b.distance || (a.distance == b.distance && a.index < b.index)
}

// keeps best sorted and at most k long
function offer<T>(best: Candidate<T>[], candidate: Candidate<T>, k: number) {
    let position = best.length
    while (position > 0 && isCloser(candidate, best[position - 1])) {
        position--
    }
    if (position < k) {
        best.splice(position, 0, candidate)
        if (best.length > k) {
            best.pop()
        }
    }
}

// 2-d tree, built once from a fixed item list
export class KDTree<T extends Positioned> {
    private readonly root: KDNode<T> | null
    readonly size: number

    constructor(items: readonly T[]) {
        this.size = items.length
        this.root = buildNode(items.map((item, index) => ({ item, index })), 0)
    }

    /**
     * The k items closest to point, ascending by squared distance.
     * Equal distances are ordered by insertion index.
     */
    kNearest(point: Positioned, k: number): Neighbor<T>[] {
        assert(Number.isInteger(k) && k >= 1 && k <= this.size, `cannot query ${k} nearest of ${this.size} items`)
        let best: Candidate<T>[] = []
        this.search(this.root, point, k, best)
        return best.map(({ item, distance }) => ({ item, distance }))
    }

    nearest(point: Positioned): T {
        return this.kNearest(point, 1)[0].item
    }

    private search(node: KDNode<T> | null, point: Positioned, k: number, best: Candidate<T>[]) {
        if (node === null) {
            return
        }
        offer(best, { item: node.item, index: node.index, distance: distanceSqr(point, node.item) }, k)

        let offset = point[node.axis] - node.item[node.axis]
        let [near, far] = offset < 0 ? [node.left, node.right] : [node.right, node.left]
        this.search(near, point, k, best)
        // ties on the far side may still win by index, so only prune strictly
        let worst = best.length < k ? Infinity : best[k - 1].distance
        if (offset * offset <= worst) {
            this.search(far, point, k, best)
        }
    }
}
