import { HashMap, HashSet } from "../../shared/hashset"
import { RandomFn } from "../../shared/utils"
import { hashPosition, Positioned, samePosition } from "../../shared/vector"
import { Color } from "./palette"

export type Bounds = {
    width: number
    height: number
}

export type Site = {
    readonly x: number
    readonly y: number
    color: Color | undefined
}

// sites are referred to by coordinate value only
export type SiteKey = Readonly<Positioned>

export function siteKey(p: Positioned): SiteKey {
    return { x: p.x, y: p.y }
}

export function formatKey(key: SiteKey): string {
    return `(${key.x}, ${key.y})`
}

export function createSiteKeySet(capacity?: number): HashSet<SiteKey> {
    return new HashSet<SiteKey>(hashPosition, samePosition, capacity)
}

export function createSiteKeyMap<V>(capacity?: number): HashMap<SiteKey, V> {
    return new HashMap<SiteKey, V>(hashPosition, samePosition, capacity)
}

export function createSite(x: number, y: number): Site {
    return { x, y, color: undefined }
}

// uniform in [0, width) x [0, height), redrawn until all are distinct
export function generateSites(count: number, bounds: Bounds, random: RandomFn): Site[] {
    let taken = createSiteKeySet(count)
    let sites: Site[] = []
    while (sites.length < count) {
        let site = createSite(random() * bounds.width, random() * bounds.height)
        if (taken.add(siteKey(site))) {
            sites.push(site)
        }
    }
    return sites
}
