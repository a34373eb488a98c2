import { parseArgs } from "node:util"
import { GridLines } from "./render"
import { DEFAULT_SETTINGS, DiagramSettings } from "./voronoi"

export const DEFAULT_GRID: GridLines = { columns: 58, rows: 20 }
export const DEFAULT_OUTPUT = "voronoi.png"

export type RunConfig = {
    settings: DiagramSettings
    grid: GridLines | undefined
    boundary: boolean
    output: string
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "ConfigError"
    }
}

function parseNumber(name: string, value: string | undefined, fallback: number, check: (n: number) => boolean, requirement: string): number {
    if (value === undefined) {
        return fallback
    }
    let parsed = Number(value)
    if (value.trim() === "" || !Number.isFinite(parsed) || !check(parsed)) {
        throw new ConfigError(`--${name} must be ${requirement}, got "${value}"`)
    }
    return parsed
}

const isPositiveInteger = (n: number) => Number.isInteger(n) && n > 0

export function parseConfig(argv: string[], now: () => number = Date.now): RunConfig {
    let { values } = parseArgs({
        args: argv,
        options: {
            "num-points": { type: "string" },
            "seed": { type: "string" },
            "width": { type: "string" },
            "height": { type: "string" },
            "tolerance": { type: "string" },
            "no-grid": { type: "boolean" },
            "no-boundary": { type: "boolean" },
            "out": { type: "string" },
        },
        strict: true,
    })

    let settings: DiagramSettings = {
        ...DEFAULT_SETTINGS,
        seed: parseNumber("seed", values["seed"], now(), Number.isSafeInteger, "an integer"),
        numPoints: parseNumber("num-points", values["num-points"], DEFAULT_SETTINGS.numPoints, isPositiveInteger, "a positive integer"),
        width: parseNumber("width", values["width"], DEFAULT_SETTINGS.width, isPositiveInteger, "a positive integer"),
        height: parseNumber("height", values["height"], DEFAULT_SETTINGS.height, isPositiveInteger, "a positive integer"),
        tolerance: parseNumber("tolerance", values["tolerance"], DEFAULT_SETTINGS.tolerance, n => n > 0, "a positive number"),
    }
    return {
        settings,
        grid: values["no-grid"] ? undefined : DEFAULT_GRID,
        boundary: !values["no-boundary"],
        output: values["out"] ?? DEFAULT_OUTPUT,
    }
}
