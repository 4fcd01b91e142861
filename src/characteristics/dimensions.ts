import {normalizeKey} from "../utils/text.js"
import type {DimensionAxes} from "../config/schema.js"
import type {CharacteristicPair} from "./types.js"

const AXIS_ORDER = ["width", "height", "length"] as const

type Axis = typeof AXIS_ORDER[number]

export const DEFAULT_AXES: DimensionAxes = {
    width: ["ширин"],
    height: ["высот"],
    length: ["глубин", "длин"]
}

function axisOf(normalizedKey: string, axes: DimensionAxes): Axis | undefined {
    // Порядок проверки важен: ключ "ширина/высота" относится к ширине
    return AXIS_ORDER.find(axis => axes[axis].some(keyword => keyword !== "" && normalizedKey.includes(keyword.toLowerCase())))
}

/**
 * Собирает ширину, высоту и длину (глубину) в одно значение "Ш x В x Д".
 * Для каждой оси берется первое найденное значение.
 */
export function mergeDimensions(
    characteristics: ReadonlyArray<CharacteristicPair>,
    axes: DimensionAxes = DEFAULT_AXES
): string | undefined {
    const found = new Map<Axis, string>()

    for (const {key, value} of characteristics) {
        if (!value) continue
        const axis = axisOf(normalizeKey(key), axes)
        if (axis && !found.has(axis)) {
            found.set(axis, value)
        }
    }

    const parts = AXIS_ORDER.flatMap(axis => {
        const value = found.get(axis)
        return value ? [value] : []
    })

    return parts.length > 0 ? parts.join(" x ") : undefined
}
