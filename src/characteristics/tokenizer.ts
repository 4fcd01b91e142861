import type {CharacteristicPair, ParseStats} from "./types.js"

/**
 * Делит строку по ";" только вне круглых скобок
 */
export function splitOutsideBrackets(text: string): string[] {
    const parts: string[] = []
    let current = ""
    let depth = 0

    for (const char of text) {
        if (char === "(") {
            depth++
        } else if (char === ")") {
            depth--
        }

        if (char === ";" && depth === 0) {
            const part = current.trim()
            if (part) parts.push(part)
            current = ""
        } else {
            current += char
        }
    }

    const last = current.trim()
    if (last) parts.push(last)

    return parts
}

function splitNaive(text: string): string[] {
    return text.split(";").map(part => part.trim()).filter(part => part.length > 0)
}

function stripTrailingSemicolons(value: string): string {
    return value.replace(/;+$/, "").trim()
}

/**
 * Разбирает строку вида "Ключ: Значение; Ключ: Значение" в упорядоченные пары.
 * Некорректный ввод не приводит к ошибке: сегмент без двоеточия становится ключом с пустым значением.
 */
export function tokenize(raw: string | null | undefined, stats?: ParseStats): CharacteristicPair[] {
    if (!raw) return []

    const text = raw.trim()
    let segments = splitOutsideBrackets(text)

    // Несбалансированные скобки склеивают всю строку в один сегмент
    if (segments.length <= 1) {
        segments = splitNaive(text)
    }

    const pairs: CharacteristicPair[] = []
    let parsed = 0

    for (const segment of segments) {
        const colon = segment.indexOf(":")
        if (colon === -1) {
            pairs.push({key: segment, value: ""})
            continue
        }

        const key = segment.slice(0, colon).trim()
        const value = stripTrailingSemicolons(segment.slice(colon + 1).trim())
        if (key && value) {
            pairs.push({key, value})
            parsed++
        }
    }

    if (stats) {
        stats.totalCharacteristics += pairs.length
        stats.parsedCharacteristics += parsed
    }

    return pairs
}

/**
 * Обратная операция к tokenize для пар без разделителей в значениях
 */
export function joinPairs(pairs: ReadonlyArray<CharacteristicPair>): string {
    return pairs.map(({key, value}) => value ? `${key}: ${value}` : key).join("; ")
}
