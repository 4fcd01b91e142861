import {collapseWhitespace} from "../utils/text.js"
import type {BooleansConfig} from "../config/schema.js"

function lowerKeys(tokens: Readonly<Record<string, string>>): ReadonlyMap<string, string> {
    return new Map(Object.entries(tokens).map(([token, label]) => [token.toLowerCase(), label]))
}

/**
 * Одно и то же значение выводится двумя способами:
 * в HTML-описании "Да"/"Нет", в словаре атрибутов "yes"/"no".
 */
export class ValueNormalizer {
    private readonly display: ReadonlyMap<string, string>
    private readonly attribute: ReadonlyMap<string, string>

    constructor(booleans: BooleansConfig) {
        this.display = lowerKeys(booleans.display)
        this.attribute = lowerKeys(booleans.attribute)
    }

    normalize(value: string | null | undefined): string {
        return collapseWhitespace(value)
    }

    forDisplay(value: string | null | undefined): string {
        return this.translate(value, this.display)
    }

    forAttribute(value: string | null | undefined): string {
        return this.translate(value, this.attribute)
    }

    private translate(value: string | null | undefined, tokens: ReadonlyMap<string, string>): string {
        const normalized = this.normalize(value)
        return tokens.get(normalized.toLowerCase()) ?? normalized
    }
}
