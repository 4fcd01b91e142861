import Fuse from "fuse.js"
import {containsEither, normalizeKey} from "../utils/text.js"

export type AttributeMatch = {
    isAttribute: boolean
    slug: string
}

export type AttributeSuggestion = {
    key: string
    slug: string
    score: number
}

type VocabularyEntry = {
    key: string
    slug: string
    normalizedKey: string
}

const NO_MATCH: AttributeMatch = Object.freeze({isAttribute: false, slug: ""})
const SUGGEST_THRESHOLD = 0.4

/**
 * Сопоставляет ключ характеристики с внешним словарем атрибутов.
 * Сначала точное совпадение, затем вхождение нормализованных строк в любую сторону.
 */
export class AttributeMatcher {
    private readonly exact: ReadonlyMap<string, string>
    private readonly entries: ReadonlyArray<VocabularyEntry>
    private fuse?: Fuse<VocabularyEntry>

    constructor(vocabulary: Readonly<Record<string, string>>) {
        this.exact = new Map(Object.entries(vocabulary))
        this.entries = Object.entries(vocabulary).map(([key, slug]) => ({
            key,
            slug,
            normalizedKey: normalizeKey(key)
        }))
    }

    get size(): number {
        return this.entries.length
    }

    match(key: string): AttributeMatch {
        const exactSlug = this.exact.get(key)
        if (exactSlug !== undefined) {
            return {isAttribute: true, slug: exactSlug}
        }

        const normalized = normalizeKey(key)
        if (!normalized) return NO_MATCH

        // Короткие общие слова в словаре дают ложные срабатывания; побеждает первый ключ словаря
        for (const entry of this.entries) {
            if (entry.normalizedKey && containsEither(normalized, entry.normalizedKey)) {
                return {isAttribute: true, slug: entry.slug}
            }
        }
        return NO_MATCH
    }

    declares(slug: string): boolean {
        return this.entries.some(entry => entry.slug === slug)
    }

    /**
     * Ближайшие ключи словаря для характеристики, которая не сопоставилась
     */
    suggest(key: string, limit = 3): AttributeSuggestion[] {
        const query = normalizeKey(key)
        if (!query || limit <= 0 || this.entries.length === 0) return []

        if (!this.fuse) {
            this.fuse = new Fuse([...this.entries], {
                keys: [
                    {name: "normalizedKey", weight: 0.8},
                    {name: "slug", weight: 0.2}
                ],
                threshold: SUGGEST_THRESHOLD,
                includeScore: true,
                ignoreLocation: true
            })
        }

        return this.fuse.search(query, {limit}).map(result => ({
            key: result.item.key,
            slug: result.item.slug,
            score: result.score ?? 1
        }))
    }
}
