import {logger} from "../utils/logger.js"
import {escapeHtml} from "../utils/html.js"
import {normalizeKey} from "../utils/text.js"
import type {CatalogConfig} from "../config/schema.js"
import {GroupClassifier} from "./classifier.js"
import {AttributeMatcher, type AttributeSuggestion} from "./matcher.js"
import {mergeDimensions} from "./dimensions.js"
import {tokenize} from "./tokenizer.js"
import {ValueNormalizer} from "./values.js"
import type {Characteristic, GroupingResult, ParseStats} from "./types.js"

const parserLogger = logger.child("Characteristics")

export type AttributePayload = {
    attributes: Record<string, string>
    attributesData: Record<string, string>
}

export type UnmatchedCharacteristic = {
    key: string
    suggestions: AttributeSuggestion[]
}

/**
 * Разбор строки характеристик: группы для описания, атрибуты словаря, отдельные поля
 */
export class CharacteristicsParser {
    readonly classifier: GroupClassifier
    readonly matcher: AttributeMatcher
    readonly values: ValueNormalizer

    constructor(private readonly config: CatalogConfig) {
        this.classifier = new GroupClassifier(config.groups.rules, config.groups.default)
        this.matcher = new AttributeMatcher(config.attributes.vocabulary)
        this.values = new ValueNormalizer(config.booleans)
    }

    /**
     * Характеристики в порядке исходного текста
     */
    parse(raw: string | null | undefined, stats?: ParseStats): Characteristic[] {
        const characteristics = tokenize(raw, stats).map(({key, value}) => {
            const {isAttribute, slug} = this.matcher.match(key)
            return Object.freeze({
                key,
                value: this.values.normalize(value),
                group: this.classifier.classify(key),
                isExternalAttribute: isAttribute,
                attributeSlug: slug
            })
        })

        if (stats) {
            stats.groupedCharacteristics += characteristics.length
            stats.attributesFound += characteristics.filter(c => c.isExternalAttribute).length
        }

        parserLogger.debug(`Parsed ${characteristics.length} characteristics`)
        return characteristics
    }

    parseAndGroup(raw: string | null | undefined, stats?: ParseStats): GroupingResult {
        return this.group(this.parse(raw, stats))
    }

    group(characteristics: ReadonlyArray<Characteristic>): GroupingResult {
        const grouped: GroupingResult = new Map()
        for (const characteristic of characteristics) {
            const list = grouped.get(characteristic.group)
            if (list) {
                list.push(characteristic)
            } else {
                grouped.set(characteristic.group, [characteristic])
            }
        }
        return grouped
    }

    /**
     * Значения для словаря атрибутов: булевы значения кодируются как yes/no
     */
    extractAttributes(characteristics: ReadonlyArray<Characteristic>): AttributePayload {
        const {dimensionsSlug, dimensions, visibility} = this.config.attributes
        const attributes: Record<string, string> = {}
        const attributesData: Record<string, string> = {}

        for (const characteristic of characteristics) {
            if (!characteristic.isExternalAttribute || !characteristic.attributeSlug) continue
            const value = this.values.forAttribute(characteristic.value)
            if (!value) continue

            attributes[characteristic.attributeSlug] = value
            attributesData[`${characteristic.attributeSlug}_data`] = visibility
        }

        if (this.matcher.declares(dimensionsSlug)) {
            const merged = mergeDimensions(characteristics, dimensions)
            if (merged) {
                attributes[dimensionsSlug] = merged
                attributesData[`${dimensionsSlug}_data`] = visibility
            }
        }

        parserLogger.debug(`Extracted ${Object.keys(attributes).length} attributes`)
        return {attributes, attributesData}
    }

    /**
     * Именованные поля (вес, ширина...) по таблице ключевых слов; для поля берется первая подходящая характеристика
     */
    extractFields(characteristics: ReadonlyArray<Characteristic>): Record<string, string> {
        const extracted: Record<string, string> = {}

        for (const [field, keywords] of Object.entries(this.config.extractFields)) {
            const needles = keywords.map(keyword => normalizeKey(keyword)).filter(needle => needle.length > 0)
            const found = characteristics.find(characteristic => {
                if (!characteristic.value) return false
                const key = normalizeKey(characteristic.key)
                return needles.some(needle => key.includes(needle))
            })
            if (found) {
                extracted[field] = found.value
            }
        }

        parserLogger.debug(`Extracted fields: ${Object.keys(extracted).join(", ") || "none"}`)
        return extracted
    }

    /**
     * HTML-блок характеристик, сгруппированных в порядке конфигурации
     */
    formatForDescription(characteristics: ReadonlyArray<Characteristic>): string {
        const grouped = this.group(characteristics)
        if (grouped.size === 0) return ""

        const lines: string[] = []
        for (const groupName of this.classifier.displayOrder()) {
            const items = grouped.get(groupName)
            if (!items || items.length === 0) continue

            lines.push(`<h4>${escapeHtml(groupName)}</h4>`)
            lines.push("<ul>")
            for (const item of items) {
                lines.push(this.renderItem(item))
            }
            lines.push("</ul>")
        }

        if (lines.length === 0) return ""
        return [`<h3>${escapeHtml(this.config.groups.sectionTitle)}</h3>`, ...lines].join("\n")
    }

    /**
     * Характеристики, не попавшие в словарь, с ближайшими кандидатами
     */
    unmatched(characteristics: ReadonlyArray<Characteristic>, limit = 3): UnmatchedCharacteristic[] {
        return characteristics
            .filter(characteristic => !characteristic.isExternalAttribute)
            .map(characteristic => ({
                key: characteristic.key,
                suggestions: this.matcher.suggest(characteristic.key, limit)
            }))
    }

    private renderItem(item: Characteristic): string {
        const key = escapeHtml(item.key)
        const value = this.values.forDisplay(item.value)
        if (!value) {
            return `<li>${key}</li>`
        }
        return `<li><strong>${key}:</strong> ${escapeHtml(value)}</li>`
    }
}
