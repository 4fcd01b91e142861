import {describeError, logger} from "../utils/logger.js"
import {escapeHtml} from "../utils/html.js"
import {splitList} from "../utils/text.js"
import type {CatalogConfig} from "../config/schema.js"
import {CharacteristicsParser} from "../characteristics/parser.js"
import {createParseStats, mergeParseStats, type ParseStats} from "../characteristics/types.js"
import {cleanArticleHtml, extractExcerpt} from "./article.js"
import {type DocumentEntry, DocumentLinkParser} from "./documents.js"
import type {AdditionalInfo, ProductRecord} from "./product.js"

const assemblerLogger = logger.child("Description")

const SECTION_SEPARATOR = "\n\n"
const BARCODE_SEPARATOR = /\s*\/\s*/
const PROGRESS_EVERY = 10

export type SectionName = "article" | "characteristics" | "documents" | "additionalInfo" | "attributes" | "description"

export type SectionResult =
    | { ok: true, section: SectionName, html: string }
    | { ok: false, section: SectionName, reason: "empty" }
    | { ok: false, section: SectionName, reason: "failed", error: string }

export type SectionDiagnostic = {
    section: SectionName
    error: string
}

export type DescriptionResult = {
    content: string
    excerpt: string
    attributes: Record<string, string>
    attributesData: Record<string, string>
    extractedFields: Record<string, string>
    diagnostics: SectionDiagnostic[]
}

export type BatchStats = {
    descriptionsBuilt: number
    totalLength: number
    averageLength: number
    errors: string[]
    parse: ParseStats
}

export type BatchReport = {
    results: DescriptionResult[]
    stats: BatchStats
}

function runSection(section: SectionName, render: () => string): SectionResult {
    try {
        const html = render()
        return html ? {ok: true, section, html} : {ok: false, section, reason: "empty"}
    } catch (error) {
        assemblerLogger.error(`Section "${section}" skipped:`, error)
        return {ok: false, section, reason: "failed", error: describeError(error)}
    }
}

function diagnosticsOf(results: ReadonlyArray<SectionResult>): SectionDiagnostic[] {
    return results.flatMap(result =>
        !result.ok && result.reason === "failed" ? [{section: result.section, error: result.error}] : []
    )
}

/**
 * Собирает полное описание товара: статья, характеристики, документы, доп. информация.
 * Ошибка в любой секции не прерывает сборку: секция пропускается и попадает в diagnostics.
 */
export class DescriptionAssembler {
    readonly characteristics: CharacteristicsParser
    readonly documents: DocumentLinkParser

    constructor(private readonly config: CatalogConfig) {
        this.characteristics = new CharacteristicsParser(config)
        this.documents = new DocumentLinkParser(config.documents)
    }

    build(product: ProductRecord, stats?: ParseStats): DescriptionResult {
        try {
            return this.assemble(product, stats)
        } catch (error) {
            assemblerLogger.error(`Failed to build description for ${product.sku || "N/A"}:`, error)
            const content = this.fallbackContent(product)
            return {
                content,
                excerpt: extractExcerpt(content, this.config.excerpt.maxLength),
                attributes: {},
                attributesData: {},
                extractedFields: {},
                diagnostics: [{section: "description", error: describeError(error)}]
            }
        }
    }

    processBatch(products: ReadonlyArray<ProductRecord>): BatchReport {
        const stats: BatchStats = {
            descriptionsBuilt: 0,
            totalLength: 0,
            averageLength: 0,
            errors: [],
            parse: createParseStats()
        }
        const results: DescriptionResult[] = []

        assemblerLogger.info(`Processing ${products.length} products`)

        products.forEach((product, index) => {
            const label = product.sku || `#${index + 1}`
            try {
                const productStats = createParseStats()
                const result = this.build(product, productStats)
                mergeParseStats(stats.parse, productStats)
                for (const diagnostic of result.diagnostics) {
                    stats.errors.push(`${label}: ${diagnostic.section}: ${diagnostic.error}`)
                }
                results.push(result)
                stats.descriptionsBuilt++
                stats.totalLength += result.content.length
            } catch (error) {
                assemblerLogger.error(`Failed to process product ${label}:`, error)
                stats.errors.push(`${label}: ${describeError(error)}`)
            }

            if ((index + 1) % PROGRESS_EVERY === 0) {
                assemblerLogger.info(`Processed ${index + 1}/${products.length} products`)
            }
        })

        stats.averageLength = stats.descriptionsBuilt > 0
            ? Math.round(stats.totalLength / stats.descriptionsBuilt * 10) / 10
            : 0

        assemblerLogger.info(`Batch finished: ${stats.descriptionsBuilt} built, ${stats.errors.length} errors`)
        return {results, stats}
    }

    private assemble(product: ProductRecord, stats?: ParseStats): DescriptionResult {
        const sections: SectionResult[] = [
            runSection("article", () => cleanArticleHtml(product.descriptionRaw)),
            runSection("characteristics", () => this.buildCharacteristicsSection(product.characteristicsRaw, stats)),
            runSection("documents", () => this.buildDocumentsSection(product.documents, product.name)),
            runSection("additionalInfo", () => this.buildAdditionalInfoSection(product.additionalInfo))
        ]

        const content = sections
            .flatMap(section => section.ok ? [section.html] : [])
            .join(SECTION_SEPARATOR)
        const excerpt = extractExcerpt(content, this.config.excerpt.maxLength)

        const result: DescriptionResult = {
            content,
            excerpt,
            attributes: {},
            attributesData: {},
            extractedFields: {},
            diagnostics: diagnosticsOf(sections)
        }

        // Атрибуты собираются заново из исходной строки, независимо от HTML-блока
        try {
            const characteristics = this.characteristics.parse(product.characteristicsRaw)
            const payload = this.characteristics.extractAttributes(characteristics)
            result.attributes = payload.attributes
            result.attributesData = payload.attributesData
            result.extractedFields = this.characteristics.extractFields(characteristics)
        } catch (error) {
            assemblerLogger.error(`Section "attributes" skipped:`, error)
            result.diagnostics.push({section: "attributes", error: describeError(error)})
        }

        assemblerLogger.debug(`Description built: ${content.length} chars, excerpt ${excerpt.length} chars`)
        return result
    }

    buildCharacteristicsSection(raw: string, stats?: ParseStats): string {
        if (!raw.trim()) return ""
        return this.characteristics.formatForDescription(this.characteristics.parse(raw, stats))
    }

    buildDocumentsSection(documents: Readonly<Record<string, string>>, productName: string): string {
        const lines = [`<h3>${escapeHtml(this.config.documents.sectionTitle)}</h3>`]

        for (const [docType, urls] of Object.entries(documents)) {
            const entries = this.documents.parse(urls)
            if (entries.length === 0) continue

            const readableName = this.documents.readableNameFor(docType, productName)
            lines.push(`<h4>${escapeHtml(this.documents.headingFor(docType))}</h4>`)
            lines.push("<ul>")
            for (const entry of entries) {
                lines.push(this.renderDocument({...entry, readableName}))
            }
            lines.push("</ul>")
        }

        // Только заголовок секции: документов нет
        return lines.length > 1 ? lines.join("\n") : ""
    }

    buildAdditionalInfoSection(info: AdditionalInfo): string {
        const {codeLabel, barcodesLabel, exclusiveLabel, affirmative} = this.config.additionalInfo
        const lines: string[] = []

        const code = info.code.trim()
        if (code) {
            lines.push(`<p><strong>${escapeHtml(codeLabel)}:</strong> ${escapeHtml(code)}</p>`)
        }

        const barcodes = splitList(info.barcodes, BARCODE_SEPARATOR)
        if (barcodes.length > 0) {
            lines.push(`<p><strong>${escapeHtml(barcodesLabel)}:</strong> ${escapeHtml(barcodes.join(", "))}</p>`)
        }

        if (info.exclusive.trim().toLowerCase() === affirmative.toLowerCase()) {
            lines.push(`<p><strong>${escapeHtml(exclusiveLabel)}</strong></p>`)
        }

        return lines.join("\n")
    }

    private renderDocument(entry: DocumentEntry): string {
        const icon = entry.icon
            ? `<img src="${escapeHtml(this.config.documents.iconsPath + entry.icon)}" width="32" height="32" ` +
              `alt="${escapeHtml(entry.extension.slice(1).toUpperCase())}" style="vertical-align: middle; margin-right: 8px;" />`
            : ""
        const text = escapeHtml(`${entry.readableName}${entry.fileTypeLabel}`)
        return `<li>${icon}<a href="${escapeHtml(entry.url)}" target="_blank" rel="noopener noreferrer">${text}</a></li>`
    }

    private fallbackContent(product: ProductRecord): string {
        try {
            return cleanArticleHtml(product.descriptionRaw)
        } catch (error) {
            assemblerLogger.warn("Article cleanup failed, keeping raw HTML:", error)
            return product.descriptionRaw
        }
    }
}
