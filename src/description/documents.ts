import path from "path"
import {logger} from "../utils/logger.js"
import {collapseWhitespace, splitList} from "../utils/text.js"
import type {DocumentsConfig} from "../config/schema.js"

const documentsLogger = logger.child("Documents")

export type DocumentEntry = {
    url: string
    filename: string
    extension: string
    icon: string
    fileTypeLabel: string
    readableName: string
}

function pathnameOf(url: string): string {
    let pathname: string
    try {
        pathname = new URL(url).pathname
    } catch {
        // Относительная ссылка или мусор: отрезаем query и fragment вручную
        pathname = url.split(/[?#]/, 1)[0] ?? ""
    }
    return decodePath(pathname)
}

// URL.pathname кодирует кириллицу и пробелы; битый %-escape оставляем как есть
function decodePath(pathname: string): string {
    try {
        return decodeURIComponent(pathname)
    } catch {
        return pathname
    }
}

/**
 * Разбирает список ссылок на документы (через запятую) в метаданные файлов
 */
export class DocumentLinkParser {
    private readonly icons: ReadonlyMap<string, string>
    private readonly fileTypes: ReadonlyMap<string, string>

    constructor(private readonly config: DocumentsConfig) {
        this.icons = new Map(Object.entries(config.icons).map(([ext, icon]) => [ext.toLowerCase(), icon]))
        this.fileTypes = new Map(Object.entries(config.fileTypes).map(([ext, label]) => [ext.toLowerCase(), label]))
    }

    parse(urlList: string | null | undefined): DocumentEntry[] {
        const entries = splitList(urlList, ",").map(url => this.parseUrl(url))
        documentsLogger.debug(`Parsed ${entries.length} document links`)
        return entries
    }

    parseUrl(url: string): DocumentEntry {
        const filename = path.posix.basename(pathnameOf(url))
        const extension = path.posix.extname(filename).toLowerCase()
        const stem = extension ? filename.slice(0, -extension.length) : filename

        return {
            url,
            filename,
            extension,
            icon: this.icons.get(extension) ?? this.config.defaultIcon,
            fileTypeLabel: this.fileTypes.get(extension) ?? "",
            readableName: stem
        }
    }

    /**
     * Слово-префикс для имени документа по его типу ("Чертежи" -> "Чертеж")
     */
    nameWordFor(docType: string): string {
        return this.config.nameWords[docType] ?? this.config.defaultNameWord
    }

    headingFor(docType: string): string {
        return this.config.headings[docType] ?? docType
    }

    readableNameFor(docType: string, productName: string): string {
        const word = this.nameWordFor(docType)
        const cleanName = sanitizeProductName(productName, this.config.maxProductNameLength)
        return cleanName ? `${word} ${cleanName}` : word
    }
}

/**
 * Название товара, пригодное для имени файла: "/" -> "-", без спецсимволов, не длиннее maxLength
 */
export function sanitizeProductName(name: string | null | undefined, maxLength = 60): string {
    if (!name) return ""

    const clean = collapseWhitespace(
        name
            .replace(/\//g, "-")
            .replace(/[^\p{L}\p{M}\p{N}_\s-]/gu, " ")
    )

    if (clean.length <= maxLength) return clean

    const truncated = clean.slice(0, maxLength)
    const lastSpace = truncated.lastIndexOf(" ")
    // Обрезаем по слову, только если теряем не больше трети строки
    return lastSpace > Math.floor(maxLength * 2 / 3) ? truncated.slice(0, lastSpace) : truncated
}
