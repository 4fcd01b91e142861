import {collapseWhitespace, truncateAtWord} from "../utils/text.js"
import {decodeEntities, stripMarkup} from "../utils/html.js"
import {DEFAULT_EXCERPT_LENGTH} from "../config/schema.js"

// Граница слова учитывается, только если она не левее 70% длины
const EXCERPT_BOUNDARY_PERCENT = 70

/**
 * Приводит HTML статьи товара к виду, пригодному для описания
 */
export function cleanArticleHtml(html: string | null | undefined): string {
    if (!html) return ""

    let cleaned = html
        .replace(/\r\n?/g, "\n")
        .replace(/&nbsp;|\u00a0/g, " ")
        .trim()

    cleaned = cleaned
        .replace(/\n\s*\n+/g, "\n\n")
        .replace(/^[^\S\n]+/gm, "")

    if (!cleaned) return ""

    if (!cleaned.includes("<") || !cleaned.includes(">")) {
        cleaned = `<p>${cleaned}</p>`
    }

    return cleaned.replace(/<br\s*\/?>/gi, "<br />")
}

/**
 * Краткое описание без разметки, обрезанное по границе слова
 */
export function extractExcerpt(html: string | null | undefined, maxLength: number = DEFAULT_EXCERPT_LENGTH): string {
    if (!html) return ""

    const text = collapseWhitespace(decodeEntities(stripMarkup(html)))
    const {text: excerpt, truncated} = truncateAtWord(text, maxLength, Math.ceil(maxLength * EXCERPT_BOUNDARY_PERCENT / 100))

    return truncated ? `${excerpt}...` : excerpt
}
