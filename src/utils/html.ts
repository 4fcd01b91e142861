const ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
};

const ENTITIES: Record<string, string> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&nbsp;': ' ',
};

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"]/g, char => ESCAPES[char] ?? char);
}

/**
 * Раскрывает только те сущности, которые появляются при escapeHtml, и &nbsp;
 */
export function decodeEntities(text: string): string {
    return text.replace(/&(?:amp|lt|gt|quot|nbsp);/g, entity => ENTITIES[entity] ?? entity);
}

// Тег начинается с буквы, "/" или "!"; одиночный "<" (как в "<50 дБ") остается текстом
const TAG = /<\/?[a-zA-Z!][^>]*>/g;

/**
 * Заменяет каждый тег пробелом
 */
export function stripMarkup(html: string): string {
    return html.replace(TAG, ' ');
}
