const NON_WORD_RUN = /[^\p{L}\p{M}\p{N}_]+/gu;

/**
 * Сводит пробельные символы к одному пробелу и обрезает края
 */
export function collapseWhitespace(text: string | null | undefined): string {
    if (!text) return '';
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Каноническая форма ключа характеристики: только для сравнения, не для вывода
 */
export function normalizeKey(key: string | null | undefined): string {
    if (!key) return '';
    return collapseWhitespace(key.toLowerCase().replace(NON_WORD_RUN, ' '));
}

/**
 * Проверяет вхождение подстроки в обе стороны
 */
export function containsEither(a: string, b: string): boolean {
    return a.includes(b) || b.includes(a);
}

/**
 * Обрезает строку до maxLength, по возможности на границе слова.
 * Граница слова используется, только если последний пробел стоит не левее minBoundary.
 */
export function truncateAtWord(text: string, maxLength: number, minBoundary: number): { text: string, truncated: boolean } {
    if (text.length <= maxLength) {
        return {text, truncated: false};
    }

    const cut = text.slice(0, maxLength);
    const lastSpace = cut.lastIndexOf(' ');
    if (lastSpace >= minBoundary) {
        return {text: cut.slice(0, lastSpace), truncated: true};
    }
    return {text: cut, truncated: true};
}

/**
 * Делит строку по разделителю, отбрасывая пустые куски
 */
export function splitList(text: string | null | undefined, separator: string | RegExp): string[] {
    if (!text) return [];
    return text
        .split(separator)
        .map(part => part.trim())
        .filter(part => part.length > 0);
}
