export type CharacteristicPair = {
    key: string
    value: string
}

export type Characteristic = Readonly<{
    key: string
    value: string
    group: string
    isExternalAttribute: boolean
    attributeSlug: string
}>

/**
 * Группа -> характеристики в порядке исходного текста
 */
export type GroupingResult = Map<string, Characteristic[]>

export type ParseStats = {
    totalCharacteristics: number
    parsedCharacteristics: number
    groupedCharacteristics: number
    attributesFound: number
}

export function createParseStats(): ParseStats {
    return {
        totalCharacteristics: 0,
        parsedCharacteristics: 0,
        groupedCharacteristics: 0,
        attributesFound: 0
    }
}

export function mergeParseStats(target: ParseStats, source: Readonly<ParseStats>): ParseStats {
    target.totalCharacteristics += source.totalCharacteristics
    target.parsedCharacteristics += source.parsedCharacteristics
    target.groupedCharacteristics += source.groupedCharacteristics
    target.attributesFound += source.attributesFound
    return target
}
