import {normalizeKey} from "../utils/text.js"
import type {GroupRule} from "../config/schema.js"

type CompiledRule = {
    group: string
    keywords: string[]
}

/**
 * Относит характеристику к группе отображения по упорядоченным правилам.
 * Побеждает первое правило, любое ключевое слово которого входит в нормализованный ключ.
 */
export class GroupClassifier {
    private readonly rules: ReadonlyArray<CompiledRule>

    constructor(rules: ReadonlyArray<GroupRule>, readonly defaultGroup: string) {
        this.rules = rules.map(rule => ({
            group: rule.group,
            // Пустое ключевое слово совпало бы с любым ключом
            keywords: rule.keywords.map(keyword => normalizeKey(keyword)).filter(keyword => keyword.length > 0)
        }))
    }

    classify(key: string): string {
        const normalized = normalizeKey(key)
        if (!normalized) return this.defaultGroup

        for (const rule of this.rules) {
            if (rule.keywords.some(keyword => normalized.includes(keyword))) {
                return rule.group
            }
        }
        return this.defaultGroup
    }

    /**
     * Порядок вывода групп: как в конфигурации, группа по умолчанию последней
     */
    displayOrder(): string[] {
        const order: string[] = []
        for (const rule of this.rules) {
            if (rule.group !== this.defaultGroup && !order.includes(rule.group)) {
                order.push(rule.group)
            }
        }
        order.push(this.defaultGroup)
        return order
    }
}
