import {z} from "zod"

export const DEFAULT_GROUP = "Другие характеристики"
export const DEFAULT_DIMENSIONS_SLUG = "pa_dimensions"
export const DEFAULT_EXCERPT_LENGTH = 200

const TokenMapSchema = z.record(z.string(), z.string())

export const GroupRuleSchema = z.object({
    group: z.string().min(1),
    keywords: z.array(z.string()).min(1)
})

const GroupsSchema = z.object({
    sectionTitle: z.string().default("Технические характеристики"),
    default: z.string().min(1).default(DEFAULT_GROUP),
    rules: z.array(GroupRuleSchema).default([])
})

export const DimensionAxesSchema = z.object({
    width: z.array(z.string()).default(["ширин"]),
    height: z.array(z.string()).default(["высот"]),
    length: z.array(z.string()).default(["глубин", "длин"])
})

const AttributesSchema = z.object({
    // Порядок ключей задает приоритет нечеткого сопоставления
    vocabulary: z.record(z.string(), z.string()).default({}),
    dimensionsSlug: z.string().default(DEFAULT_DIMENSIONS_SLUG),
    dimensions: DimensionAxesSchema.default({}),
    visibility: z.string().default("1:0|0")
})

const BooleansSchema = z.object({
    display: TokenMapSchema.default({yes: "Да", true: "Да", no: "Нет", false: "Нет"}),
    attribute: TokenMapSchema.default({"да": "yes", yes: "yes", true: "yes", "нет": "no", no: "no", false: "no"})
})

const DocumentsSchema = z.object({
    sectionTitle: z.string().default("Документация"),
    iconsPath: z.string().default(""),
    defaultIcon: z.string().default(""),
    icons: TokenMapSchema.default({}),
    fileTypes: TokenMapSchema.default({}),
    headings: TokenMapSchema.default({}),
    nameWords: TokenMapSchema.default({}),
    defaultNameWord: z.string().default("Документ"),
    maxProductNameLength: z.number().int().positive().default(60)
})

const AdditionalInfoSchema = z.object({
    codeLabel: z.string().default("Код товара"),
    barcodesLabel: z.string().default("Штрих-коды"),
    exclusiveLabel: z.string().default("Эксклюзивный товар"),
    affirmative: z.string().default("да")
})

const ExcerptSchema = z.object({
    maxLength: z.number().int().positive().default(DEFAULT_EXCERPT_LENGTH)
})

export const CatalogConfigSchema = z.object({
    groups: GroupsSchema.default({}),
    attributes: AttributesSchema.default({}),
    extractFields: z.record(z.string(), z.array(z.string())).default({}),
    booleans: BooleansSchema.default({}),
    documents: DocumentsSchema.default({}),
    additionalInfo: AdditionalInfoSchema.default({}),
    excerpt: ExcerptSchema.default({})
})

export type GroupRule = z.infer<typeof GroupRuleSchema>
export type DimensionAxes = z.infer<typeof DimensionAxesSchema>
export type CatalogConfig = z.infer<typeof CatalogConfigSchema>
export type BooleansConfig = CatalogConfig["booleans"]
export type DocumentsConfig = CatalogConfig["documents"]

/**
 * Минимальная встроенная конфигурация: пустой словарь атрибутов и одна группа по умолчанию
 */
export function defaultCatalogConfig(): CatalogConfig {
    return CatalogConfigSchema.parse({})
}
