import {z} from "zod"

export const AdditionalInfoSchema = z.object({
    code: z.string().default(""),
    barcodes: z.string().default(""),
    exclusive: z.string().default("")
})

export const ProductRecordSchema = z.object({
    name: z.string().default(""),
    sku: z.string().default(""),
    characteristicsRaw: z.string().default(""),
    descriptionRaw: z.string().default(""),
    // Тип документа -> ссылки через запятую; порядок ключей задает порядок вывода
    documents: z.record(z.string(), z.string()).default({}),
    additionalInfo: AdditionalInfoSchema.default({})
})

export type AdditionalInfo = z.infer<typeof AdditionalInfoSchema>
export type ProductRecord = z.infer<typeof ProductRecordSchema>

export function createProductRecord(fields: z.input<typeof ProductRecordSchema>): ProductRecord {
    return ProductRecordSchema.parse(fields)
}
