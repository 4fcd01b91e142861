import fs from "fs/promises"
import yaml from "js-yaml"
import {z} from "zod"
import {ProductRecordSchema, type ProductRecord} from "./product.js"

const ProductsInputSchema = z.union([
    z.array(ProductRecordSchema),
    z.object({products: z.array(ProductRecordSchema)}).transform(input => input.products),
    ProductRecordSchema.transform(product => [product])
])

/**
 * Читает один товар, массив товаров или {products: [...]} из JSON или YAML
 */
export async function readProducts(filePath: string): Promise<ProductRecord[]> {
    const content = await fs.readFile(filePath, "utf-8")
    return ProductsInputSchema.parse(yaml.load(content))
}
