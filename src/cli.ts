#!/usr/bin/env node
import path from "path"
import {DescriptionAssembler} from "./description/assembler.js"
import {readProducts} from "./description/input.js"
import type {ProductRecord} from "./description/product.js"
import {loadCatalogConfigOrDefault} from "./config/loader.js"
import type {UnmatchedCharacteristic} from "./characteristics/parser.js"
import {describeError, logger} from "./utils/logger.js"

const cliLogger = logger.child("CLI")

type SuggestionReport = {
    sku: string
    unmatched: UnmatchedCharacteristic[]
}

async function main() {
    const args = process.argv.slice(2)
    const suggest = args.includes("--suggest")
    const files = args.filter(arg => !arg.startsWith("--"))

    if (files.length !== 1) {
        console.error("Please provide a product file.")
        console.error("Example: catalog-describer products.json --suggest")
        process.exit(1)
    }

    const inputPath = path.resolve(files[0])
    const config = await loadCatalogConfigOrDefault()
    const assembler = new DescriptionAssembler(config)

    let products: ProductRecord[]
    try {
        products = await readProducts(inputPath)
    } catch (error) {
        console.error(`Failed to read products from ${inputPath}: ${describeError(error)}`)
        process.exit(1)
    }

    cliLogger.info(`Building descriptions for ${products.length} products from ${inputPath}`)
    const report = assembler.processBatch(products)

    const output: { report: typeof report, suggestions?: SuggestionReport[] } = {report}
    if (suggest) {
        output.suggestions = products.map(product => ({
            sku: product.sku,
            unmatched: assembler.characteristics.unmatched(
                assembler.characteristics.parse(product.characteristicsRaw)
            )
        }))
    }

    console.log(JSON.stringify(output, null, 2))
}

main().catch(err => {
    console.error(err)
    process.exit(1)
})
