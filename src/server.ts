import {McpServer} from "@modelcontextprotocol/sdk/server/mcp.js"
import {StdioServerTransport} from "@modelcontextprotocol/sdk/server/stdio.js"
import type {Transport} from "@modelcontextprotocol/sdk/shared/transport.js"
import fs from "fs"
import path from "path"
import {fileURLToPath} from "url"
import {z} from "zod"
import {DescriptionAssembler} from "./description/assembler.js"
import {ProductRecordSchema} from "./description/product.js"
import {loadCatalogConfigOrDefault} from "./config/loader.js"
import type {CatalogConfig} from "./config/schema.js"
import {isEntryPoint} from "./utils/entry.js"
import {logger} from "./utils/logger.js"

const __dirname = path.dirname(fileURLToPath(import.meta.url))

const PackageInfoSchema = z.object({
    name: z.string().default("catalog-describer"),
    version: z.string().default("0.0.0")
})

function readPackageInfo() {
    try {
        return PackageInfoSchema.parse(JSON.parse(fs.readFileSync(path.resolve(__dirname, "../package.json"), "utf-8")))
    } catch {
        return PackageInfoSchema.parse({})
    }
}

function textResult(text: string) {
    return {
        content: [{type: "text" as const, text}]
    }
}

export class CatalogDescriberMcpServer {
    private server: McpServer
    private logger = logger.child("Server")

    constructor(private readonly config?: CatalogConfig) {
        const pkg = readPackageInfo()
        this.server = new McpServer({
            name: pkg.name,
            version: pkg.version
        })
    }

    public async start() {
        try {
            const config = this.config ?? await loadCatalogConfigOrDefault()
            await this.connect(config, new StdioServerTransport())
            this.logger.info("Catalog describer MCP running on stdio")
        } catch (error) {
            this.logger.error("Failed to start server:", error)
            process.exit(1)
        }
    }

    public async connect(config: CatalogConfig, transport: Transport) {
        this.registerTools(new DescriptionAssembler(config))
        await this.server.connect(transport)
    }

    private registerTools(assembler: DescriptionAssembler) {
        this.logger.debug(`Attribute vocabulary: ${assembler.characteristics.matcher.size} entries`)
        this.server.registerTool("build_description", {
            description: "Build the HTML description, excerpt, attribute payload and extracted fields of one product. " +
                "Characteristics are a 'Key: Value; Key: Value' string, documents map a document type to comma-separated URLs.",
            inputSchema: ProductRecordSchema.shape
        }, async (product) => {
            this.logger.info(`Building description for ${product.sku || product.name || "unnamed product"}`)
            const result = assembler.build(product)
            return textResult(JSON.stringify(result, null, 2))
        })

        this.server.registerTool("parse_characteristics", {
            description: "Split a characteristics string into grouped key/value pairs and the attribute payload",
            inputSchema: {
                characteristics: z.string().describe("Characteristics string, e.g. 'Цвет корпуса: Белый; Мощность: 2 кВт'")
            }
        }, async ({characteristics}) => {
            const parser = assembler.characteristics
            const parsed = parser.parse(characteristics)
            const groups = Object.fromEntries(parser.group(parsed))
            const payload = parser.extractAttributes(parsed)
            this.logger.debug(`Parsed ${parsed.length} characteristics into ${Object.keys(groups).length} groups`)

            return textResult(JSON.stringify({groups, ...payload, extractedFields: parser.extractFields(parsed)}, null, 2))
        })

        this.server.registerTool("suggest_attributes", {
            description: "List characteristics that are not mapped to the attribute vocabulary, with the closest vocabulary keys",
            inputSchema: {
                characteristics: z.string().describe("Characteristics string"),
                limit: z.number().int().positive().max(10).optional().describe("Suggestions per characteristic (default 3)")
            }
        }, async ({characteristics, limit}) => {
            const parser = assembler.characteristics
            const unmatched = parser.unmatched(parser.parse(characteristics), limit ?? 3)
            if (unmatched.length === 0) {
                return textResult("All characteristics are mapped to the attribute vocabulary.")
            }
            return textResult(JSON.stringify(unmatched, null, 2))
        })
    }
}

if (isEntryPoint(import.meta.url)) {
    const app = new CatalogDescriberMcpServer()
    await app.start()
}
