import fs from "fs/promises"
import path from "path"
import {fileURLToPath} from "url"
import yaml from "js-yaml"
import {logger} from "../utils/logger.js"
import {type CatalogConfig, CatalogConfigSchema, defaultCatalogConfig} from "./schema.js"

const __dirname = path.dirname(fileURLToPath(import.meta.url))

const configLogger = logger.child("Config")

export function resolveCatalogConfigPath(): string {
    return process.env.CATALOG_CONFIG_PATH || path.resolve(__dirname, "../../config/catalog.yaml")
}

/**
 * Читает YAML-конфигурацию каталога и проверяет ее схемой
 */
export async function loadCatalogConfig(configPath: string): Promise<CatalogConfig> {
    configLogger.info(`Loading catalog config from ${configPath}`)
    try {
        const content = await fs.readFile(configPath, "utf-8")
        const parsed = yaml.load(content)
        const config = CatalogConfigSchema.parse(parsed ?? {})
        configLogger.info(
            `Loaded ${config.groups.rules.length} group rules and ` +
            `${Object.keys(config.attributes.vocabulary).length} vocabulary entries`
        )
        return Object.freeze(config)
    } catch (error) {
        configLogger.error(`Failed to load catalog config from ${configPath}:`, error)
        throw error
    }
}

/**
 * То же, что loadCatalogConfig, но при любой ошибке возвращает встроенный минимум
 */
export async function loadCatalogConfigOrDefault(configPath: string = resolveCatalogConfigPath()): Promise<CatalogConfig> {
    try {
        return await loadCatalogConfig(configPath)
    } catch {
        configLogger.warn("Falling back to built-in config: empty vocabulary, single default group")
        return Object.freeze(defaultCatalogConfig())
    }
}
