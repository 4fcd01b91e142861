export {tokenize, joinPairs, splitOutsideBrackets} from "./characteristics/tokenizer.js"
export {GroupClassifier} from "./characteristics/classifier.js"
export {AttributeMatcher, type AttributeMatch, type AttributeSuggestion} from "./characteristics/matcher.js"
export {mergeDimensions} from "./characteristics/dimensions.js"
export {ValueNormalizer} from "./characteristics/values.js"
export {CharacteristicsParser, type AttributePayload, type UnmatchedCharacteristic} from "./characteristics/parser.js"
export {
    createParseStats,
    mergeParseStats,
    type Characteristic,
    type CharacteristicPair,
    type GroupingResult,
    type ParseStats
} from "./characteristics/types.js"
export {cleanArticleHtml, extractExcerpt} from "./description/article.js"
export {DocumentLinkParser, sanitizeProductName, type DocumentEntry} from "./description/documents.js"
export {
    DescriptionAssembler,
    type BatchReport,
    type BatchStats,
    type DescriptionResult,
    type SectionDiagnostic,
    type SectionName,
    type SectionResult
} from "./description/assembler.js"
export {createProductRecord, ProductRecordSchema, type AdditionalInfo, type ProductRecord} from "./description/product.js"
export {readProducts} from "./description/input.js"
export {CatalogConfigSchema, defaultCatalogConfig, type CatalogConfig, type GroupRule} from "./config/schema.js"
export {loadCatalogConfig, loadCatalogConfigOrDefault, resolveCatalogConfigPath} from "./config/loader.js"
export {normalizeKey} from "./utils/text.js"
export {Logger, LogLevel, logger} from "./utils/logger.js"
