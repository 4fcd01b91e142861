import {afterEach, beforeAll, beforeEach, describe, expect, it, vi} from 'vitest';
import path from 'path';
import {fileURLToPath} from 'url';
import {DescriptionAssembler} from '../src/description/assembler.js';
import {loadCatalogConfig} from '../src/config/loader.js';
import type {CatalogConfig} from '../src/config/schema.js';
import {readProducts} from '../src/description/input.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const CONFIG_PATH = path.resolve(__dirname, '../config/catalog.yaml');
const fixture = (name: string) => path.resolve(__dirname, 'fixtures', name);

const ICONS = '/wp-content/uploads/2026/02/';
const PRODUCT_NAME = 'Обогреватель ИК-2000-Белый';

function documentItem(url: string, icon: string, alt: string, text: string): string {
    return `<li><img src="${ICONS}${icon}" width="32" height="32" alt="${alt}" style="vertical-align: middle; margin-right: 8px;" />` +
        `<a href="${url}" target="_blank" rel="noopener noreferrer">${text}</a></li>`;
}

const EXPECTED_CONTENT = [
    '<p>Потолочный обогреватель.\n\nПодходит для дома.</p>',
    [
        '<h3>Технические характеристики</h3>',
        '<h4>Габариты и вес</h4>',
        '<ul>',
        '<li><strong>Ширина:</strong> 94 см</li>',
        '<li><strong>Высота:</strong> 22 см</li>',
        '<li><strong>Глубина:</strong> 12 см</li>',
        '</ul>',
        '<h4>Технические характеристики</h4>',
        '<ul>',
        '<li><strong>Мощность:</strong> 2000 Вт</li>',
        '</ul>',
        '<h4>Управление</h4>',
        '<ul>',
        '<li><strong>Термостат:</strong> Да</li>',
        '</ul>',
        '<h4>Безопасность</h4>',
        '<ul>',
        '<li><strong>Влагозащита:</strong> IPX4</li>',
        '</ul>',
        '<h4>Внешний вид</h4>',
        '<ul>',
        '<li><strong>Цвет корпуса:</strong> Белый</li>',
        '</ul>',
        '<h4>Общие сведения</h4>',
        '<ul>',
        '<li><strong>Страна производства:</strong> РОССИЯ</li>',
        '</ul>'
    ].join('\n'),
    [
        '<h3>Документация</h3>',
        '<h4>Инструкции по эксплуатации</h4>',
        '<ul>',
        documentItem('https://cdn.test/files/manual.pdf', 'pdf-icon.png', 'PDF', `Инструкция ${PRODUCT_NAME} (PDF)`),
        documentItem('https://cdn.test/files/guide.docx', 'word-icon.png', 'DOCX', `Инструкция ${PRODUCT_NAME} (DOCX)`),
        '</ul>',
        '<h4>Сертификаты</h4>',
        '<ul>',
        documentItem('https://cdn.test/files/cert.zip', 'archive-icon.png', 'ZIP', `Сертификат ${PRODUCT_NAME} (Архив ZIP)`),
        '</ul>'
    ].join('\n'),
    [
        '<p><strong>Код товара:</strong> HT-2000</p>',
        '<p><strong>Штрих-коды:</strong> 4601234567890</p>'
    ].join('\n')
].join('\n\n');

describe('Description pipeline with the bundled catalog config', () => {
    let config: CatalogConfig;

    beforeAll(async () => {
        vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
        config = await loadCatalogConfig(CONFIG_PATH);
        vi.restoreAllMocks();
    });

    beforeEach(() => {
        vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should load the bundled config', () => {
        expect(config.groups.rules).toHaveLength(9);
        expect(config.groups.default).toBe('Другие характеристики');
        expect(config.attributes.vocabulary['Габариты']).toBe('pa_dimensions');
        expect(config.excerpt.maxLength).toBe(200);
    });

    it('should read products from a yaml file', async () => {
        const products = await readProducts(fixture('products.yaml'));
        expect(products.map(product => product.sku)).toEqual(['HT-2000', 'KV-1']);
        expect(products[1]?.characteristicsRaw).toBe('');
    });

    it('should read a single product from a json file', async () => {
        const products = await readProducts(fixture('single-product.json'));
        expect(products).toHaveLength(1);
        expect(products[0]?.characteristicsRaw).toBe('Мощность: 1 кВт');
        expect(products[0]?.documents).toEqual({});
    });

    it('should build the full description of a product', async () => {
        const [heater] = await readProducts(fixture('products.yaml'));
        if (!heater) throw new Error('fixture is empty');

        const result = new DescriptionAssembler(config).build(heater);

        expect(result.content).toBe(EXPECTED_CONTENT);
        expect(result.excerpt).toBe(
            'Потолочный обогреватель. Подходит для дома. Технические характеристики Габариты и вес ' +
            'Ширина: 94 см Высота: 22 см Глубина: 12 см Технические характеристики Мощность: 2000 Вт Управление Термостат: Да...'
        );
        expect(result.attributes).toEqual({
            pa_power: '2000 Вт',
            pa_color: 'Белый',
            pa_country: 'РОССИЯ',
            pa_dimensions: '94 см x 22 см x 12 см'
        });
        expect(result.attributesData).toEqual({
            pa_power_data: '1:0|0',
            pa_color_data: '1:0|0',
            pa_country_data: '1:0|0',
            pa_dimensions_data: '1:0|0'
        });
        expect(result.extractedFields).toEqual({width: '94 см', height: '22 см', length: '12 см'});
        expect(result.diagnostics).toEqual([]);
    });

    it('should process a batch and collect parse stats', async () => {
        const products = await readProducts(fixture('products.yaml'));
        const {results, stats} = new DescriptionAssembler(config).processBatch(products);

        expect(results).toHaveLength(2);
        expect(results[1]?.content).toBe('');
        expect(stats.descriptionsBuilt).toBe(2);
        expect(stats.totalLength).toBe(EXPECTED_CONTENT.length);
        expect(stats.errors).toEqual([]);
        expect(stats.parse).toEqual({
            totalCharacteristics: 8,
            parsedCharacteristics: 8,
            groupedCharacteristics: 8,
            attributesFound: 3
        });
    });
});
