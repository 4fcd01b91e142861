import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {Client} from '@modelcontextprotocol/sdk/client/index.js';
import {InMemoryTransport} from '@modelcontextprotocol/sdk/inMemory.js';
import {z} from 'zod';
import {CatalogDescriberMcpServer} from '../server.js';
import {CatalogConfigSchema} from '../config/schema.js';

const config = CatalogConfigSchema.parse({
    groups: {
        rules: [{group: 'Внешний вид', keywords: ['цвет']}]
    },
    attributes: {
        vocabulary: {'Цвет корпуса': 'pa_color', 'Страна производства': 'pa_country'}
    },
    extractFields: {
        weight: ['Вес']
    }
});

const TextResultSchema = z.object({
    content: z.array(z.object({type: z.literal('text'), text: z.string()}))
});

async function callTool(client: Client, name: string, args: Record<string, unknown>): Promise<string> {
    const result = TextResultSchema.parse(await client.callTool({name, arguments: args}));
    return result.content.map(item => item.text).join('');
}

describe('CatalogDescriberMcpServer', () => {
    let client: Client;

    beforeEach(async () => {
        vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        const server = new CatalogDescriberMcpServer(config);
        client = new Client({name: 'test-client', version: '1.0.0'});
        await Promise.all([
            server.connect(config, serverTransport),
            client.connect(clientTransport)
        ]);
    });

    afterEach(async () => {
        await client.close();
        vi.restoreAllMocks();
    });

    it('should register the catalog tools', async () => {
        const {tools} = await client.listTools();
        expect(tools.map(tool => tool.name).sort()).toEqual([
            'build_description',
            'parse_characteristics',
            'suggest_attributes'
        ]);
    });

    it('should build a description', async () => {
        const text = await callTool(client, 'build_description', {
            sku: 'KE-2',
            characteristicsRaw: 'Цвет корпуса: Белый; Вес: 5 кг'
        });
        const result = JSON.parse(text);

        expect(result.content).toBe([
            '<h3>Технические характеристики</h3>',
            '<h4>Внешний вид</h4>',
            '<ul>',
            '<li><strong>Цвет корпуса:</strong> Белый</li>',
            '</ul>',
            '<h4>Другие характеристики</h4>',
            '<ul>',
            '<li><strong>Вес:</strong> 5 кг</li>',
            '</ul>'
        ].join('\n'));
        expect(result.attributes).toEqual({pa_color: 'Белый'});
        expect(result.extractedFields).toEqual({weight: '5 кг'});
        expect(result.diagnostics).toEqual([]);
    });

    it('should parse characteristics into groups', async () => {
        const text = await callTool(client, 'parse_characteristics', {
            characteristics: 'Цвет корпуса: Белый; Гарантия: 2 года'
        });
        const result = JSON.parse(text);

        expect(Object.keys(result.groups)).toEqual(['Внешний вид', 'Другие характеристики']);
        expect(result.groups['Другие характеристики']).toEqual([
            {key: 'Гарантия', value: '2 года', group: 'Другие характеристики', isExternalAttribute: false, attributeSlug: ''}
        ]);
        expect(result.attributesData).toEqual({pa_color_data: '1:0|0'});
    });

    it('should list unmatched characteristics', async () => {
        const text = await callTool(client, 'suggest_attributes', {
            characteristics: 'Цвет корпуса: Белый; Гарантия: 2 года',
            limit: 1
        });
        const unmatched = JSON.parse(text);

        expect(unmatched).toHaveLength(1);
        expect(unmatched[0].key).toBe('Гарантия');
    });

    it('should report when every characteristic is mapped', async () => {
        const text = await callTool(client, 'suggest_attributes', {
            characteristics: 'Цвет корпуса: Белый'
        });
        expect(text).toBe('All characteristics are mapped to the attribute vocabulary.');
    });
});
