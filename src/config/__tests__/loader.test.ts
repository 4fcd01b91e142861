import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import {loadCatalogConfig, loadCatalogConfigOrDefault, resolveCatalogConfigPath} from '../loader.js';
import {defaultCatalogConfig} from '../schema.js';

vi.mock('../../utils/logger.js', () => ({
    logger: {
        child: () => ({
            info: vi.fn(),
            debug: vi.fn(),
            warn: vi.fn(),
            error: vi.fn()
        })
    }
}));

describe('Catalog config loader', () => {
    afterEach(() => {
        vi.restoreAllMocks();
        vi.unstubAllEnvs();
    });

    describe('loadCatalogConfig', () => {
        it('should load and validate yaml', async () => {
            const yamlContent = `
groups:
  default: Прочее
  rules:
    - group: Внешний вид
      keywords: [цвет]
attributes:
  vocabulary:
    Цвет корпуса: pa_color
excerpt:
  maxLength: 120
            `;
            vi.spyOn(fs, 'readFile').mockResolvedValue(yamlContent);

            const config = await loadCatalogConfig('dummy/catalog.yaml');

            expect(config.groups.default).toBe('Прочее');
            expect(config.groups.rules).toEqual([{group: 'Внешний вид', keywords: ['цвет']}]);
            expect(config.attributes.vocabulary).toEqual({'Цвет корпуса': 'pa_color'});
            expect(config.attributes.visibility).toBe('1:0|0');
            expect(config.excerpt.maxLength).toBe(120);
            expect(config.documents.sectionTitle).toBe('Документация');
        });

        it('should return a frozen config', async () => {
            vi.spyOn(fs, 'readFile').mockResolvedValue('groups: {}');
            const config = await loadCatalogConfig('dummy/catalog.yaml');
            expect(Object.isFrozen(config)).toBe(true);
        });

        it('should apply defaults to an empty file', async () => {
            vi.spyOn(fs, 'readFile').mockResolvedValue('');
            expect(await loadCatalogConfig('dummy/catalog.yaml')).toEqual(defaultCatalogConfig());
        });

        it('should reject a rule without keywords', async () => {
            vi.spyOn(fs, 'readFile').mockResolvedValue('groups:\n  rules:\n    - group: Пусто\n      keywords: []\n');
            await expect(loadCatalogConfig('dummy/catalog.yaml')).rejects.toThrow();
        });

        it('should propagate read errors', async () => {
            vi.spyOn(fs, 'readFile').mockRejectedValue(new Error('ENOENT'));
            await expect(loadCatalogConfig('missing.yaml')).rejects.toThrow('ENOENT');
        });
    });

    describe('loadCatalogConfigOrDefault', () => {
        beforeEach(() => {
            vi.spyOn(fs, 'readFile').mockRejectedValue(new Error('ENOENT'));
        });

        it('should fall back to the built-in config', async () => {
            const config = await loadCatalogConfigOrDefault('missing.yaml');
            expect(config).toEqual(defaultCatalogConfig());
            expect(config.attributes.vocabulary).toEqual({});
            expect(config.groups.default).toBe('Другие характеристики');
            expect(Object.isFrozen(config)).toBe(true);
        });
    });

    describe('resolveCatalogConfigPath', () => {
        it('should prefer CATALOG_CONFIG_PATH', () => {
            vi.stubEnv('CATALOG_CONFIG_PATH', '/etc/catalog/custom.yaml');
            expect(resolveCatalogConfigPath()).toBe('/etc/catalog/custom.yaml');
        });

        it('should default to config/catalog.yaml in the project', () => {
            vi.stubEnv('CATALOG_CONFIG_PATH', '');
            const resolved = resolveCatalogConfigPath();
            expect(path.basename(resolved)).toBe('catalog.yaml');
            expect(path.basename(path.dirname(resolved))).toBe('config');
        });
    });
});
