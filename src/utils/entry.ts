import fs from 'fs';
import {fileURLToPath} from 'url';

/**
 * Запущен ли модуль напрямую: node, tsx или ссылка из node_modules/.bin
 */
export function isEntryPoint(moduleUrl: string): boolean {
    const script = process.argv[1];
    if (!script) return false;
    try {
        return fs.realpathSync(script) === fs.realpathSync(fileURLToPath(moduleUrl));
    } catch {
        return false;
    }
}
