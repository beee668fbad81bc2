/**
 * Language Registry
 *
 * Bundled name -> code tables, one per backend. Tables are parsed once per
 * process, frozen, and shared read-only by every translator instance.
 */

import baiduLanguages from '../../../assets/languages/baidu.json';
import deeplLanguages from '../../../assets/languages/deepl.json';
import googleLanguages from '../../../assets/languages/google.json';
import libreLanguages from '../../../assets/languages/libre.json';
import lingueeLanguages from '../../../assets/languages/linguee.json';
import microsoftLanguages from '../../../assets/languages/microsoft.json';
import myMemoryLanguages from '../../../assets/languages/mymemory.json';
import papagoLanguages from '../../../assets/languages/papago.json';
import ponsLanguages from '../../../assets/languages/pons.json';
import qcriLanguages from '../../../assets/languages/qcri.json';
import tencentLanguages from '../../../assets/languages/tencent.json';
import yandexLanguages from '../../../assets/languages/yandex.json';
import { AUTO_LANGUAGE, LanguageTable, TranslatorName } from '../entities/Language';
import { ConfigurationError, LanguageNotSupportedError } from '../errors/TranslationErrors';

const RAW_TABLES: Record<TranslatorName, Record<string, string>> = {
    google: googleLanguages,
    mymemory: myMemoryLanguages,
    deepl: deeplLanguages,
    microsoft: microsoftLanguages,
    yandex: yandexLanguages,
    linguee: lingueeLanguages,
    pons: ponsLanguages,
    papago: papagoLanguages,
    libre: libreLanguages,
    tencent: tencentLanguages,
    baidu: baiduLanguages,
    qcri: qcriLanguages,
    // Chat models understand any language name; they reuse the Google table.
    chatgpt: googleLanguages,
    'openai-compatible': googleLanguages,
};

const loadedTables = new Map<TranslatorName, LanguageTable>();

function buildTable(backend: TranslatorName, raw: Record<string, string>): LanguageTable {
    const table: Record<string, string> = {};
    const seenCodes = new Map<string, string>();

    for (const [name, code] of Object.entries(raw)) {
        const key = name.toLowerCase();
        if (key === AUTO_LANGUAGE || code === AUTO_LANGUAGE) {
            throw new ConfigurationError(`Language table for ${backend} must not contain the reserved "${AUTO_LANGUAGE}" entry`);
        }
        const previous = seenCodes.get(code);
        if (previous !== undefined) {
            throw new ConfigurationError(
                `Language table for ${backend} maps both "${previous}" and "${key}" to code "${code}"`
            );
        }
        seenCodes.set(code, key);
        table[key] = code;
    }

    return Object.freeze(table);
}

/**
 * Returns the frozen language table for a backend, loading it on first use.
 */
export function getLanguageTable(backend: TranslatorName): LanguageTable {
    let table = loadedTables.get(backend);
    if (!table) {
        table = buildTable(backend, RAW_TABLES[backend]);
        loadedTables.set(backend, table);
    }
    return table;
}

/**
 * Resolves an exact code or a case-insensitive display name to the backend code.
 * "auto" resolves to itself without touching the table.
 */
export function resolveLanguage(nameOrCode: string, table: LanguageTable, backend: string): string {
    const value = nameOrCode.trim();
    if (value.toLowerCase() === AUTO_LANGUAGE) {
        return AUTO_LANGUAGE;
    }

    if (Object.values(table).includes(value)) {
        return value;
    }

    const byName = table[value.toLowerCase()];
    if (byName !== undefined) {
        return byName;
    }

    throw new LanguageNotSupportedError(nameOrCode, backend);
}

/**
 * Looks up the display name of a resolved code, if the table has one.
 */
export function languageNameForCode(code: string, table: LanguageTable): string | undefined {
    return Object.keys(table).find(name => table[name] === code);
}

export function supportedLanguages(table: LanguageTable): string[];
export function supportedLanguages(table: LanguageTable, asDict: true): Record<string, string>;
export function supportedLanguages(table: LanguageTable, asDict?: false): string[];
export function supportedLanguages(table: LanguageTable, asDict: boolean): string[] | Record<string, string>;
export function supportedLanguages(table: LanguageTable, asDict: boolean = false): string[] | Record<string, string> {
    return asDict ? { ...table } : Object.keys(table);
}
