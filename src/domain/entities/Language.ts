/**
 * Language entities shared by the registry and every translator backend.
 */

/** Sentinel source language: let the vendor detect it. */
export const AUTO_LANGUAGE = 'auto';

export const TRANSLATOR_NAMES = [
    'google',
    'mymemory',
    'deepl',
    'microsoft',
    'yandex',
    'linguee',
    'pons',
    'papago',
    'libre',
    'tencent',
    'baidu',
    'qcri',
    'chatgpt',
    'openai-compatible',
] as const;

export type TranslatorName = typeof TRANSLATOR_NAMES[number];

/**
 * Lowercase display name to backend-specific code.
 */
export type LanguageTable = Readonly<Record<string, string>>;

export function isTranslatorName(value: string): value is TranslatorName {
    return TRANSLATOR_NAMES.some(name => name === value);
}
