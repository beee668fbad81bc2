/**
 * Translator Factory
 *
 * Maps a backend name to its adapter. Each backend declares the option keys
 * it understands; anything else is rejected instead of silently ignored.
 */

import { TRANSLATOR_NAMES, TranslatorName, isTranslatorName } from '../domain/entities/Language';
import { ConfigurationError, NotSupportedError } from '../domain/errors/TranslationErrors';
import { ITranslator } from '../domain/ports/ITranslator';
import { BaiduTranslator } from '../infrastructure/translators/BaiduTranslator';
import { ChatGptTranslator } from '../infrastructure/translators/ChatGptTranslator';
import { DeeplTranslator } from '../infrastructure/translators/DeeplTranslator';
import { GoogleTranslator } from '../infrastructure/translators/GoogleTranslator';
import { LibreTranslator } from '../infrastructure/translators/LibreTranslator';
import { LingueeTranslator } from '../infrastructure/translators/LingueeTranslator';
import { MicrosoftTranslation, MicrosoftTranslator } from '../infrastructure/translators/MicrosoftTranslator';
import { MyMemoryTranslator } from '../infrastructure/translators/MyMemoryTranslator';
import { OpenAICompatibleTranslator } from '../infrastructure/translators/OpenAICompatibleTranslator';
import { PapagoTranslator } from '../infrastructure/translators/PapagoTranslator';
import { PonsTranslator } from '../infrastructure/translators/PonsTranslator';
import { QcriTranslator } from '../infrastructure/translators/QcriTranslator';
import { TencentTranslator } from '../infrastructure/translators/TencentTranslator';
import { BASE_OPTION_KEYS, BaseTranslatorOptions } from '../infrastructure/translators/TranslatorOptions';
import { YandexTranslator } from '../infrastructure/translators/YandexTranslator';

export type TranslationOutput = MicrosoftTranslation;

/**
 * Union of every backend's options. Only the keys listed for the chosen
 * backend in ALLOWED_OPTIONS may be set.
 */
export interface FactoryOptions extends Omit<BaseTranslatorOptions, 'target'> {
    /** A list is only accepted by microsoft. */
    target?: string | string[];
    apiKey?: string;
    baseUrl?: string;
    model?: string;
    email?: string;
    useFreeApi?: boolean;
    region?: string;
    clientId?: string;
    secretKey?: string;
    secretId?: string;
    appId?: string;
    appKey?: string;
    domain?: string;
    retryCount?: number;
    retryDelayMs?: number;
    clock?: () => number;
    nonce?: () => number;
    salt?: () => number;
}

type FactoryOptionKey = keyof FactoryOptions;

const ALLOWED_OPTIONS: Record<TranslatorName, readonly FactoryOptionKey[]> = {
    google: [...BASE_OPTION_KEYS, 'baseUrl'],
    mymemory: [...BASE_OPTION_KEYS, 'email'],
    deepl: [...BASE_OPTION_KEYS, 'apiKey', 'useFreeApi'],
    microsoft: [...BASE_OPTION_KEYS, 'apiKey', 'region'],
    yandex: [...BASE_OPTION_KEYS, 'apiKey'],
    linguee: [...BASE_OPTION_KEYS, 'baseUrl'],
    pons: [...BASE_OPTION_KEYS, 'baseUrl'],
    papago: [...BASE_OPTION_KEYS, 'clientId', 'secretKey'],
    libre: [...BASE_OPTION_KEYS, 'apiKey', 'baseUrl'],
    tencent: [...BASE_OPTION_KEYS, 'secretId', 'secretKey', 'region', 'clock', 'nonce'],
    baidu: [...BASE_OPTION_KEYS, 'appId', 'appKey', 'salt'],
    qcri: [...BASE_OPTION_KEYS, 'apiKey', 'domain'],
    chatgpt: [...BASE_OPTION_KEYS, 'apiKey', 'model', 'baseUrl'],
    'openai-compatible': [...BASE_OPTION_KEYS, 'apiKey', 'model', 'baseUrl', 'retryCount', 'retryDelayMs'],
};

type TranslatorBuilder = (options: FactoryOptions) => ITranslator<TranslationOutput>;

const BUILDERS: Record<TranslatorName, TranslatorBuilder> = {
    google: options => new GoogleTranslator({ ...options, target: singleTarget(options, 'google') }),
    mymemory: options => new MyMemoryTranslator({ ...options, target: singleTarget(options, 'mymemory') }),
    deepl: options => new DeeplTranslator({ ...options, target: singleTarget(options, 'deepl') }),
    microsoft: options => new MicrosoftTranslator(options),
    yandex: options => new YandexTranslator({ ...options, target: singleTarget(options, 'yandex') }),
    linguee: options => new LingueeTranslator({
        ...options,
        source: requireOption(options.source, 'source', 'linguee'),
        target: requireOption(singleTarget(options, 'linguee'), 'target', 'linguee'),
    }),
    pons: options => new PonsTranslator({
        ...options,
        source: requireOption(options.source, 'source', 'pons'),
        target: requireOption(singleTarget(options, 'pons'), 'target', 'pons'),
    }),
    papago: options => new PapagoTranslator({
        ...options,
        source: requireOption(options.source, 'source', 'papago'),
        target: requireOption(singleTarget(options, 'papago'), 'target', 'papago'),
    }),
    libre: options => new LibreTranslator({ ...options, target: singleTarget(options, 'libre') }),
    tencent: options => new TencentTranslator({ ...options, target: singleTarget(options, 'tencent') }),
    baidu: options => new BaiduTranslator({ ...options, target: singleTarget(options, 'baidu') }),
    qcri: options => new QcriTranslator({
        ...options,
        source: requireOption(options.source, 'source', 'qcri'),
        target: requireOption(singleTarget(options, 'qcri'), 'target', 'qcri'),
    }),
    chatgpt: options => new ChatGptTranslator({ ...options, target: singleTarget(options, 'chatgpt') }),
    'openai-compatible': options => new OpenAICompatibleTranslator({
        ...options,
        target: singleTarget(options, 'openai-compatible'),
    }),
};

function singleTarget(options: FactoryOptions, backend: TranslatorName): string | undefined {
    if (Array.isArray(options.target)) {
        throw new ConfigurationError(`The ${backend} translator accepts a single target language`);
    }
    return options.target;
}

function requireOption(value: string | undefined, key: string, backend: TranslatorName): string {
    if (value === undefined || value.trim().length === 0) {
        throw new ConfigurationError(`The ${backend} translator requires the "${key}" option`, 'MISSING_OPTION');
    }
    return value;
}

/**
 * Keys set on options that the backend does not recognise.
 */
export function unknownOptionKeys(name: TranslatorName, options: FactoryOptions): string[] {
    const allowed: readonly string[] = ALLOWED_OPTIONS[name];
    return Object.keys(options).filter(key => !allowed.includes(key));
}

export function listTranslators(): TranslatorName[] {
    return [...TRANSLATOR_NAMES];
}

/**
 * Builds the adapter for a backend name.
 *
 * @throws NotSupportedError for an unknown name
 * @throws ConfigurationError for options the backend does not recognise
 */
export function createTranslator(name: string, options: FactoryOptions = {}): ITranslator<TranslationOutput> {
    const backend = name.trim().toLowerCase();
    if (!isTranslatorName(backend)) {
        throw new NotSupportedError(
            `Unknown translator "${name}". Available: ${TRANSLATOR_NAMES.join(', ')}`
        );
    }

    const unknown = unknownOptionKeys(backend, options);
    if (unknown.length > 0) {
        throw new ConfigurationError(
            `Unrecognised option(s) for ${backend}: ${unknown.join(', ')}`,
            'UNKNOWN_OPTION'
        );
    }

    return BUILDERS[backend](options);
}
