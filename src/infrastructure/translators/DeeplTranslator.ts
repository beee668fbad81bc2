/**
 * DeepL Translator
 *
 * Uses the DeepL REST API. Free keys (suffix ":fx") must use the api-free host.
 */

import { ENV_VARS, resolveCredential } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { readArray, readText } from '../http/ResponseShape';
import { VendorHttpClient } from '../http/VendorHttpClient';
import { BaseTranslatorOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface DeeplTranslatorOptions extends BaseTranslatorOptions {
    /** Falls back to DEEPL_API_KEY. */
    apiKey?: string;
    /** Use api-free.deepl.com (default: true). */
    useFreeApi?: boolean;
}

export class DeeplTranslator implements ITranslator {
    readonly name: TranslatorName = 'deepl';
    readonly maxChars = 5000;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly support: TranslatorSupport;

    constructor(options: DeeplTranslatorOptions = {}) {
        this.apiKey = resolveCredential(options.apiKey, ENV_VARS.DEEPL_API_KEY, 'DeepL API key');
        this.selection = new LanguageSelection(this.name, options.source ?? 'auto', options.target ?? 'english', {
            supportsAutoDetection: true,
        });
        // DeepL has different endpoints for free vs pro
        this.baseUrl = (options.useFreeApi ?? true)
            ? 'https://api-free.deepl.com/v2'
            : 'https://api.deepl.com/v2';
        this.http = new VendorHttpClient('DeepL', options);
        this.support = new TranslatorSupport(this.selection, this.maxChars, options.documentReader);
    }

    get source(): string {
        return this.selection.source;
    }

    set source(value: string) {
        this.selection.source = value;
    }

    get target(): string {
        return this.selection.target;
    }

    set target(value: string) {
        this.selection.target = value;
    }

    async translate(text: string): Promise<string> {
        if (!validatePayload(text, this.maxChars, 'DeepL')) {
            return text;
        }

        const params = new URLSearchParams();
        params.append('text', text);
        params.append('target_lang', this.target.toUpperCase());
        if (!this.selection.isAutoSource) {
            params.append('source_lang', this.source.toUpperCase());
        }

        const body = await this.http.request<unknown>({
            method: 'POST',
            url: `${this.baseUrl}/translate`,
            data: params.toString(),
            headers: {
                Authorization: `DeepL-Auth-Key ${this.apiKey}`,
                'Content-Type': 'application/x-www-form-urlencoded',
            },
        });

        const translated = readText(readArray(body, 'translations')?.[0], 'text');
        if (translated === undefined) {
            throw new ResponseParsingError('DeepL', 'no translations[0].text in response', body);
        }
        return translated;
    }

    async translateBatch(texts: string[]): Promise<string[]> {
        return this.support.batch(texts, text => this.translate(text));
    }

    async translateFile(path: string): Promise<string> {
        return this.support.file(path, text => this.translate(text));
    }

    getSupportedLanguages(): string[];
    getSupportedLanguages(asDict: true): Record<string, string>;
    getSupportedLanguages(asDict: boolean = false): string[] | Record<string, string> {
        return this.support.languages(asDict);
    }
}
