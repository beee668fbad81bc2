import { ENV_VARS, resolveCredential } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError, VendorApiError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { asText, isRecord, readArray, readString } from '../http/ResponseShape';
import { VendorHttpClient } from '../http/VendorHttpClient';
import { BaseTranslatorOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface YandexTranslatorOptions extends BaseTranslatorOptions {
    /** Falls back to YANDEX_API_KEY. */
    apiKey?: string;
}

const YANDEX_BASE_URL = 'https://translate.yandex.net/api/v1.5/tr.json';

/**
 * Yandex Translate API v1.5.
 */
export class YandexTranslator implements ITranslator {
    readonly name: TranslatorName = 'yandex';
    readonly maxChars = 10000;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly apiKey: string;
    private readonly support: TranslatorSupport;

    constructor(options: YandexTranslatorOptions = {}) {
        this.apiKey = resolveCredential(options.apiKey, ENV_VARS.YANDEX_API_KEY, 'Yandex API key');
        this.selection = new LanguageSelection(this.name, options.source ?? 'auto', options.target ?? 'english', {
            supportsAutoDetection: true,
        });
        this.http = new VendorHttpClient('Yandex', options);
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
        if (!validatePayload(text, this.maxChars, 'Yandex')) {
            return text;
        }

        const form = new URLSearchParams({
            text,
            format: 'plain',
            lang: this.selection.isAutoSource ? this.target : `${this.source}-${this.target}`,
            key: this.apiKey,
        });
        const body = await this.post('translate', form);

        const translated = asText(readArray(body, 'text')?.[0]);
        if (translated === undefined) {
            throw new ResponseParsingError('Yandex', 'no text[0] in response', body);
        }
        return translated;
    }

    /**
     * Asks Yandex which language the text is written in.
     */
    async detect(text: string): Promise<string> {
        validatePayload(text, this.maxChars, 'Yandex');
        const form = new URLSearchParams({ text, format: 'plain', key: this.apiKey });
        const body = await this.post('detect', form);

        const language = readString(body, 'lang');
        if (!language) {
            throw new ResponseParsingError('Yandex', 'no lang in detection response', body);
        }
        return language;
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

    private async post(endpoint: 'translate' | 'detect', form: URLSearchParams): Promise<unknown> {
        const body = await this.http.request<unknown>({
            method: 'POST',
            url: `${YANDEX_BASE_URL}/${endpoint}`,
            data: form.toString(),
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        });

        const code = isRecord(body) ? body.code : undefined;
        if (typeof code === 'number' && code !== 200) {
            throw new VendorApiError('Yandex', readString(body, 'message') ?? `code ${code}`, body);
        }
        return body;
    }
}
