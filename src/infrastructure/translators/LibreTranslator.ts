import { ENV_VARS, readEnvVar } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError, VendorApiError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { readString, readText } from '../http/ResponseShape';
import { VendorHttpClient } from '../http/VendorHttpClient';
import { BaseTranslatorOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface LibreTranslatorOptions extends BaseTranslatorOptions {
    /** Required by libretranslate.com, optional on self-hosted servers. Falls back to LIBRE_API_KEY. */
    apiKey?: string;
    /** Server root, e.g. http://localhost:5000. */
    baseUrl?: string;
}

export const DEFAULT_LIBRE_BASE_URL = 'https://libretranslate.com';

/**
 * LibreTranslate, hosted or self-hosted.
 */
export class LibreTranslator implements ITranslator {
    readonly name: TranslatorName = 'libre';
    readonly maxChars = 5000;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly apiKey?: string;
    private readonly baseUrl: string;
    private readonly support: TranslatorSupport;

    constructor(options: LibreTranslatorOptions = {}) {
        this.apiKey = options.apiKey ?? readEnvVar(ENV_VARS.LIBRE_API_KEY);
        this.baseUrl = (options.baseUrl ?? DEFAULT_LIBRE_BASE_URL).replace(/\/+$/, '');
        this.selection = new LanguageSelection(this.name, options.source ?? 'auto', options.target ?? 'english', {
            supportsAutoDetection: true,
        });
        this.http = new VendorHttpClient('Libre', options);
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
        if (!validatePayload(text, this.maxChars, 'Libre')) {
            return text;
        }

        const payload: Record<string, string> = {
            q: text,
            source: this.source,
            target: this.target,
            format: 'text',
        };
        if (this.apiKey) {
            payload.api_key = this.apiKey;
        }

        const body = await this.http.request<unknown>({
            method: 'POST',
            url: `${this.baseUrl}/translate`,
            data: payload,
            headers: { 'Content-Type': 'application/json' },
        });

        const error = readString(body, 'error');
        if (error) {
            throw new VendorApiError('Libre', error, body);
        }

        const translated = readText(body, 'translatedText');
        if (translated === undefined) {
            throw new ResponseParsingError('Libre', 'no translatedText in response', body);
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
