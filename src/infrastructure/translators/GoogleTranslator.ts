import * as cheerio from 'cheerio';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { keepOuterWhitespace, validatePayload } from '../../domain/services/PayloadValidator';
import { VendorHttpClient } from '../http/VendorHttpClient';
import { BaseTranslatorOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface GoogleTranslatorOptions extends BaseTranslatorOptions {
    /** Mobile web endpoint; override for mirrors. */
    baseUrl?: string;
}

/**
 * Google Translate via the keyless mobile web page (translate.google.com/m).
 * The translation is scraped from the returned HTML.
 */
export class GoogleTranslator implements ITranslator {
    readonly name: TranslatorName = 'google';
    readonly maxChars = 5000;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly baseUrl: string;
    private readonly support: TranslatorSupport;

    constructor(options: GoogleTranslatorOptions = {}) {
        this.selection = new LanguageSelection(this.name, options.source ?? 'auto', options.target ?? 'english', {
            supportsAutoDetection: true,
        });
        this.baseUrl = options.baseUrl ?? 'https://translate.google.com/m';
        this.http = new VendorHttpClient('Google', options);
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
        if (!validatePayload(text, this.maxChars, 'Google')) {
            return text;
        }

        const html = await this.http.request<string>({
            method: 'GET',
            url: this.baseUrl,
            params: { tl: this.target, sl: this.source, q: text.trim() },
            responseType: 'text',
        });

        return keepOuterWhitespace(text, this.parseTranslation(html));
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

    private parseTranslation(html: string): string {
        const $ = cheerio.load(html);
        let element = $('div.result-container').first();
        if (element.length === 0) {
            element = $('div.t0').first();
        }
        if (element.length === 0) {
            throw new ResponseParsingError('Google', 'no result container in page', html);
        }

        const translated = element.text().trim();
        if (!translated) {
            throw new ResponseParsingError('Google', 'result container is empty', html);
        }
        return translated;
    }
}
