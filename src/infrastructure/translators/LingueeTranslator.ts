import * as cheerio from 'cheerio';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { VendorHttpClient } from '../http/VendorHttpClient';
import { BaseTranslatorOptions, LookupOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface LingueeTranslatorOptions extends BaseTranslatorOptions {
    source: string;
    target: string;
    baseUrl?: string;
}

/**
 * Linguee dictionary lookups, scraped from the search result page.
 * Words only: the vendor has no sentence translation and no auto-detect.
 */
export class LingueeTranslator implements ITranslator {
    readonly name: TranslatorName = 'linguee';
    readonly maxChars = 50;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly baseUrl: string;
    private readonly support: TranslatorSupport;

    constructor(options: LingueeTranslatorOptions) {
        this.selection = new LanguageSelection(this.name, options.source, options.target, {
            supportsAutoDetection: false,
        });
        this.baseUrl = (options.baseUrl ?? 'https://www.linguee.com').replace(/\/+$/, '');
        this.http = new VendorHttpClient('Linguee', options);
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

    translate(word: string): Promise<string>;
    translate(word: string, options: { returnAll: true }): Promise<string[]>;
    translate(word: string, options?: LookupOptions): Promise<string | string[]>;
    async translate(word: string, options: LookupOptions = {}): Promise<string | string[]> {
        if (!validatePayload(word, this.maxChars, 'Linguee')) {
            return options.returnAll ? [word] : word;
        }

        const html = await this.http.request<string>({
            method: 'GET',
            url: `${this.baseUrl}/${this.source}-${this.target}/search/`,
            params: { source: this.source, query: word.trim() },
            responseType: 'text',
        });

        const candidates = this.parseCandidates(html);
        if (candidates.length === 0) {
            throw new ResponseParsingError('Linguee', `no featured translation for "${word.trim()}"`, html);
        }
        return options.returnAll ? candidates : candidates[0];
    }

    async translateBatch(words: string[]): Promise<string[]> {
        return this.support.batch(words, word => this.translate(word));
    }

    async translateFile(path: string): Promise<string> {
        return this.support.file(path, word => this.translate(word));
    }

    getSupportedLanguages(): string[];
    getSupportedLanguages(asDict: true): Record<string, string>;
    getSupportedLanguages(asDict: boolean = false): string[] | Record<string, string> {
        return this.support.languages(asDict);
    }

    /**
     * Featured dictionary links in page order, minus their placeholder pronouns.
     */
    private parseCandidates(html: string): string[] {
        const $ = cheerio.load(html);
        const candidates: string[] = [];

        $('a.dictLink.featured').each((_, element) => {
            const link = $(element);
            const placeholder = link.find('span.placeholder').text().trim();
            let text = link.text().replace(/\s+/g, ' ').trim();
            if (placeholder) {
                text = text.replace(placeholder, '').trim();
            }
            if (text) {
                candidates.push(text);
            }
        });

        return candidates;
    }
}
