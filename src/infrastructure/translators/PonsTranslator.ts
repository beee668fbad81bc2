import * as cheerio from 'cheerio';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { languageNameForCode } from '../../domain/services/LanguageRegistry';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { VendorHttpClient } from '../http/VendorHttpClient';
import { BaseTranslatorOptions, LookupOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface PonsTranslatorOptions extends BaseTranslatorOptions {
    source: string;
    target: string;
    baseUrl?: string;
}

/**
 * PONS online dictionary, scraped from the result list.
 * Paths use language names: /translate/english-german/house
 */
export class PonsTranslator implements ITranslator {
    readonly name: TranslatorName = 'pons';
    readonly maxChars = 50;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly baseUrl: string;
    private readonly support: TranslatorSupport;

    constructor(options: PonsTranslatorOptions) {
        this.selection = new LanguageSelection(this.name, options.source, options.target, {
            supportsAutoDetection: false,
        });
        this.baseUrl = (options.baseUrl ?? 'https://en.pons.com/translate').replace(/\/+$/, '');
        this.http = new VendorHttpClient('Pons', options);
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
        if (!validatePayload(word, this.maxChars, 'Pons')) {
            return options.returnAll ? [word] : word;
        }

        const html = await this.http.request<string>({
            method: 'GET',
            url: `${this.baseUrl}/${this.languagePath()}/${encodeURIComponent(word.trim())}`,
            responseType: 'text',
        });

        const candidates = this.parseCandidates(html);
        if (candidates.length === 0) {
            throw new ResponseParsingError('Pons', `no translation for "${word.trim()}"`, html);
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

    private languagePath(): string {
        const table = this.selection.table;
        const source = languageNameForCode(this.source, table) ?? this.source;
        const target = languageNameForCode(this.target, table) ?? this.target;
        return `${source}-${target}`;
    }

    /**
     * One candidate per target cell: its links' text joined with spaces.
     */
    private parseCandidates(html: string): string[] {
        const $ = cheerio.load(html);
        const candidates: string[] = [];

        $('div.result_list div.target').each((_, element) => {
            const words = $(element)
                .find('a')
                .map((__, link) => $(link).text().trim())
                .get()
                .filter(text => text.length > 0);
            const candidate = words.join(' ');
            if (candidate.length > 1) {
                candidates.push(candidate);
            }
        });

        return candidates;
    }
}
