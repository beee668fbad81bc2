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

export interface QcriTranslatorOptions extends BaseTranslatorOptions {
    source: string;
    target: string;
    /** Falls back to QCRI_API_KEY. */
    apiKey?: string;
    /** Translation domain, see getDomains() (default: general). */
    domain?: string;
}

const QCRI_BASE_URL = 'https://mt.qcri.org/api/v1';

/**
 * QCRI Shaheen machine translation (Arabic/English/Spanish).
 */
export class QcriTranslator implements ITranslator {
    readonly name: TranslatorName = 'qcri';
    readonly maxChars = 5000;

    domain: string;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly apiKey: string;
    private readonly support: TranslatorSupport;

    constructor(options: QcriTranslatorOptions) {
        this.apiKey = resolveCredential(options.apiKey, ENV_VARS.QCRI_API_KEY, 'QCRI API key');
        this.domain = options.domain ?? 'general';
        this.selection = new LanguageSelection(this.name, options.source, options.target, {
            supportsAutoDetection: false,
        });
        this.http = new VendorHttpClient('QCRI', options);
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
        if (!validatePayload(text, this.maxChars, 'QCRI')) {
            return text;
        }

        const body = await this.http.request<unknown>({
            method: 'GET',
            url: `${QCRI_BASE_URL}/translate`,
            params: {
                key: this.apiKey,
                langpair: `${this.source}-${this.target}`,
                domain: this.domain,
                text,
            },
        });

        const translated = readText(body, 'translatedText');
        if (translated === undefined) {
            throw new ResponseParsingError('QCRI', 'no translatedText in response', body);
        }
        return translated;
    }

    /**
     * Domains the key may translate in, e.g. ["general", "medical"].
     */
    async getDomains(): Promise<string[]> {
        const body = await this.http.request<unknown>({
            method: 'GET',
            url: `${QCRI_BASE_URL}/getDomains`,
            params: { key: this.apiKey },
        });

        const domains = readArray(body, 'domains');
        if (!domains) {
            throw new ResponseParsingError('QCRI', 'no domains in response', body);
        }
        return domains.filter((domain): domain is string => typeof domain === 'string');
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
