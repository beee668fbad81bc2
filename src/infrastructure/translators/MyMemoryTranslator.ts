import { ENV_VARS, readEnvVar } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError, VendorApiError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { keepOuterWhitespace, validatePayload } from '../../domain/services/PayloadValidator';
import { isRecord, readArray, readRecord, readString, readText } from '../http/ResponseShape';
import { QueryValue, VendorHttpClient } from '../http/VendorHttpClient';
import { BaseTranslatorOptions, LookupOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface MyMemoryTranslatorOptions extends BaseTranslatorOptions {
    /** Contact address; raises the anonymous daily quota. Falls back to MYMEMORY_EMAIL. */
    email?: string;
}

/**
 * MyMemory translation memory (api.mymemory.translated.net).
 */
export class MyMemoryTranslator implements ITranslator {
    readonly name: TranslatorName = 'mymemory';
    readonly maxChars = 500;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly email?: string;
    private readonly support: TranslatorSupport;

    constructor(options: MyMemoryTranslatorOptions = {}) {
        this.selection = new LanguageSelection(this.name, options.source ?? 'auto', options.target ?? 'english', {
            supportsAutoDetection: true,
        });
        this.email = options.email ?? readEnvVar(ENV_VARS.MYMEMORY_EMAIL);
        this.http = new VendorHttpClient('MyMemory', options);
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

    translate(text: string): Promise<string>;
    translate(text: string, options: { returnAll: true }): Promise<string[]>;
    translate(text: string, options?: LookupOptions): Promise<string | string[]>;
    async translate(text: string, options: LookupOptions = {}): Promise<string | string[]> {
        if (!validatePayload(text, this.maxChars, 'MyMemory')) {
            return options.returnAll ? [text] : text;
        }

        const params: Record<string, QueryValue> = {
            langpair: `${this.selection.isAutoSource ? 'Autodetect' : this.source}|${this.target}`,
            q: text.trim(),
        };
        if (this.email) {
            params.de = this.email;
        }

        const body = await this.http.request<unknown>({
            method: 'GET',
            url: 'https://api.mymemory.translated.net/get',
            params,
        });

        const status = isRecord(body) ? body.responseStatus : undefined;
        if (status !== undefined && String(status) !== '200') {
            const details = readString(body, 'responseDetails') ?? `status ${String(status)}`;
            throw new VendorApiError('MyMemory', details, body);
        }

        const translated = readText(readRecord(body, 'responseData'), 'translatedText');
        const matches = (readArray(body, 'matches') ?? [])
            .map(match => readText(match, 'translation'))
            .filter((candidate): candidate is string => candidate !== undefined);

        if (options.returnAll) {
            if (matches.length > 0) {
                return matches;
            }
            if (translated) {
                return [translated];
            }
        } else if (translated) {
            return keepOuterWhitespace(text, translated);
        } else if (matches.length > 0) {
            return keepOuterWhitespace(text, matches[0]);
        }

        throw new ResponseParsingError('MyMemory', 'no translatedText or matches in response', body);
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
