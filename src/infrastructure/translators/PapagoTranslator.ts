import { ENV_VARS, resolveCredential } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError, VendorApiError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { readRecord, readString, readText } from '../http/ResponseShape';
import { VendorHttpClient } from '../http/VendorHttpClient';
import { BaseTranslatorOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface PapagoTranslatorOptions extends BaseTranslatorOptions {
    source: string;
    target: string;
    /** Falls back to PAPAGO_CLIENT_ID. */
    clientId?: string;
    /** Falls back to PAPAGO_SECRET_KEY. */
    secretKey?: string;
}

export class PapagoTranslator implements ITranslator {
    readonly name: TranslatorName = 'papago';
    readonly maxChars = 5000;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly clientId: string;
    private readonly secretKey: string;
    private readonly support: TranslatorSupport;

    constructor(options: PapagoTranslatorOptions) {
        this.clientId = resolveCredential(options.clientId, ENV_VARS.PAPAGO_CLIENT_ID, 'Papago client id');
        this.secretKey = resolveCredential(options.secretKey, ENV_VARS.PAPAGO_SECRET_KEY, 'Papago secret key');
        this.selection = new LanguageSelection(this.name, options.source, options.target, {
            supportsAutoDetection: false,
        });
        this.http = new VendorHttpClient('Papago', options);
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
        if (!validatePayload(text, this.maxChars, 'Papago')) {
            return text;
        }

        const form = new URLSearchParams({ source: this.source, target: this.target, text });
        const body = await this.http.request<unknown>({
            method: 'POST',
            url: 'https://openapi.naver.com/v1/papago/n2mt',
            data: form.toString(),
            headers: {
                'X-Naver-Client-Id': this.clientId,
                'X-Naver-Client-Secret': this.secretKey,
                'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
            },
        });

        const errorMessage = readString(body, 'errorMessage');
        if (errorMessage) {
            throw new VendorApiError('Papago', errorMessage, body);
        }

        const translated = readText(readRecord(readRecord(body, 'message'), 'result'), 'translatedText');
        if (translated === undefined) {
            throw new ResponseParsingError('Papago', 'no message.result.translatedText in response', body);
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
