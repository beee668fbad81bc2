import crypto from 'crypto';
import { ENV_VARS, resolveCredential } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError, VendorApiError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { isRecord, readArray, readString } from '../http/ResponseShape';
import { VendorHttpClient } from '../http/VendorHttpClient';
import { baiduSignature } from '../signing/RequestSigner';
import { BaseTranslatorOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface BaiduTranslatorOptions extends BaseTranslatorOptions {
    /** Falls back to BAIDU_APPID. */
    appId?: string;
    /** Falls back to BAIDU_APPKEY. */
    appKey?: string;
    /** Injectable for deterministic signatures. */
    salt?: () => number;
}

/**
 * Baidu general text translation (fanyi-api).
 */
export class BaiduTranslator implements ITranslator {
    readonly name: TranslatorName = 'baidu';
    readonly maxChars = 6000;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly appId: string;
    private readonly appKey: string;
    private readonly salt: () => number;
    private readonly support: TranslatorSupport;

    constructor(options: BaiduTranslatorOptions = {}) {
        this.appId = resolveCredential(options.appId, ENV_VARS.BAIDU_APPID, 'Baidu app id');
        this.appKey = resolveCredential(options.appKey, ENV_VARS.BAIDU_APPKEY, 'Baidu app key');
        this.salt = options.salt ?? (() => crypto.randomInt(32768, 65536));
        this.selection = new LanguageSelection(this.name, options.source ?? 'auto', options.target ?? 'english', {
            supportsAutoDetection: true,
        });
        this.http = new VendorHttpClient('Baidu', options);
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
        if (!validatePayload(text, this.maxChars, 'Baidu')) {
            return text;
        }

        const salt = this.salt();
        const form = new URLSearchParams({
            appid: this.appId,
            q: text,
            from: this.source,
            to: this.target,
            salt: String(salt),
            sign: baiduSignature(this.appId, text, salt, this.appKey),
        });

        const body = await this.http.request<unknown>({
            method: 'POST',
            url: 'https://fanyi-api.baidu.com/api/trans/vip/translate',
            data: form.toString(),
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        });

        const errorCode = isRecord(body) ? body.error_code : undefined;
        if (errorCode !== undefined && String(errorCode) !== '52000') {
            const detail = readString(body, 'error_msg') ?? `error_code ${String(errorCode)}`;
            throw new VendorApiError('Baidu', detail, body);
        }

        const lines = (readArray(body, 'trans_result') ?? []).map(entry => readString(entry, 'dst'));
        const translated = lines.every(line => line !== undefined) ? lines.join('\n') : '';
        if (translated.trim().length === 0) {
            throw new ResponseParsingError('Baidu', 'no trans_result[].dst in response', body);
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
