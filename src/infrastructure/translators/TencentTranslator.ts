import crypto from 'crypto';
import { ENV_VARS, resolveCredential } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError, VendorApiError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { readRecord, readString, readText } from '../http/ResponseShape';
import { VendorHttpClient } from '../http/VendorHttpClient';
import { SignableParams, TENCENT_SIGNATURE_TARGET, tencentSignature } from '../signing/RequestSigner';
import { BaseTranslatorOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface TencentTranslatorOptions extends BaseTranslatorOptions {
    /** Falls back to TENCENT_SECRET_ID. */
    secretId?: string;
    /** Falls back to TENCENT_SECRET_KEY. */
    secretKey?: string;
    /** Cloud region (default: ap-guangzhou). */
    region?: string;
    /** Unix seconds; injectable for deterministic signatures. */
    clock?: () => number;
    nonce?: () => number;
}

/**
 * Tencent Machine Translation (TextTranslate, API version 2018-03-21),
 * authenticated with the HmacSHA1 query signature.
 */
export class TencentTranslator implements ITranslator {
    readonly name: TranslatorName = 'tencent';
    readonly maxChars = 2000;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly secretId: string;
    private readonly secretKey: string;
    private readonly region: string;
    private readonly clock: () => number;
    private readonly nonce: () => number;
    private readonly support: TranslatorSupport;

    constructor(options: TencentTranslatorOptions = {}) {
        this.secretId = resolveCredential(options.secretId, ENV_VARS.TENCENT_SECRET_ID, 'Tencent secret id');
        this.secretKey = resolveCredential(options.secretKey, ENV_VARS.TENCENT_SECRET_KEY, 'Tencent secret key');
        this.region = options.region ?? 'ap-guangzhou';
        this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
        this.nonce = options.nonce ?? (() => crypto.randomInt(1, 2 ** 31 - 1));
        this.selection = new LanguageSelection(this.name, options.source ?? 'auto', options.target ?? 'english', {
            supportsAutoDetection: true,
        });
        this.http = new VendorHttpClient('Tencent', options);
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
        if (!validatePayload(text, this.maxChars, 'Tencent')) {
            return text;
        }

        const params: SignableParams = {
            Action: 'TextTranslate',
            Nonce: this.nonce(),
            ProjectId: 0,
            Region: this.region,
            SecretId: this.secretId,
            Source: this.source,
            SourceText: text,
            Target: this.target,
            Timestamp: this.clock(),
            Version: '2018-03-21',
        };
        const signature = tencentSignature(this.secretKey, params);

        const body = await this.http.request<unknown>({
            method: 'GET',
            url: `https://${TENCENT_SIGNATURE_TARGET.host}${TENCENT_SIGNATURE_TARGET.path}`,
            params: { ...params, Signature: signature },
        });

        const response = readRecord(body, 'Response');
        const error = readRecord(response, 'Error');
        if (error) {
            const detail = readString(error, 'Message') ?? readString(error, 'Code') ?? 'unknown error';
            throw new VendorApiError('Tencent', detail, body);
        }

        const translated = readText(response, 'TargetText');
        if (translated === undefined) {
            throw new ResponseParsingError('Tencent', 'no Response.TargetText in response', body);
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
