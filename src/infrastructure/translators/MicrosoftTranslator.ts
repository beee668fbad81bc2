import { ENV_VARS, resolveCredential } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import {
    ConfigurationError,
    NotSupportedError,
    ResponseParsingError,
    VendorApiError,
} from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { readArray, readRecord, readString, readText } from '../http/ResponseShape';
import { QueryValue, VendorHttpClient } from '../http/VendorHttpClient';
import { BaseTranslatorOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface MicrosoftTranslatorOptions extends Omit<BaseTranslatorOptions, 'target'> {
    /** A single target, or several to receive one translation per target. */
    target?: string | string[];
    /** Falls back to MICROSOFT_API_KEY. */
    apiKey?: string;
    /** Azure resource region, required for regional keys. */
    region?: string;
}

/**
 * A single translation, or target code -> translation for multi-target instances.
 */
export type MicrosoftTranslation = string | Record<string, string>;

/**
 * Azure AI Translator (Text Translation v3).
 */
export class MicrosoftTranslator implements ITranslator<MicrosoftTranslation> {
    readonly name: TranslatorName = 'microsoft';
    readonly maxChars = 50000;

    private readonly selection: LanguageSelection;
    private readonly http: VendorHttpClient;
    private readonly apiKey: string;
    private readonly region?: string;
    private readonly support: TranslatorSupport;
    private targetCodes: string[];
    private multiTarget: boolean;

    constructor(options: MicrosoftTranslatorOptions = {}) {
        this.apiKey = resolveCredential(options.apiKey, ENV_VARS.MICROSOFT_API_KEY, 'Microsoft Translator API key');
        this.region = options.region;

        const requested = options.target ?? 'english';
        const targets = Array.isArray(requested) ? requested : [requested];
        if (targets.length === 0) {
            throw new ConfigurationError('At least one target language is required');
        }

        this.selection = new LanguageSelection(this.name, options.source ?? 'auto', targets[0], {
            supportsAutoDetection: true,
        });
        this.targetCodes = targets.map(target => this.selection.validateTarget(target));
        this.multiTarget = Array.isArray(requested);
        this.http = new VendorHttpClient('Microsoft', options);
        this.support = new TranslatorSupport(this.selection, this.maxChars, options.documentReader);
    }

    get source(): string {
        return this.selection.source;
    }

    set source(value: string) {
        const previous = this.selection.source;
        this.selection.source = value;
        try {
            this.targetCodes = this.targetCodes.map(target => this.selection.validateTarget(target));
        } catch (error) {
            this.selection.source = previous;
            throw error;
        }
    }

    /** First target; see targets for multi-target instances. */
    get target(): string {
        return this.targetCodes[0];
    }

    /** Switches the instance back to a single target. */
    set target(value: string) {
        this.selection.target = value;
        this.targetCodes = [this.selection.target];
        this.multiTarget = false;
    }

    get targets(): string[] {
        return [...this.targetCodes];
    }

    set targets(values: string[]) {
        if (values.length === 0) {
            throw new ConfigurationError('At least one target language is required');
        }
        const codes = values.map(target => this.selection.validateTarget(target));
        this.selection.target = codes[0];
        this.targetCodes = codes;
        this.multiTarget = true;
    }

    get isMultiTarget(): boolean {
        return this.multiTarget;
    }

    async translate(text: string): Promise<MicrosoftTranslation> {
        if (!validatePayload(text, this.maxChars, 'Microsoft')) {
            return this.multiTarget
                ? Object.fromEntries(this.targetCodes.map(code => [code, text]))
                : text;
        }

        const params: Record<string, QueryValue> = { 'api-version': '3.0', to: this.targetCodes };
        if (!this.selection.isAutoSource) {
            params.from = this.source;
        }

        const headers: Record<string, string> = {
            'Ocp-Apim-Subscription-Key': this.apiKey,
            'Content-Type': 'application/json',
        };
        if (this.region) {
            headers['Ocp-Apim-Subscription-Region'] = this.region;
        }

        const body = await this.http.request<unknown>({
            method: 'POST',
            url: 'https://api.cognitive.microsofttranslator.com/translate',
            params,
            data: [{ text }],
            headers,
        });

        const error = readRecord(body, 'error');
        if (error) {
            throw new VendorApiError('Microsoft', readString(error, 'message') ?? 'unknown error', body);
        }

        const first = Array.isArray(body) ? body[0] : undefined;
        const translations: Record<string, string> = {};
        for (const entry of readArray(first, 'translations') ?? []) {
            const to = readString(entry, 'to');
            const translated = readText(entry, 'text');
            if (to !== undefined && translated !== undefined) {
                translations[to] = translated;
            }
        }

        const missing = this.targetCodes.filter(code => !(code in translations));
        if (missing.length > 0) {
            throw new ResponseParsingError('Microsoft', `no translation for ${missing.join(', ')}`, body);
        }

        return this.multiTarget ? translations : translations[this.targetCodes[0]];
    }

    async translateBatch(texts: string[]): Promise<MicrosoftTranslation[]> {
        return this.support.batch(texts, text => this.translate(text));
    }

    async translateFile(path: string): Promise<string> {
        if (this.multiTarget) {
            throw new NotSupportedError('File translation needs a single target language');
        }
        return this.support.file(path, text => this.translateSingle(text));
    }

    getSupportedLanguages(): string[];
    getSupportedLanguages(asDict: true): Record<string, string>;
    getSupportedLanguages(asDict: boolean = false): string[] | Record<string, string> {
        return this.support.languages(asDict);
    }

    private async translateSingle(text: string): Promise<string> {
        const result = await this.translate(text);
        if (typeof result !== 'string') {
            throw new NotSupportedError('File translation needs a single target language');
        }
        return result;
    }
}
