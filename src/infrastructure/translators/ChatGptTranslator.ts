import { ENV_VARS, readEnvVar, resolveCredential } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import { ITranslator } from '../../domain/ports/ITranslator';
import { languageNameForCode } from '../../domain/services/LanguageRegistry';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { ChatCompletionClient } from '../llm/ChatCompletionClient';
import { BaseTranslatorOptions } from './TranslatorOptions';
import { TranslatorSupport } from './TranslatorSupport';

export interface ChatGptTranslatorOptions extends BaseTranslatorOptions {
    /** Falls back to OPENAI_API_KEY. */
    apiKey?: string;
    /** Falls back to OPENAI_MODEL, then gpt-4o-mini. */
    model?: string;
    /** Falls back to OPENAI_API_BASE, then https://api.openai.com/v1. */
    baseUrl?: string;
}

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

/**
 * Servers such as mlx_lm.server only answer to this model name.
 */
export const LOCAL_DEFAULT_MODEL = 'default_model';

export function buildTranslationPrompt(text: string, targetLanguage: string): string {
    return `Translate the text below into ${targetLanguage}.\nText: "${text}"`;
}

/**
 * Translation through an OpenAI chat-completion model.
 */
export class ChatGptTranslator implements ITranslator {
    readonly name: TranslatorName = 'chatgpt';
    readonly maxChars = 20000;

    private readonly selection: LanguageSelection;
    private readonly client: ChatCompletionClient;
    private readonly support: TranslatorSupport;

    constructor(options: ChatGptTranslatorOptions = {}) {
        const apiKey = resolveCredential(options.apiKey, ENV_VARS.OPENAI_API_KEY, 'OpenAI API key');
        const model = options.model ?? readEnvVar(ENV_VARS.OPENAI_MODEL) ?? 'gpt-4o-mini';

        this.selection = new LanguageSelection(this.name, options.source ?? 'auto', options.target ?? 'english', {
            supportsAutoDetection: true,
        });
        this.client = new ChatCompletionClient('ChatGPT', {
            apiKey,
            model: model || LOCAL_DEFAULT_MODEL,
            baseUrl: options.baseUrl ?? readEnvVar(ENV_VARS.OPENAI_API_BASE) ?? DEFAULT_OPENAI_BASE_URL,
        }, options);
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

    get model(): string {
        return this.client.model;
    }

    async translate(text: string): Promise<string> {
        if (!validatePayload(text, this.maxChars, 'ChatGPT')) {
            return text;
        }
        const targetName = languageNameForCode(this.target, this.selection.table) ?? this.target;
        return this.client.complete(buildTranslationPrompt(text, targetName));
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
