import { ENV_VARS, readEnvVar, resolveCredential } from '../../config';
import { TranslatorName } from '../../domain/entities/Language';
import { ResponseParsingError } from '../../domain/errors/TranslationErrors';
import { ITranslator } from '../../domain/ports/ITranslator';
import { languageNameForCode } from '../../domain/services/LanguageRegistry';
import { LanguageSelection } from '../../domain/services/LanguageSelection';
import { validatePayload } from '../../domain/services/PayloadValidator';
import { withRetry } from '../http/RetryUtils';
import { ChatCompletionClient } from '../llm/ChatCompletionClient';
import { buildTranslationPrompt, ChatGptTranslatorOptions, LOCAL_DEFAULT_MODEL } from './ChatGptTranslator';
import { TranslatorSupport } from './TranslatorSupport';

export interface OpenAICompatibleTranslatorOptions extends ChatGptTranslatorOptions {
    /** Attempts per text when the server returns an unreadable body (default: 3). */
    retryCount?: number;
    /** Fixed delay between attempts (default: 1000ms). */
    retryDelayMs?: number;
}

export const DEFAULT_COMPATIBLE_BASE_URL = 'http://localhost:8080/v1';

/**
 * Chat translator for self-hosted OpenAI-compatible servers.
 *
 * Local servers occasionally answer with a truncated or non-JSON body; those
 * responses are retried. Every other failure propagates unchanged.
 */
export class OpenAICompatibleTranslator implements ITranslator {
    readonly name: TranslatorName = 'openai-compatible';
    readonly maxChars = 20000;

    private readonly selection: LanguageSelection;
    private readonly client: ChatCompletionClient;
    private readonly retryCount: number;
    private readonly retryDelayMs: number;
    private readonly support: TranslatorSupport;

    constructor(options: OpenAICompatibleTranslatorOptions = {}) {
        const apiKey = resolveCredential(options.apiKey, ENV_VARS.OPENAI_API_KEY, 'OpenAI-compatible API key');
        const model = options.model ?? readEnvVar(ENV_VARS.OPENAI_MODEL) ?? LOCAL_DEFAULT_MODEL;

        this.selection = new LanguageSelection(this.name, options.source ?? 'en', options.target ?? 'zh-CN', {
            supportsAutoDetection: true,
        });
        this.client = new ChatCompletionClient('OpenAICompatible', {
            apiKey,
            model: model || LOCAL_DEFAULT_MODEL,
            baseUrl: options.baseUrl ?? readEnvVar(ENV_VARS.OPENAI_API_BASE) ?? DEFAULT_COMPATIBLE_BASE_URL,
        }, options);
        this.retryCount = options.retryCount ?? 3;
        this.retryDelayMs = options.retryDelayMs ?? 1000;
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
        if (!validatePayload(text, this.maxChars, 'OpenAICompatible')) {
            return text;
        }

        const targetName = languageNameForCode(this.target, this.selection.table) ?? this.target;
        const prompt = buildTranslationPrompt(text, targetName);

        return withRetry(() => this.client.complete(prompt), {
            maxAttempts: this.retryCount,
            initialBackoffMs: this.retryDelayMs,
            backoffMultiplier: 1,
            isRetryable: error => error instanceof ResponseParsingError,
            onRetry: (attempt, _error, delay) => {
                console.warn(
                    `[OpenAICompatible] Unreadable response from ${this.client.endpoint} (attempt ${attempt}/${this.retryCount}), retrying in ${delay}ms`
                );
            },
        });
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
