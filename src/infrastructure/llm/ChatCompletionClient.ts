import { ResponseParsingError } from '../../domain/errors/TranslationErrors';
import { readArray, readRecord, readString } from '../http/ResponseShape';
import { TransportOptions, VendorHttpClient } from '../http/VendorHttpClient';

export interface ChatCompletionSettings {
    apiKey: string;
    model: string;
    baseUrl: string;
}

/**
 * Minimal client for OpenAI-style /chat/completions endpoints
 * (OpenAI itself, mlx_lm.server, llama.cpp, vLLM, ...).
 */
export class ChatCompletionClient {
    private readonly http: VendorHttpClient;
    private readonly baseUrl: string;

    constructor(
        private readonly backend: string,
        private readonly settings: ChatCompletionSettings,
        transport: TransportOptions = {}
    ) {
        this.http = new VendorHttpClient(backend, transport);
        this.baseUrl = settings.baseUrl.replace(/\/+$/, '');
    }

    get model(): string {
        return this.settings.model;
    }

    get endpoint(): string {
        return `${this.baseUrl}/chat/completions`;
    }

    /**
     * Sends a single user message and returns the first choice's content.
     */
    async complete(prompt: string): Promise<string> {
        const body = await this.http.request<unknown>({
            method: 'POST',
            url: this.endpoint,
            data: {
                model: this.settings.model,
                messages: [{ role: 'user', content: prompt }],
            },
            headers: {
                Authorization: `Bearer ${this.settings.apiKey}`,
                'Content-Type': 'application/json',
            },
        });

        const firstChoice = readArray(body, 'choices')?.[0];
        const content = readString(readRecord(firstChoice, 'message'), 'content');
        if (content === undefined || content.trim().length === 0) {
            throw new ResponseParsingError(this.backend, 'no choices[0].message.content in completion', body);
        }
        return content;
    }
}
