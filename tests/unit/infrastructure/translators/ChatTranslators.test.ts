import nock from 'nock';
import { MissingCredentialError, ResponseParsingError } from '../../../../src/domain/errors/TranslationErrors';
import { buildTranslationPrompt, ChatGptTranslator } from '../../../../src/infrastructure/translators/ChatGptTranslator';
import { OpenAICompatibleTranslator } from '../../../../src/infrastructure/translators/OpenAICompatibleTranslator';

function completion(content: string): object {
    return { choices: [{ index: 0, message: { role: 'assistant', content } }] };
}

describe('Chat translators', () => {
    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
        delete process.env.OPENAI_MODEL;
        delete process.env.OPENAI_API_BASE;
        jest.restoreAllMocks();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    it('should build the translation prompt', () => {
        expect(buildTranslationPrompt('Hello', 'german')).toBe('Translate the text below into german.\nText: "Hello"');
    });

    describe('ChatGptTranslator', () => {
        it('should send the prompt with the target language name', async () => {
            nock('https://api.openai.com', { reqheaders: { authorization: 'Bearer test-secret' } })
                .post('/v1/chat/completions', {
                    model: 'gpt-4o-mini',
                    messages: [{ role: 'user', content: 'Translate the text below into german.\nText: "Hello"' }],
                })
                .reply(200, completion('Hallo'));

            const translator = new ChatGptTranslator({ apiKey: 'test-secret', target: 'de' });
            await expect(translator.translate('Hello')).resolves.toBe('Hallo');
        });

        it('should take the model and base URL from the environment', async () => {
            process.env.OPENAI_MODEL = 'gpt-4o';
            process.env.OPENAI_API_BASE = 'https://llm.internal.test/v1/';
            nock('https://llm.internal.test')
                .post('/v1/chat/completions', body => body.model === 'gpt-4o')
                .reply(200, completion('Bonjour'));

            const translator = new ChatGptTranslator({ apiKey: 'test-secret', target: 'french' });
            expect(translator.model).toBe('gpt-4o');
            await expect(translator.translate('Hello')).resolves.toBe('Bonjour');
        });

        it('should fall back to default_model for an empty model name', () => {
            const translator = new ChatGptTranslator({ apiKey: 'test-secret', model: '' });
            expect(translator.model).toBe('default_model');
        });

        it('should need an API key', () => {
            expect(() => new ChatGptTranslator()).toThrow(MissingCredentialError);
        });

        it('should not retry unreadable completions', async () => {
            nock('https://api.openai.com').post('/v1/chat/completions').reply(200, { choices: [] });

            const translator = new ChatGptTranslator({ apiKey: 'test-secret', target: 'de' });
            await expect(translator.translate('Hello')).rejects.toThrow(ResponseParsingError);
        });
    });

    describe('OpenAICompatibleTranslator', () => {
        it('should default to a local server translating english to chinese', async () => {
            nock('http://localhost:8080')
                .post('/v1/chat/completions', {
                    model: 'default_model',
                    messages: [{ role: 'user', content: 'Translate the text below into chinese (simplified).\nText: "Hello"' }],
                })
                .reply(200, completion('你好'));

            const translator = new OpenAICompatibleTranslator({ apiKey: 'test-secret' });
            expect(translator.source).toBe('en');
            expect(translator.target).toBe('zh-CN');
            await expect(translator.translate('Hello')).resolves.toBe('你好');
        });

        it('should retry unreadable responses and warn on each retry', async () => {
            const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
            nock('http://localhost:8080').post('/v1/chat/completions').reply(200, 'not json');
            nock('http://localhost:8080').post('/v1/chat/completions').reply(200, completion('Hallo'));

            const translator = new OpenAICompatibleTranslator({ apiKey: 'test-secret', target: 'de', retryDelayMs: 0 });

            await expect(translator.translate('Hello')).resolves.toBe('Hallo');
            expect(warn).toHaveBeenCalledTimes(1);
            expect(warn).toHaveBeenCalledWith(
                '[OpenAICompatible] Unreadable response from http://localhost:8080/v1/chat/completions (attempt 1/3), retrying in 0ms'
            );
        });

        it('should give up after the configured attempts', async () => {
            jest.spyOn(console, 'warn').mockImplementation(() => undefined);
            const scope = nock('http://localhost:8080').post('/v1/chat/completions').times(2).reply(200, { choices: [] });

            const translator = new OpenAICompatibleTranslator({
                apiKey: 'test-secret',
                target: 'de',
                retryCount: 2,
                retryDelayMs: 0,
            });

            await expect(translator.translate('Hello')).rejects.toThrow(ResponseParsingError);
            expect(scope.isDone()).toBe(true);
        });

        it('should not retry transport errors', async () => {
            const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
            nock('http://localhost:8080').post('/v1/chat/completions').reply(500, 'server error');

            const translator = new OpenAICompatibleTranslator({ apiKey: 'test-secret', target: 'de', retryDelayMs: 0 });

            await expect(translator.translate('Hello')).rejects.toMatchObject({ statusCode: 500 });
            expect(warn).not.toHaveBeenCalled();
        });

        it('should return blank text without a request', async () => {
            const translator = new OpenAICompatibleTranslator({ apiKey: 'test-secret' });
            await expect(translator.translate('  ')).resolves.toBe('  ');
        });
    });
});
