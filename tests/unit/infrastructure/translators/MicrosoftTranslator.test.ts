import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import nock from 'nock';
import {
    NotSupportedError,
    ResponseParsingError,
    SameSourceTargetError,
    VendorApiError,
} from '../../../../src/domain/errors/TranslationErrors';
import { MicrosoftTranslator } from '../../../../src/infrastructure/translators/MicrosoftTranslator';

describe('MicrosoftTranslator', () => {
    const baseUrl = 'https://api.cognitive.microsofttranslator.com';

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    it('should translate to a single target', async () => {
        nock(baseUrl, {
            reqheaders: {
                'ocp-apim-subscription-key': 'test-secret',
                'ocp-apim-subscription-region': 'westeurope',
            },
        })
            .post('/translate', [{ text: 'Hello' }])
            .query({ 'api-version': '3.0', to: 'de', from: 'en' })
            .reply(200, [{ translations: [{ text: 'Hallo', to: 'de' }] }]);

        const translator = new MicrosoftTranslator({
            apiKey: 'test-secret',
            region: 'westeurope',
            source: 'english',
            target: 'german',
        });
        await expect(translator.translate('Hello')).resolves.toBe('Hallo');
    });

    it('should return one translation per target for a target list', async () => {
        nock(baseUrl)
            .post('/translate')
            .query({ 'api-version': '3.0', to: ['de', 'fr'] })
            .reply(200, [{
                detectedLanguage: { language: 'en', score: 1 },
                translations: [{ text: 'Hallo', to: 'de' }, { text: 'Bonjour', to: 'fr' }],
            }]);

        const translator = new MicrosoftTranslator({ apiKey: 'test-secret', target: ['german', 'french'] });

        expect(translator.isMultiTarget).toBe(true);
        expect(translator.targets).toEqual(['de', 'fr']);
        await expect(translator.translate('Hello')).resolves.toEqual({ de: 'Hallo', fr: 'Bonjour' });
    });

    it('should raise VendorApiError for an error envelope', async () => {
        nock(baseUrl)
            .post('/translate')
            .query(true)
            .reply(200, { error: { code: 400036, message: 'The target language is not valid.' } });

        const translator = new MicrosoftTranslator({ apiKey: 'test-secret', target: 'de' });
        await expect(translator.translate('Hello')).rejects.toThrow(VendorApiError);
    });

    it('should raise ResponseParsingError when a target is missing', async () => {
        nock(baseUrl)
            .post('/translate')
            .query(true)
            .reply(200, [{ translations: [{ text: 'Hallo', to: 'de' }] }]);

        const translator = new MicrosoftTranslator({ apiKey: 'test-secret', target: ['de', 'fr'] });
        await expect(translator.translate('Hello')).rejects.toThrow(ResponseParsingError);
    });

    it('should validate every target against the source', () => {
        expect(() => new MicrosoftTranslator({ apiKey: 'test-secret', source: 'de', target: ['fr', 'de'] }))
            .toThrow(SameSourceTargetError);
    });

    it('should switch back to a single target on assignment', () => {
        const translator = new MicrosoftTranslator({ apiKey: 'test-secret', target: ['de', 'fr'] });
        translator.target = 'spanish';
        expect(translator.isMultiTarget).toBe(false);
        expect(translator.targets).toEqual(['es']);
    });

    it('should return blank text for every target', async () => {
        const translator = new MicrosoftTranslator({ apiKey: 'test-secret', target: ['de', 'fr'] });
        await expect(translator.translate(' ')).resolves.toEqual({ de: ' ', fr: ' ' });
    });

    it('should refuse file translation with several targets', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'microsoft-'));
        const file = path.join(dir, 'input.txt');
        await fs.writeFile(file, 'Hello');

        try {
            const translator = new MicrosoftTranslator({ apiKey: 'test-secret', target: ['de', 'fr'] });
            await expect(translator.translateFile(file)).rejects.toThrow(NotSupportedError);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
