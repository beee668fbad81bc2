import nock from 'nock';
import { VendorApiError } from '../../../../src/domain/errors/TranslationErrors';
import { YandexTranslator } from '../../../../src/infrastructure/translators/YandexTranslator';

describe('YandexTranslator', () => {
    const baseUrl = 'https://translate.yandex.net';

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    it('should send the target alone when the source is auto', async () => {
        nock(baseUrl)
            .post('/api/v1.5/tr.json/translate', { text: 'Hello', format: 'plain', lang: 'de', key: 'test-secret' })
            .reply(200, { code: 200, lang: 'en-de', text: ['Hallo'] });

        const translator = new YandexTranslator({ apiKey: 'test-secret', target: 'german' });
        await expect(translator.translate('Hello')).resolves.toBe('Hallo');
    });

    it('should send source-target pairs', async () => {
        nock(baseUrl)
            .post('/api/v1.5/tr.json/translate', body => body.lang === 'en-fr')
            .reply(200, { code: 200, text: ['Bonjour'] });

        const translator = new YandexTranslator({ apiKey: 'test-secret', source: 'en', target: 'fr' });
        await expect(translator.translate('Hello')).resolves.toBe('Bonjour');
    });

    it('should raise VendorApiError for a failing code', async () => {
        nock(baseUrl)
            .post('/api/v1.5/tr.json/translate')
            .reply(200, { code: 501, message: 'The specified translation direction is not supported' });

        const translator = new YandexTranslator({ apiKey: 'test-secret', target: 'de' });
        const error = await translator.translate('Hello').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(VendorApiError);
        expect(error).toMatchObject({
            message: 'Yandex API error: The specified translation direction is not supported',
        });
    });

    it('should detect the language of a text', async () => {
        nock(baseUrl)
            .post('/api/v1.5/tr.json/detect', { text: 'Hallo Welt', format: 'plain', key: 'test-secret' })
            .reply(200, { code: 200, lang: 'de' });

        const translator = new YandexTranslator({ apiKey: 'test-secret' });
        await expect(translator.detect('Hallo Welt')).resolves.toBe('de');
    });
});
