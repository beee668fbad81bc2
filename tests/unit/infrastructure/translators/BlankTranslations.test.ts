import nock from 'nock';
import { ResponseParsingError } from '../../../../src/domain/errors/TranslationErrors';
import { ITranslator } from '../../../../src/domain/ports/ITranslator';
import { BaiduTranslator } from '../../../../src/infrastructure/translators/BaiduTranslator';
import { DeeplTranslator } from '../../../../src/infrastructure/translators/DeeplTranslator';
import { LibreTranslator } from '../../../../src/infrastructure/translators/LibreTranslator';
import { MicrosoftTranslator } from '../../../../src/infrastructure/translators/MicrosoftTranslator';
import { MyMemoryTranslator } from '../../../../src/infrastructure/translators/MyMemoryTranslator';
import { PapagoTranslator } from '../../../../src/infrastructure/translators/PapagoTranslator';
import { QcriTranslator } from '../../../../src/infrastructure/translators/QcriTranslator';
import { TencentTranslator } from '../../../../src/infrastructure/translators/TencentTranslator';
import { YandexTranslator } from '../../../../src/infrastructure/translators/YandexTranslator';

interface BlankCase {
    stub: () => nock.Scope;
    build: () => ITranslator<unknown>;
}

const CASES: Record<string, BlankCase> = {
    deepl: {
        stub: () => nock('https://api-free.deepl.com').post('/v2/translate').reply(200, { translations: [{ text: '' }] }),
        build: () => new DeeplTranslator({ apiKey: 'test-secret', target: 'de' }),
    },
    yandex: {
        stub: () => nock('https://translate.yandex.net')
            .post('/api/v1.5/tr.json/translate')
            .reply(200, { code: 200, lang: 'en-de', text: [''] }),
        build: () => new YandexTranslator({ apiKey: 'test-secret', target: 'de' }),
    },
    libre: {
        stub: () => nock('https://libretranslate.com').post('/translate').reply(200, { translatedText: '' }),
        build: () => new LibreTranslator({ source: 'en', target: 'de' }),
    },
    baidu: {
        stub: () => nock('https://fanyi-api.baidu.com')
            .post('/api/trans/vip/translate')
            .reply(200, { from: 'en', to: 'zh', trans_result: [{ src: 'Hello', dst: '' }] }),
        build: () => new BaiduTranslator({ appId: 'test-app', appKey: 'test-secret', source: 'en', target: 'zh' }),
    },
    papago: {
        stub: () => nock('https://openapi.naver.com')
            .post('/v1/papago/n2mt')
            .reply(200, { message: { result: { translatedText: '  ' } } }),
        build: () => new PapagoTranslator({ clientId: 'test-id', secretKey: 'test-secret', source: 'en', target: 'ko' }),
    },
    tencent: {
        stub: () => nock('https://tmt.tencentcloudapi.com')
            .get('/')
            .query(true)
            .reply(200, { Response: { TargetText: '', RequestId: 'req-1' } }),
        build: () => new TencentTranslator({ secretId: 'test-id', secretKey: 'test-secret', target: 'de' }),
    },
    qcri: {
        stub: () => nock('https://mt.qcri.org').get('/api/v1/translate').query(true).reply(200, { translatedText: '' }),
        build: () => new QcriTranslator({ apiKey: 'test-secret', source: 'en', target: 'ar' }),
    },
    microsoft: {
        stub: () => nock('https://api.cognitive.microsofttranslator.com')
            .post('/translate')
            .query(true)
            .reply(200, [{ translations: [{ to: 'de', text: '' }] }]),
        build: () => new MicrosoftTranslator({ apiKey: 'test-secret', target: 'de' }),
    },
    mymemory: {
        stub: () => nock('https://api.mymemory.translated.net')
            .get('/get')
            .query(true)
            .reply(200, { responseStatus: 200, responseData: { translatedText: '' }, matches: [{ translation: ' ' }] }),
        build: () => new MyMemoryTranslator({ source: 'english', target: 'german' }),
    },
};

describe('blank translation fields', () => {
    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    it.each(Object.keys(CASES))('%s reports an empty translation as a parsing error', async name => {
        const { stub, build } = CASES[name];
        const scope = stub();

        const result = build().translate('Hello');

        await expect(result).rejects.toBeInstanceOf(ResponseParsingError);
        await expect(result).rejects.toMatchObject({ code: 'RESPONSE_PARSING_ERROR' });
        expect(scope.isDone()).toBe(true);
    });

    it('baidu accepts a result where only some lines are blank', async () => {
        nock('https://fanyi-api.baidu.com')
            .post('/api/trans/vip/translate')
            .reply(200, { trans_result: [{ src: 'Hello', dst: '你好' }, { src: '', dst: '' }] });

        const translator = new BaiduTranslator({ appId: 'test-app', appKey: 'test-secret', source: 'en', target: 'zh' });
        await expect(translator.translate('Hello\n')).resolves.toBe('你好\n');
    });
});
