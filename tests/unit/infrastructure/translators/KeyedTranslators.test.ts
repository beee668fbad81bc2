import crypto from 'crypto';
import nock from 'nock';
import {
    ConfigurationError,
    MissingCredentialError,
    VendorApiError,
} from '../../../../src/domain/errors/TranslationErrors';
import { tencentSignature } from '../../../../src/infrastructure/signing/RequestSigner';
import { BaiduTranslator } from '../../../../src/infrastructure/translators/BaiduTranslator';
import { LibreTranslator } from '../../../../src/infrastructure/translators/LibreTranslator';
import { PapagoTranslator } from '../../../../src/infrastructure/translators/PapagoTranslator';
import { QcriTranslator } from '../../../../src/infrastructure/translators/QcriTranslator';
import { TencentTranslator } from '../../../../src/infrastructure/translators/TencentTranslator';

describe('Keyed translators', () => {
    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    describe('PapagoTranslator', () => {
        it('should post a form with the Naver headers', async () => {
            nock('https://openapi.naver.com', {
                reqheaders: { 'x-naver-client-id': 'test-id', 'x-naver-client-secret': 'test-secret' },
            })
                .post('/v1/papago/n2mt', { source: 'en', target: 'ko', text: 'Hello' })
                .reply(200, { message: { result: { srcLangType: 'en', translatedText: '안녕하세요' } } });

            const translator = new PapagoTranslator({
                clientId: 'test-id',
                secretKey: 'test-secret',
                source: 'english',
                target: 'korean',
            });
            await expect(translator.translate('Hello')).resolves.toBe('안녕하세요');
        });

        it('should require both credentials', () => {
            expect(() => new PapagoTranslator({ clientId: 'test-id', source: 'en', target: 'ko' }))
                .toThrow(MissingCredentialError);
        });
    });

    describe('LibreTranslator', () => {
        it('should post JSON with the optional key to a custom server', async () => {
            nock('http://localhost:5000')
                .post('/translate', { q: 'Hello', source: 'auto', target: 'de', format: 'text', api_key: 'test-secret' })
                .reply(200, { translatedText: 'Hallo' });

            const translator = new LibreTranslator({
                apiKey: 'test-secret',
                baseUrl: 'http://localhost:5000/',
                target: 'german',
            });
            await expect(translator.translate('Hello')).resolves.toBe('Hallo');
        });

        it('should work without a key', async () => {
            nock('https://libretranslate.com')
                .post('/translate', { q: 'Hello', source: 'en', target: 'fr', format: 'text' })
                .reply(200, { translatedText: 'Bonjour' });

            const translator = new LibreTranslator({ source: 'en', target: 'fr' });
            await expect(translator.translate('Hello')).resolves.toBe('Bonjour');
        });
    });

    describe('TencentTranslator', () => {
        const options = {
            secretId: 'test-id',
            secretKey: 'test-secret',
            source: 'en',
            target: 'de',
            clock: () => 1000,
            nonce: () => 42,
        };

        it('should sign the canonical query and read Response.TargetText', async () => {
            const signed = {
                Action: 'TextTranslate',
                Nonce: 42,
                ProjectId: 0,
                Region: 'ap-guangzhou',
                SecretId: 'test-id',
                Source: 'en',
                SourceText: 'Hello world',
                Target: 'de',
                Timestamp: 1000,
                Version: '2018-03-21',
            };
            nock('https://tmt.tencentcloudapi.com')
                .get('/')
                .query({
                    Action: 'TextTranslate',
                    Nonce: '42',
                    ProjectId: '0',
                    Region: 'ap-guangzhou',
                    SecretId: 'test-id',
                    Source: 'en',
                    SourceText: 'Hello world',
                    Target: 'de',
                    Timestamp: '1000',
                    Version: '2018-03-21',
                    Signature: tencentSignature('test-secret', signed),
                })
                .reply(200, { Response: { TargetText: 'Hallo Welt', Source: 'en', Target: 'de', RequestId: 'r-1' } });

            const translator = new TencentTranslator(options);
            await expect(translator.translate('Hello world')).resolves.toBe('Hallo Welt');
        });

        it('should raise VendorApiError for Response.Error', async () => {
            nock('https://tmt.tencentcloudapi.com')
                .get('/')
                .query(true)
                .reply(200, { Response: { Error: { Code: 'AuthFailure.SignatureFailure', Message: 'signature mismatch' } } });

            const translator = new TencentTranslator(options);
            await expect(translator.translate('Hello')).rejects.toThrow(new VendorApiError('Tencent', 'signature mismatch'));
        });
    });

    describe('BaiduTranslator', () => {
        const options = { appId: 'test-app', appKey: 'test-secret', source: 'en', target: 'zh', salt: () => 12345 };

        it('should post the md5-signed form and join multi-line results', async () => {
            const sign = crypto.createHash('md5').update('test-appHello\nWorld12345test-secret').digest('hex');
            nock('https://fanyi-api.baidu.com')
                .post('/api/trans/vip/translate', {
                    appid: 'test-app',
                    q: 'Hello\nWorld',
                    from: 'en',
                    to: 'zh',
                    salt: '12345',
                    sign,
                })
                .reply(200, {
                    from: 'en',
                    to: 'zh',
                    trans_result: [{ src: 'Hello', dst: '你好' }, { src: 'World', dst: '世界' }],
                });

            const translator = new BaiduTranslator(options);
            await expect(translator.translate('Hello\nWorld')).resolves.toBe('你好\n世界');
        });

        it('should raise VendorApiError for an error_code', async () => {
            nock('https://fanyi-api.baidu.com')
                .post('/api/trans/vip/translate')
                .reply(200, { error_code: '54001', error_msg: 'Invalid Sign' });

            const translator = new BaiduTranslator(options);
            await expect(translator.translate('Hello')).rejects.toThrow('Baidu API error: Invalid Sign');
        });
    });

    describe('QcriTranslator', () => {
        it('should send key, langpair and domain', async () => {
            nock('https://mt.qcri.org')
                .get('/api/v1/translate')
                .query({ key: 'test-secret', langpair: 'en-ar', domain: 'general', text: 'Hello' })
                .reply(200, { success: true, translatedText: 'مرحبا' });

            const translator = new QcriTranslator({ apiKey: 'test-secret', source: 'english', target: 'arabic' });
            await expect(translator.translate('Hello')).resolves.toBe('مرحبا');
        });

        it('should list the available domains', async () => {
            nock('https://mt.qcri.org')
                .get('/api/v1/getDomains')
                .query({ key: 'test-secret' })
                .reply(200, { domains: ['general', 'medical'] });

            const translator = new QcriTranslator({ apiKey: 'test-secret', source: 'en', target: 'es' });
            await expect(translator.getDomains()).resolves.toEqual(['general', 'medical']);
        });

        it('should refuse auto detection', () => {
            expect(() => new QcriTranslator({ apiKey: 'test-secret', source: 'auto', target: 'ar' }))
                .toThrow(ConfigurationError);
        });
    });
});
