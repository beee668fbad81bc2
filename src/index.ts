export * from './domain/errors/TranslationErrors';
export { AUTO_LANGUAGE, TRANSLATOR_NAMES, TranslatorName, LanguageTable, isTranslatorName } from './domain/entities/Language';
export { ITranslator } from './domain/ports/ITranslator';
export { IDocumentReader, ExtractedDocument, DocumentFormat } from './domain/ports/IDocumentReader';
export { IPageCache } from './domain/ports/IPageCache';
export {
    getLanguageTable,
    resolveLanguage,
    languageNameForCode,
    supportedLanguages,
} from './domain/services/LanguageRegistry';
export { LanguageSelection } from './domain/services/LanguageSelection';

export { Config, ENV_VARS, loadConfig, getConfig, resetConfig, resolveCredential } from './config';

export { translateSequentially } from './application/BatchTranslation';
export {
    translateLongText,
    translateDocument,
    translateFileToPath,
    defaultOutputPath,
} from './application/FileTranslationService';
export {
    createTranslator,
    listTranslators,
    FactoryOptions,
    TranslationOutput,
} from './application/TranslatorFactory';
export {
    PdfReaderSession,
    PdfReaderSessionOptions,
    DocumentMetadata,
    ReaderPage,
    TranslatedPage,
    PageTranslationResult,
    pageCacheKey,
} from './application/PdfReaderSession';

export { ProxyMap, TransportOptions } from './infrastructure/http/VendorHttpClient';
export { tencentSignature, baiduSignature, canonicalQueryString } from './infrastructure/signing/RequestSigner';
export { DocumentReader } from './infrastructure/documents/DocumentReader';
export { InMemoryPageCache } from './infrastructure/cache/InMemoryPageCache';
export { FilePageCache } from './infrastructure/cache/FilePageCache';
export {
    singleDetection,
    batchDetection,
    Detection,
    DetectionOptions,
} from './infrastructure/detection/LanguageDetectionClient';

export { BaseTranslatorOptions, LookupOptions } from './infrastructure/translators/TranslatorOptions';
export { TranslatorSupport } from './infrastructure/translators/TranslatorSupport';
export { GoogleTranslator, GoogleTranslatorOptions } from './infrastructure/translators/GoogleTranslator';
export { MyMemoryTranslator, MyMemoryTranslatorOptions } from './infrastructure/translators/MyMemoryTranslator';
export { DeeplTranslator, DeeplTranslatorOptions } from './infrastructure/translators/DeeplTranslator';
export {
    MicrosoftTranslator,
    MicrosoftTranslatorOptions,
    MicrosoftTranslation,
} from './infrastructure/translators/MicrosoftTranslator';
export { YandexTranslator, YandexTranslatorOptions } from './infrastructure/translators/YandexTranslator';
export { LingueeTranslator, LingueeTranslatorOptions } from './infrastructure/translators/LingueeTranslator';
export { PonsTranslator, PonsTranslatorOptions } from './infrastructure/translators/PonsTranslator';
export { PapagoTranslator, PapagoTranslatorOptions } from './infrastructure/translators/PapagoTranslator';
export { LibreTranslator, LibreTranslatorOptions } from './infrastructure/translators/LibreTranslator';
export { TencentTranslator, TencentTranslatorOptions } from './infrastructure/translators/TencentTranslator';
export { BaiduTranslator, BaiduTranslatorOptions } from './infrastructure/translators/BaiduTranslator';
export { QcriTranslator, QcriTranslatorOptions } from './infrastructure/translators/QcriTranslator';
export { ChatGptTranslator, ChatGptTranslatorOptions } from './infrastructure/translators/ChatGptTranslator';
export {
    OpenAICompatibleTranslator,
    OpenAICompatibleTranslatorOptions,
} from './infrastructure/translators/OpenAICompatibleTranslator';
