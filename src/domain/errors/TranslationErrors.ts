/**
 * Error taxonomy shared by every translator backend.
 *
 * Configuration problems are raised before any network I/O. Transport and
 * vendor failures are NetworkErrors; a 2xx body that cannot be interpreted is
 * a ResponseParsingError.
 */
export class TranslationError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly payload?: unknown
    ) {
        super(message);
        this.name = 'TranslationError';
    }
}

/**
 * Invalid language, credential or argument (raised before any request).
 */
export class ConfigurationError extends TranslationError {
    constructor(message: string, code: string = 'CONFIGURATION_ERROR') {
        super(message, code);
        this.name = 'ConfigurationError';
    }
}

export class LanguageNotSupportedError extends ConfigurationError {
    constructor(
        public readonly language: string,
        public readonly backend: string
    ) {
        super(
            `"${language}" is not supported by the ${backend} translator. ` +
            `Call getSupportedLanguages() or run "translator-hub languages -trans ${backend}" to see the supported set.`,
            'LANGUAGE_NOT_SUPPORTED'
        );
        this.name = 'LanguageNotSupportedError';
    }
}

export class SameSourceTargetError extends ConfigurationError {
    constructor(language: string) {
        super(`Source and target language are both "${language}"`, 'SAME_SOURCE_TARGET');
        this.name = 'SameSourceTargetError';
    }
}

export class MissingCredentialError extends ConfigurationError {
    constructor(
        public readonly credential: string,
        public readonly envVar: string
    ) {
        super(
            `Missing ${credential}. Pass it to the constructor or set the ${envVar} environment variable.`,
            'MISSING_CREDENTIAL'
        );
        this.name = 'MissingCredentialError';
    }
}

export class InvalidPayloadError extends ConfigurationError {
    constructor(message: string) {
        super(message, 'INVALID_PAYLOAD');
        this.name = 'InvalidPayloadError';
    }
}

/**
 * Transport failure, timeout or non-2xx status.
 */
export class NetworkError extends TranslationError {
    constructor(
        message: string,
        public readonly statusCode?: number,
        payload?: unknown,
        code: string = 'NETWORK_ERROR'
    ) {
        super(message, code, payload);
        this.name = 'NetworkError';
    }
}

export class AuthorizationError extends NetworkError {
    constructor(backend: string, statusCode: number, payload?: unknown) {
        super(`${backend} rejected the credentials (HTTP ${statusCode})`, statusCode, payload, 'UNAUTHORIZED');
        this.name = 'AuthorizationError';
    }
}

/**
 * The vendor answered with its own error envelope (error_code, Response.Error, ...).
 */
export class VendorApiError extends NetworkError {
    constructor(backend: string, detail: string, payload?: unknown, statusCode?: number) {
        super(`${backend} API error: ${detail}`, statusCode, payload, 'VENDOR_API_ERROR');
        this.name = 'VendorApiError';
    }
}

/**
 * The vendor returned a 2xx body whose shape the adapter does not recognise.
 */
export class ResponseParsingError extends TranslationError {
    constructor(backend: string, detail: string, payload?: unknown) {
        super(`Could not parse ${backend} response: ${detail}`, 'RESPONSE_PARSING_ERROR', payload);
        this.name = 'ResponseParsingError';
    }
}

export class NotSupportedError extends TranslationError {
    constructor(message: string) {
        super(message, 'NOT_SUPPORTED');
        this.name = 'NotSupportedError';
    }
}
