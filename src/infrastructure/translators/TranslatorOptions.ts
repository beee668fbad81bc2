import { IDocumentReader } from '../../domain/ports/IDocumentReader';
import { TransportOptions } from '../http/VendorHttpClient';

/**
 * Options every translator accepts. Backend-specific interfaces extend this
 * with the parameters their vendor recognises; nothing else is forwarded.
 */
export interface BaseTranslatorOptions extends TransportOptions {
    /** Language name or code; "auto" where the vendor detects it. */
    source?: string;
    /** Language name or code. */
    target?: string;
    /** Overrides the .txt/.docx/.pdf reader used by translateFile(). */
    documentReader?: IDocumentReader;
}

/**
 * Dictionary lookups may return every candidate instead of the best match.
 */
export interface LookupOptions {
    returnAll?: boolean;
}

export const BASE_OPTION_KEYS = ['source', 'target', 'documentReader', 'proxies', 'timeoutMs'] as const;
