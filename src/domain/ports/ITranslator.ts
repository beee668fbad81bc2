/**
 * Translator Port Interface
 *
 * The capability set every backend adapter implements. Adapters share no
 * behaviour beyond this shape; the batch and file helpers in the
 * application layer are composed in rather than inherited.
 */

import { TranslatorName } from '../entities/Language';

export interface ITranslator<TOutput = string> {
    /** Backend identifier, also the key of its language table. */
    readonly name: TranslatorName;

    /** Longest payload, in characters, the vendor accepts per request. */
    readonly maxChars: number;

    /** Resolved source code ("auto" when the vendor detects it). Reassignable. */
    source: string;

    /** Resolved target code. Reassignable. */
    target: string;

    /**
     * Sends exactly one request for the given text.
     * Blank text is returned unchanged without a request.
     */
    translate(text: string): Promise<TOutput>;

    /**
     * Translates each text in order, one request at a time.
     * The first failure rejects the whole batch.
     */
    translateBatch(texts: string[]): Promise<TOutput[]>;

    /**
     * Extracts the units of a .txt, .docx or .pdf file, translates them in
     * order and re-joins them with the original separators.
     */
    translateFile(path: string): Promise<string>;

    getSupportedLanguages(): string[];
    getSupportedLanguages(asDict: true): Record<string, string>;
}
