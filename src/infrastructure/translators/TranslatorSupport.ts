import { translateSequentially } from '../../application/BatchTranslation';
import { TranslateText, translateDocument } from '../../application/FileTranslationService';
import { IDocumentReader } from '../../domain/ports/IDocumentReader';
import { supportedLanguages } from '../../domain/services/LanguageRegistry';
import { LanguageSelection } from '../../domain/services/LanguageSelection';

/**
 * Batch, file and language-listing plumbing shared by every adapter.
 * Adapters hold one and delegate to it; only translate() is vendor-specific.
 */
export class TranslatorSupport {
    constructor(
        private readonly selection: LanguageSelection,
        private readonly maxChars: number,
        private readonly documentReader?: IDocumentReader
    ) {}

    batch<TOutput>(texts: string[], translateOne: (text: string) => Promise<TOutput>): Promise<TOutput[]> {
        return translateSequentially(texts, translateOne);
    }

    file(path: string, translateOne: TranslateText): Promise<string> {
        return translateDocument(path, this.maxChars, translateOne, this.documentReader);
    }

    languages(asDict: boolean): string[] | Record<string, string> {
        return supportedLanguages(this.selection.table, asDict);
    }
}
