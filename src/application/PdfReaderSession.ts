/**
 * PDF Reader Session
 *
 * Headless state behind the side-by-side reader: which document is open,
 * which window of pages is visible, and a per-page translation cache so that
 * paging back and forth never re-translates a page.
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { ConfigurationError, NotSupportedError } from '../domain/errors/TranslationErrors';
import { IDocumentReader } from '../domain/ports/IDocumentReader';
import { IPageCache } from '../domain/ports/IPageCache';
import { ITranslator } from '../domain/ports/ITranslator';
import { InMemoryPageCache } from '../infrastructure/cache/InMemoryPageCache';
import { DocumentReader } from '../infrastructure/documents/DocumentReader';
import { translateLongText } from './FileTranslationService';

export const MIN_PAGES_PER_LOAD = 1;
export const MAX_PAGES_PER_LOAD = 5;
export const DEFAULT_PAGES_PER_LOAD = 2;

export interface DocumentMetadata {
    title?: string;
    author?: string;
    pageCount?: number;
}

export interface ReaderPage {
    /** 0-based page index. */
    page: number;
    text: string;
}

export interface TranslatedPage extends ReaderPage {
    cached: boolean;
}

export interface PageTranslationResult {
    pages: TranslatedPage[];
    cacheHits: number;
}

export interface PdfReaderSessionOptions {
    cache?: IPageCache;
    pagesPerLoad?: number;
}

type PageTranslator = ITranslator<unknown>;

function shortHash(value: string): string {
    return crypto.createHash('md5').update(value, 'utf8').digest('hex').substring(0, 8);
}

/**
 * <doc hash>_<content hash>_page<n>_<translator>_<target>
 *
 * The document hash covers title, author and page count, so two files with
 * the same metadata share entries only when the page text matches too.
 */
export function pageCacheKey(
    metadata: DocumentMetadata,
    page: number,
    translatorName: string,
    target: string,
    text: string
): string {
    const documentId = `${metadata.title ?? ''}_${metadata.author ?? ''}_${metadata.pageCount ?? ''}`;
    return `${shortHash(documentId)}_${shortHash(text)}_page${page}_${translatorName}_${target}`;
}

export class PdfReaderSession {
    private readonly cache: IPageCache;
    private perLoad: number;
    private name: string | null = null;
    private metadata: DocumentMetadata = {};
    private pages: string[] = [];
    private current = 0;
    private translatedAll = false;

    constructor(options: PdfReaderSessionOptions = {}) {
        this.cache = options.cache ?? new InMemoryPageCache();
        this.perLoad = PdfReaderSession.validatePagesPerLoad(options.pagesPerLoad ?? DEFAULT_PAGES_PER_LOAD);
    }

    get documentName(): string | null {
        return this.name;
    }

    get pageCount(): number {
        return this.pages.length;
    }

    get currentPage(): number {
        return this.current;
    }

    get pagesPerLoad(): number {
        return this.perLoad;
    }

    set pagesPerLoad(value: number) {
        this.perLoad = PdfReaderSession.validatePagesPerLoad(value);
    }

    get allTranslated(): boolean {
        return this.translatedAll;
    }

    /**
     * Loads page texts. Opening a different document resets the position;
     * re-opening the same one keeps it.
     */
    open(name: string, pages: string[], metadata: DocumentMetadata = {}): void {
        if (name !== this.name) {
            this.current = 0;
            this.translatedAll = false;
        }
        this.name = name;
        this.pages = [...pages];
        this.metadata = { ...metadata, pageCount: metadata.pageCount ?? pages.length };
        if (this.current >= this.pages.length) {
            this.current = 0;
        }
    }

    /**
     * Extracts the pages of a PDF and opens them under the file's base name.
     */
    async openFile(filePath: string, reader: IDocumentReader = new DocumentReader()): Promise<void> {
        const document = await reader.read(filePath);
        if (document.format !== 'pdf') {
            throw new NotSupportedError(`The reader opens PDF files only, got ${path.basename(filePath)}`);
        }
        this.open(path.basename(filePath), document.units, { title: document.title, author: document.author });
    }

    visiblePages(): ReaderPage[] {
        const end = Math.min(this.current + this.perLoad, this.pages.length);
        const visible: ReaderPage[] = [];
        for (let page = this.current; page < end; page++) {
            visible.push({ page, text: this.pages[page] });
        }
        return visible;
    }

    canGoPrevious(): boolean {
        return this.current > 0;
    }

    canGoNext(): boolean {
        return this.current + this.perLoad < this.pages.length;
    }

    /**
     * @returns the new first visible page
     */
    nextPages(): number {
        if (this.canGoNext()) {
            this.current = Math.min(this.pages.length - 1, this.current + this.perLoad);
        }
        return this.current;
    }

    previousPages(): number {
        this.current = Math.max(0, this.current - this.perLoad);
        return this.current;
    }

    async translateVisible(translator: PageTranslator): Promise<PageTranslationResult> {
        return this.translatePages(this.visiblePages(), translator);
    }

    /**
     * Translates every page and optionally writes them, blank-line separated, to outputPath.
     */
    async translateAll(translator: PageTranslator, outputPath?: string): Promise<PageTranslationResult> {
        const all = this.pages.map((text, page) => ({ page, text }));
        const result = await this.translatePages(all, translator);

        if (outputPath) {
            await fs.writeFile(outputPath, result.pages.map(page => page.text).join('\n\n'), 'utf-8');
            console.log(`[PdfReader] Wrote ${result.pages.length} translated pages to ${outputPath}`);
        }
        this.translatedAll = true;
        return result;
    }

    private async translatePages(pages: ReaderPage[], translator: PageTranslator): Promise<PageTranslationResult> {
        this.assertOpen();
        const translated: TranslatedPage[] = [];
        let cacheHits = 0;

        for (const { page, text } of pages) {
            const key = pageCacheKey(this.metadata, page, translator.name, translator.target, text);
            const cached = await this.cache.get(key);
            if (cached !== null) {
                console.log(`[PdfReader] Cache hit for page ${page + 1}`);
                cacheHits++;
                translated.push({ page, text: cached, cached: true });
                continue;
            }

            console.log(`[PdfReader] Translating page ${page + 1} with ${translator.name}`);
            const output = await translateLongText(text, translator.maxChars, chunk => this.translateText(translator, chunk));
            await this.cache.set(key, output);
            translated.push({ page, text: output, cached: false });
        }

        return { pages: translated, cacheHits };
    }

    private async translateText(translator: PageTranslator, text: string): Promise<string> {
        const output = await translator.translate(text);
        if (typeof output !== 'string') {
            throw new NotSupportedError('Page translation needs a single target language');
        }
        return output;
    }

    private assertOpen(): void {
        if (this.name === null) {
            throw new ConfigurationError('No document is open', 'NO_DOCUMENT');
        }
    }

    private static validatePagesPerLoad(value: number): number {
        if (!Number.isInteger(value) || value < MIN_PAGES_PER_LOAD || value > MAX_PAGES_PER_LOAD) {
            throw new ConfigurationError(
                `pagesPerLoad must be an integer between ${MIN_PAGES_PER_LOAD} and ${MAX_PAGES_PER_LOAD}, got ${value}`
            );
        }
        return value;
    }
}
