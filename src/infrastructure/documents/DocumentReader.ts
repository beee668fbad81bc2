import { promises as fs } from 'fs';
import path from 'path';
import { extractRawText } from 'mammoth';
import pdf from 'pdf-parse';
import { DocumentFormat, ExtractedDocument, IDocumentReader } from '../../domain/ports/IDocumentReader';
import { ConfigurationError, NotSupportedError, ResponseParsingError } from '../../domain/errors/TranslationErrors';
import { readString } from '../http/ResponseShape';

const PARAGRAPH_BREAK = '\n\n';

export interface PdfTextItem {
    str: string;
    transform: number[];
}

/** The slice of pdf.js's page proxy that page rendering reads. */
export interface PdfPageData {
    getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<{
        items: PdfTextItem[];
    }>;
}

/**
 * Same layout as pdf-parse's own renderer: items on one baseline are
 * concatenated, a new baseline starts a new line.
 */
export async function renderPdfPage(pageData: PdfPageData): Promise<string> {
    const content = await pageData.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false });
    let text = '';
    let lastY: number | undefined;
    for (const item of content.items) {
        const y = item.transform[5];
        text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
        lastY = y;
    }
    return text;
}

/**
 * Extracts translatable units from .txt, .docx and .pdf files.
 *
 * - txt: one unit per line, CRLF preserved
 * - docx: one unit per paragraph (mammoth raw text)
 * - pdf: one unit per page (pdf-parse)
 */
export class DocumentReader implements IDocumentReader {
    async read(filePath: string): Promise<ExtractedDocument> {
        const format = this.detectFormat(filePath);
        await this.assertReadable(filePath);

        switch (format) {
            case 'txt':
                return this.readText(filePath);
            case 'docx':
                return this.readDocx(filePath);
            case 'pdf':
                return this.readPdf(filePath);
        }
    }

    private detectFormat(filePath: string): DocumentFormat {
        const extension = path.extname(filePath).toLowerCase();
        switch (extension) {
            case '.txt':
                return 'txt';
            case '.docx':
                return 'docx';
            case '.pdf':
                return 'pdf';
            default:
                throw new NotSupportedError(
                    `Unsupported file type "${extension || filePath}". Supported: .txt, .docx, .pdf`
                );
        }
    }

    private async assertReadable(filePath: string): Promise<void> {
        try {
            await fs.access(filePath);
        } catch {
            throw new ConfigurationError(`File not found: ${filePath}`, 'FILE_NOT_FOUND');
        }
    }

    private async readText(filePath: string): Promise<ExtractedDocument> {
        const content = await fs.readFile(filePath, 'utf-8');
        const separator = content.includes('\r\n') ? '\r\n' : '\n';
        return { format: 'txt', units: content.split(separator), separator };
    }

    private async readDocx(filePath: string): Promise<ExtractedDocument> {
        const result = await extractRawText({ path: filePath });
        // mammoth terminates every paragraph with a blank line
        const text = result.value.replace(/\n+$/, '');
        return { format: 'docx', units: text.split(PARAGRAPH_BREAK), separator: PARAGRAPH_BREAK };
    }

    private async readPdf(filePath: string): Promise<ExtractedDocument> {
        const buffer = await fs.readFile(filePath);
        const pages: string[] = [];
        const result = await pdf(buffer, {
            pagerender: async (pageData: PdfPageData) => {
                const text = await renderPdfPage(pageData);
                pages.push(text);
                return text;
            },
        });

        if (pages.length !== result.numpages) {
            throw new ResponseParsingError(
                'pdf-parse',
                `extracted ${pages.length} of ${result.numpages} pages from ${path.basename(filePath)}`,
                result.numpages
            );
        }

        const info: unknown = result.info;
        return {
            format: 'pdf',
            units: pages,
            separator: PARAGRAPH_BREAK,
            title: readString(info, 'Title'),
            author: readString(info, 'Author'),
        };
    }
}
