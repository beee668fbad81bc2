import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { extractRawText } from 'mammoth';
import pdf from 'pdf-parse';
import { ConfigurationError, NotSupportedError } from '../../../../src/domain/errors/TranslationErrors';
import { DocumentReader, PdfTextItem, renderPdfPage } from '../../../../src/infrastructure/documents/DocumentReader';

jest.mock('mammoth', () => ({ extractRawText: jest.fn() }));
jest.mock('pdf-parse', () => jest.fn());

const mockExtractRawText = jest.mocked(extractRawText);
const mockPdf = jest.mocked(pdf);

describe('DocumentReader', () => {
    let dir: string;
    const reader = new DocumentReader();

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reader-'));
        jest.clearAllMocks();
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('splits text files into lines', async () => {
        const file = path.join(dir, 'notes.txt');
        await fs.writeFile(file, 'one\ntwo\n\nthree');

        await expect(reader.read(file)).resolves.toEqual({
            format: 'txt',
            units: ['one', 'two', '', 'three'],
            separator: '\n',
        });
    });

    it('keeps CRLF line endings', async () => {
        const file = path.join(dir, 'windows.txt');
        await fs.writeFile(file, 'one\r\ntwo');

        const document = await reader.read(file);
        expect(document.units).toEqual(['one', 'two']);
        expect(document.separator).toBe('\r\n');
    });

    it('splits docx raw text into paragraphs', async () => {
        const file = path.join(dir, 'report.docx');
        await fs.writeFile(file, 'placeholder');
        mockExtractRawText.mockResolvedValue({ value: 'First.\n\nSecond.\n\nThird.\n\n', messages: [] });

        const document = await reader.read(file);

        expect(mockExtractRawText).toHaveBeenCalledWith({ path: file });
        expect(document).toEqual({ format: 'docx', units: ['First.', 'Second.', 'Third.'], separator: '\n\n' });
    });

    /**
     * pdf-parse calls the page renderer once per page, in order, and joins the
     * results with blank lines.
     */
    function stubPdf(pageItems: PdfTextItem[][], numpages: number = pageItems.length): void {
        mockPdf.mockImplementation(async (_buffer, options) => {
            const render = options?.pagerender;
            if (!render) {
                throw new Error('expected a page renderer');
            }
            let text = '';
            for (const items of pageItems) {
                const pageText = await render({ getTextContent: async () => ({ items }) });
                text += `\n\n${pageText}`;
            }
            return {
                numpages,
                numrender: numpages,
                info: { Title: 'A Book', Author: 'Someone' },
                metadata: null,
                version: 'default',
                text,
            };
        });
    }

    const line = (str: string, y: number): PdfTextItem => ({ str, transform: [1, 0, 0, 1, 0, y] });

    it('returns one unit per pdf page and keeps the document info', async () => {
        const file = path.join(dir, 'book.pdf');
        await fs.writeFile(file, 'placeholder');
        stubPdf([[line('Page one', 700), line(' text', 700)], [line('Page two text', 700)]]);

        await expect(reader.read(file)).resolves.toEqual({
            format: 'pdf',
            units: ['Page one text', 'Page two text'],
            separator: '\n\n',
            title: 'A Book',
            author: 'Someone',
        });
    });

    it('keeps blank lines inside a pdf page on that page', async () => {
        const file = path.join(dir, 'spaced.pdf');
        await fs.writeFile(file, 'placeholder');
        stubPdf([[line('Alpha', 700), line('', 680), line('Beta', 660)], [line('Gamma', 700)]]);

        const document = await reader.read(file);

        expect(document.units).toEqual(['Alpha\n\nBeta', 'Gamma']);
    });

    it('fails when fewer pages were rendered than the pdf reports', async () => {
        const file = path.join(dir, 'broken.pdf');
        await fs.writeFile(file, 'placeholder');
        stubPdf([[line('Only page', 700)]], 2);

        await expect(reader.read(file)).rejects.toMatchObject({
            code: 'RESPONSE_PARSING_ERROR',
            message: 'Could not parse pdf-parse response: extracted 1 of 2 pages from broken.pdf',
        });
    });

    it('renders items on one baseline as one line', async () => {
        await expect(renderPdfPage({
            getTextContent: async () => ({ items: [line('a', 10), line('b', 10), line('c', 5)] }),
        })).resolves.toBe('ab\nc');
    });

    it('rejects unsupported extensions', async () => {
        await expect(reader.read(path.join(dir, 'slides.pptx'))).rejects.toThrow(NotSupportedError);
    });

    it('reports missing files as a configuration problem', async () => {
        await expect(reader.read(path.join(dir, 'missing.txt'))).rejects.toMatchObject({
            code: 'FILE_NOT_FOUND',
        });
        await expect(reader.read(path.join(dir, 'missing.txt'))).rejects.toBeInstanceOf(ConfigurationError);
    });
});
