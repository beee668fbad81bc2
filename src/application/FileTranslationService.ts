/**
 * File Translation Service
 *
 * Extracts a document's units, translates them one at a time in reading order
 * and re-assembles the result with the original separators. Units longer than
 * the vendor limit are chunked and re-joined transparently.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { IDocumentReader } from '../domain/ports/IDocumentReader';
import { ITranslator } from '../domain/ports/ITranslator';
import { DocumentReader } from '../infrastructure/documents/DocumentReader';
import { translateSequentially } from './BatchTranslation';
import { joinChunks, splitIntoChunks } from './TextChunker';

export type TranslateText = (text: string) => Promise<string>;

const defaultReader = new DocumentReader();

/**
 * Translates text of any length by chunking it under maxChars.
 * Blank text is returned as-is.
 */
export async function translateLongText(text: string, maxChars: number, translateOne: TranslateText): Promise<string> {
    if (text.trim().length === 0) {
        return text;
    }
    const chunks = splitIntoChunks(text, maxChars);
    const translated = await translateSequentially(
        chunks.map(chunk => chunk.text),
        chunk => chunk.trim().length === 0 ? Promise.resolve(chunk) : translateOne(chunk)
    );
    return joinChunks(chunks, translated);
}

/**
 * Reads a .txt/.docx/.pdf file and returns its translation as a string.
 * The unit count and order of the output match the input.
 */
export async function translateDocument(
    filePath: string,
    maxChars: number,
    translateOne: TranslateText,
    reader: IDocumentReader = defaultReader
): Promise<string> {
    const document = await reader.read(filePath);
    const translated = await translateSequentially(
        document.units,
        unit => translateLongText(unit, maxChars, translateOne)
    );
    return translated.join(document.separator);
}

/**
 * <dir>/<name>-<target>.txt next to the input file.
 */
export function defaultOutputPath(inputPath: string, target: string): string {
    const parsed = path.parse(inputPath);
    return path.join(parsed.dir, `${parsed.name}-${target}.txt`);
}

/**
 * Translates a file with the given translator and writes the result beside it.
 *
 * @returns the path that was written
 */
export async function translateFileToPath(
    translator: ITranslator<unknown>,
    inputPath: string,
    outputPath: string = defaultOutputPath(inputPath, translator.target)
): Promise<string> {
    const translated = await translator.translateFile(inputPath);
    await fs.writeFile(outputPath, translated, 'utf-8');
    return outputPath;
}
