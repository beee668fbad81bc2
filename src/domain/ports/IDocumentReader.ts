export type DocumentFormat = 'txt' | 'docx' | 'pdf';

/**
 * Translatable units of a file, in reading order.
 */
export interface ExtractedDocument {
    format: DocumentFormat;
    /** Lines (txt), paragraphs (docx) or pages (pdf). */
    units: string[];
    /** Joins the units back into the original layout. */
    separator: string;
    /** Document properties, where the format carries them (pdf). */
    title?: string;
    author?: string;
}

export interface IDocumentReader {
    read(path: string): Promise<ExtractedDocument>;
}
