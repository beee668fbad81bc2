/**
 * Splits text that exceeds a vendor's per-request limit.
 *
 * Splits on line breaks first, then spaces, and hard-cuts only when a single
 * word is still too long. Each chunk remembers the delimiter that followed it
 * so the translated pieces can be re-joined in the same layout.
 */

const DELIMITERS = ['\n', ' '];

export interface TextChunk {
    text: string;
    /** Delimiter that followed this chunk in the source ('' for the last one). */
    joiner: string;
}

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}

export function splitIntoChunks(text: string, maxChars: number, level: number = 0): TextChunk[] {
    if (text.length <= maxChars) {
        return [{ text, joiner: '' }];
    }

    const delimiter = DELIMITERS[level];
    if (delimiter === undefined) {
        const pieces: TextChunk[] = [];
        let offset = 0;
        while (offset < text.length) {
            let end = Math.min(offset + maxChars, text.length);
            // never separate the halves of a surrogate pair
            if (end < text.length && end - offset > 1 && isHighSurrogate(text.charCodeAt(end - 1))) {
                end--;
            }
            pieces.push({ text: text.slice(offset, end), joiner: '' });
            offset = end;
        }
        return pieces;
    }

    const chunks: TextChunk[] = [];
    let current: string | null = null;

    for (const part of text.split(delimiter)) {
        if (part.length > maxChars) {
            if (current !== null) {
                chunks.push({ text: current, joiner: delimiter });
                current = null;
            }
            const nested = splitIntoChunks(part, maxChars, level + 1);
            nested[nested.length - 1].joiner = delimiter;
            chunks.push(...nested);
        } else if (current === null) {
            current = part;
        } else if (current.length + delimiter.length + part.length <= maxChars) {
            current += delimiter + part;
        } else {
            chunks.push({ text: current, joiner: delimiter });
            current = part;
        }
    }

    if (current !== null) {
        chunks.push({ text: current, joiner: '' });
    } else {
        chunks[chunks.length - 1].joiner = '';
    }

    return chunks;
}

export function joinChunks(chunks: readonly TextChunk[], translated: readonly string[]): string {
    return chunks.map((chunk, index) => translated[index] + chunk.joiner).join('');
}
