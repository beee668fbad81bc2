import { InvalidPayloadError } from '../errors/TranslationErrors';

/**
 * Checks a payload before it is sent to a vendor.
 *
 * The typeof check guards plain JavaScript callers and CLI input.
 *
 * @returns false when the text is blank and should be returned untouched
 */
export function validatePayload(text: string, maxChars: number, backend: string): boolean {
    if (typeof text !== 'string') {
        throw new InvalidPayloadError(`${backend} expects a string payload, got ${typeof text}`);
    }
    if (text.length > maxChars) {
        throw new InvalidPayloadError(
            `${backend} accepts at most ${maxChars} characters per request, got ${text.length}`
        );
    }
    return text.trim().length > 0;
}

/**
 * Puts the source's leading and trailing whitespace back around a
 * translation from a vendor that trims its input.
 */
export function keepOuterWhitespace(source: string, translated: string): string {
    const leading = /^\s*/.exec(source)?.[0] ?? '';
    const trailing = /\s*$/.exec(source)?.[0] ?? '';
    return `${leading}${translated.trim()}${trailing}`;
}
