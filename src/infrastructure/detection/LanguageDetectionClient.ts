/**
 * detectlanguage.com client.
 */

import { ENV_VARS, resolveCredential } from '../../config';
import { ConfigurationError, ResponseParsingError } from '../../domain/errors/TranslationErrors';
import { isRecord, readArray, readRecord } from '../http/ResponseShape';
import { TransportOptions, VendorHttpClient } from '../http/VendorHttpClient';

const DETECT_URL = 'https://ws.detectlanguage.com/0.2/detect';

export interface DetectionOptions extends TransportOptions {
    /** Falls back to DETECT_LANGUAGE_API_KEY. */
    apiKey?: string;
    /** Return the full record instead of the bare language code. */
    detailed?: boolean;
}

export interface Detection {
    language: string;
    confidence: number;
    isReliable: boolean;
}

function toDetection(value: unknown, body: unknown): Detection {
    if (!isRecord(value) || typeof value.language !== 'string') {
        throw new ResponseParsingError('DetectLanguage', 'detection without a language', body);
    }
    return {
        language: value.language,
        confidence: typeof value.confidence === 'number' ? value.confidence : 0,
        isReliable: value.isReliable === true,
    };
}

async function detect(q: string | string[], options: DetectionOptions): Promise<unknown[]> {
    const apiKey = resolveCredential(options.apiKey, ENV_VARS.DETECT_LANGUAGE_API_KEY, 'detectlanguage.com API key');
    const http = new VendorHttpClient('DetectLanguage', options);

    const body = await http.request<unknown>({
        method: 'POST',
        url: DETECT_URL,
        data: { q },
        headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
        },
    });

    const detections = readArray(readRecord(body, 'data'), 'detections');
    if (!detections) {
        throw new ResponseParsingError('DetectLanguage', 'no data.detections in response', body);
    }
    return detections;
}

/**
 * Detects the language of one text.
 */
export function singleDetection(text: string, options: DetectionOptions & { detailed: true }): Promise<Detection>;
export function singleDetection(text: string, options?: DetectionOptions): Promise<string>;
export async function singleDetection(text: string, options: DetectionOptions = {}): Promise<string | Detection> {
    if (text.trim().length === 0) {
        throw new ConfigurationError('Cannot detect the language of empty text', 'EMPTY_TEXT');
    }
    const detections = await detect(text, options);
    const best = toDetection(detections[0], detections);
    return options.detailed ? best : best.language;
}

/**
 * Detects the language of every text with a single request; results keep input order.
 */
export function batchDetection(texts: string[], options: DetectionOptions & { detailed: true }): Promise<Detection[]>;
export function batchDetection(texts: string[], options?: DetectionOptions): Promise<string[]>;
export async function batchDetection(texts: string[], options: DetectionOptions = {}): Promise<string[] | Detection[]> {
    if (texts.length === 0) {
        return [];
    }
    const detections = await detect(texts, options);
    if (detections.length !== texts.length) {
        throw new ResponseParsingError(
            'DetectLanguage',
            `expected ${texts.length} detection lists, got ${detections.length}`,
            detections
        );
    }

    const best = detections.map(candidates => toDetection(Array.isArray(candidates) ? candidates[0] : undefined, detections));
    return options.detailed ? best : best.map(detection => detection.language);
}
