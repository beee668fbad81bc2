/**
 * On-disk page cache: one UTF-8 file per key under the cache directory.
 * Entries never expire; ttlSeconds is not supported here.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ConfigurationError } from '../../domain/errors/TranslationErrors';
import { IPageCache } from '../../domain/ports/IPageCache';

export const DEFAULT_CACHE_DIR = '.cached';

const SAFE_KEY = /^[A-Za-z0-9._-]+$/;

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FilePageCache implements IPageCache {
    constructor(private readonly directory: string = DEFAULT_CACHE_DIR) {}

    async get(key: string): Promise<string | null> {
        try {
            return await fs.readFile(this.pathFor(key), 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw error;
        }
    }

    async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
        if (ttlSeconds) {
            throw new ConfigurationError('FilePageCache entries cannot expire; omit ttlSeconds');
        }
        await fs.mkdir(this.directory, { recursive: true });
        await fs.writeFile(this.pathFor(key), value, 'utf-8');
    }

    async has(key: string): Promise<boolean> {
        return (await this.get(key)) !== null;
    }

    async delete(key: string): Promise<void> {
        await fs.rm(this.pathFor(key), { force: true });
    }

    async clear(): Promise<void> {
        await fs.rm(this.directory, { recursive: true, force: true });
    }

    private pathFor(key: string): string {
        if (!SAFE_KEY.test(key)) {
            throw new ConfigurationError(`Invalid cache key: ${key}`);
        }
        return path.join(this.directory, `${key}.txt`);
    }
}
