/**
 * In-Memory Page Cache
 *
 * Process-local cache for reader sessions and tests.
 * Supports TTL with expiration on read.
 */

import { IPageCache } from '../../domain/ports/IPageCache';

interface CacheEntry {
    value: string;
    expiresAt: number | null; // null = no expiry
}

export class InMemoryPageCache implements IPageCache {
    private cache: Map<string, CacheEntry> = new Map();

    async get(key: string): Promise<string | null> {
        const entry = this.cache.get(key);

        if (!entry) {
            return null;
        }

        if (entry.expiresAt !== null && Date.now() > entry.expiresAt) {
            this.cache.delete(key);
            return null;
        }

        return entry.value;
    }

    async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
        const expiresAt = ttlSeconds ? Date.now() + (ttlSeconds * 1000) : null;
        this.cache.set(key, { value, expiresAt });
    }

    async has(key: string): Promise<boolean> {
        const value = await this.get(key);
        return value !== null;
    }

    async delete(key: string): Promise<void> {
        this.cache.delete(key);
    }

    async clear(): Promise<void> {
        this.cache.clear();
    }

    size(): number {
        return this.cache.size;
    }
}
