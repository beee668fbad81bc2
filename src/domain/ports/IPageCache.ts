/**
 * Page Cache Port
 *
 * Stores translated page text by cache key.
 * Implementations: in-memory, on-disk.
 */

export interface IPageCache {
    /**
     * @returns The cached translation or null if not found/expired
     */
    get(key: string): Promise<string | null>;

    /**
     * @param ttlSeconds - Optional TTL in seconds (default: no expiry)
     */
    set(key: string, value: string, ttlSeconds?: number): Promise<void>;

    has(key: string): Promise<boolean>;

    delete(key: string): Promise<void>;

    clear(): Promise<void>;
}
