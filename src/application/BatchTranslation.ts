/**
 * Sequential batch helper used by every translator.
 *
 * One request in flight at a time, strictly in input order. The first
 * failure rejects the whole batch; there is no partial result.
 */
export async function translateSequentially<T>(
    texts: readonly string[],
    translateOne: (text: string) => Promise<T>
): Promise<T[]> {
    const results: T[] = [];
    for (const text of texts) {
        results.push(await translateOne(text));
    }
    return results;
}
