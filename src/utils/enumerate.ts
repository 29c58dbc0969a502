/**
 * Shared enumeration utilities.
 * Used by: truth tables, session evaluation.
 */

/**
 * Generate all mappings from keys to domain values.
 * The first key varies slowest, the last key fastest.
 * Note: Yields a new Map for each mapping to ensure immutability.
 */
export function* allMappings<K, V>(
    keys: readonly K[],
    domain: readonly V[]
): Generator<Map<K, V>> {
    if (keys.length === 0) {
        yield new Map();
        return;
    }

    function* generate(index: number, currentMap: Map<K, V>): Generator<Map<K, V>> {
        if (index === keys.length) {
            yield new Map(currentMap);
            return;
        }

        const key = keys[index];
        for (const value of domain) {
            currentMap.set(key, value);
            yield* generate(index + 1, currentMap);
        }
        currentMap.delete(key);
    }

    yield* generate(0, new Map());
}

/**
 * All 2^n truth assignments over `atoms`, counting in binary with the last
 * atom as the least-significant bit (all-false first, all-true last).
 */
export function allAssignments(atoms: readonly string[]): Generator<Map<string, boolean>> {
    return allMappings(atoms, [false, true]);
}

/**
 * Remove duplicates, keeping the first occurrence of each value.
 */
export function uniqueInOrder<T>(values: Iterable<T>): T[] {
    return [...new Set(values)];
}
