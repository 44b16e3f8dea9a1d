/**
 * Turns a classifier's raw sentence reference into a sorted id list.
 * Accepts a single integer or an array of integers; every other shape
 * (missing, string, object, array holding a non-integer) becomes [].
 * Duplicates are kept; see uniqueSorted.
 */
export function normalizeSpan(raw: unknown): number[] {
    if (typeof raw === 'number') {
        return Number.isInteger(raw) ? [raw] : [];
    }

    if (Array.isArray(raw)) {
        const ids: number[] = [];
        for (const value of raw) {
            if (typeof value !== 'number' || !Number.isInteger(value)) return [];
            ids.push(value);
        }
        return ids.sort((a, b) => a - b);
    }

    return [];
}

/**
 * Drops repeated values from an ascending list
 */
export function uniqueSorted(ids: readonly number[]): number[] {
    const out: number[] = [];
    for (const id of ids) {
        if (out.length === 0 || out[out.length - 1] !== id) out.push(id);
    }
    return out;
}
