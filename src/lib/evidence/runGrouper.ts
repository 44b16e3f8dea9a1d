import type { Run } from './types';

/**
 * Partition an ascending id list into maximal runs of consecutive integers.
 *
 * Example: [1, 2, 3, 5, 6, 10] → [[1, 2, 3], [5, 6], [10]]
 */
export function groupRuns(sortedIds: readonly number[]): Run[] {
    if (sortedIds.length === 0) return [];

    const runs: Run[] = [];
    let current: number[] = [sortedIds[0]];

    for (let i = 1; i < sortedIds.length; i++) {
        const id = sortedIds[i];
        if (id === current[current.length - 1] + 1) {
            current.push(id);
        } else {
            runs.push(current);
            current = [id];
        }
    }

    runs.push(current);
    return runs;
}
