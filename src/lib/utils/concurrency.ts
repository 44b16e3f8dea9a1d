import { describeError } from './errors';
import { err, ok, type Result } from './result';

/**
 * Runs `task` over every item with at most `limit` tasks in flight and waits
 * for all of them. Rejections are captured per item, so one failing task never
 * cancels its siblings. Results keep the input order.
 */
export async function mapSettled<T, R>(
    items: readonly T[],
    limit: number,
    task: (item: T, index: number) => Promise<R>
): Promise<Array<Result<R>>> {
    const results = new Array<Result<R>>(items.length);
    const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
    let cursor = 0;

    const worker = async (): Promise<void> => {
        while (cursor < items.length) {
            const index = cursor++;
            try {
                results[index] = ok(await task(items[index], index));
            } catch (error) {
                results[index] = err(describeError(error));
            }
        }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
}
