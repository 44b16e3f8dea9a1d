/**
 * Batch review across stories with a bounded worker pool.
 *
 * Each story is reviewed independently; a story that fails becomes an error
 * record in its original position and never stops the others.
 */

import { mapSettled } from '@/lib/utils/concurrency';
import { describeError } from '@/lib/utils/errors';
import { generateId } from '@/lib/utils/ids';
import { reviewEvents } from './events';
import type { ReviewEvents, ReviewRun, StoryReviewRecord } from './types';

export interface ReviewAllOptions {
    concurrency: number;
}

// A failing listener must not change the outcome recorded for the story
function emitProgress(payload: ReviewEvents['story-reviewed']): void {
    try {
        reviewEvents.emit('story-reviewed', payload);
    } catch (error) {
        console.error(`[ReviewRunner] Progress listener failed for story ${payload.storyId}: ${describeError(error)}`);
    }
}

export async function reviewAll<R>(
    kind: string,
    storyIds: readonly string[],
    reviewOne: (storyId: string) => Promise<R>,
    options: ReviewAllOptions
): Promise<ReviewRun<R>> {
    const runId = generateId();
    const startedAt = new Date();
    const total = storyIds.length;
    let completed = 0;

    console.log(`[ReviewRunner] ${kind}: reviewing ${total} stories (run ${runId})`);

    const settled = await mapSettled(storyIds, options.concurrency, async (storyId) => {
        let succeeded = false;
        try {
            const report = await reviewOne(storyId);
            succeeded = true;
            return report;
        } finally {
            completed++;
            emitProgress({ runId, kind, storyId, ok: succeeded, completed, total });
        }
    });

    const records = storyIds.map((storyId, i): StoryReviewRecord<R> => {
        const outcome = settled[i];
        if (outcome.ok) {
            return { storyId, ok: true, report: outcome.value };
        }
        console.error(`[ReviewRunner] Error reviewing story ${storyId}: ${outcome.error}`);
        return { storyId, ok: false, error: outcome.error };
    });

    const failed = records.filter(r => !r.ok).length;
    console.log(`[ReviewRunner] ${kind}: ${total - failed}/${total} stories reviewed`);

    return { runId, kind, startedAt, finishedAt: new Date(), records };
}
