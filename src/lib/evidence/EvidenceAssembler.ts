import { getSentenceIndexer, type SentenceIndexer } from '@/lib/sentences';
import type { Run } from './types';

/**
 * Quote a run back out of the tagged document.
 *
 * Ids that do not resolve are skipped; an empty string means the run has no
 * evidence and must not produce an entry.
 */
export function resolveRun(
    tagged: string,
    run: Run,
    indexer: SentenceIndexer = getSentenceIndexer()
): string {
    const parts: string[] = [];

    for (const id of run) {
        const sentence = indexer.extractOne(tagged, id);
        if (sentence) parts.push(sentence);
    }

    return parts.join(' ');
}
