/**
 * AnnotationAggregator - merges per-category findings into one document view
 *
 * Pipeline per candidate: normalizeSpan → (uniqueSorted) → groupRuns →
 * resolveRun. Across categories: concatenate in a fixed category order, then
 * stable-sort by the first id of each run. The coverage index explodes every
 * merged entry over the ids of its run, keeping merged order.
 *
 * Everything here is pure. Failed category passes arrive as Result failures
 * and contribute nothing.
 */

import { getSentenceIndexer, type SentenceIndexer } from '@/lib/sentences';
import type { Result } from '@/lib/utils/result';
import { resolveRun } from './EvidenceAssembler';
import { groupRuns } from './runGrouper';
import { normalizeSpan, uniqueSorted } from './spanNormalizer';
import type {
    Annotation,
    AnnotationCandidate,
    CategoryContribution,
    CoverageIndex,
    EvidenceEntry,
    MergedResult,
} from './types';

export interface BuildEvidenceOptions {
    dedupeSpans?: boolean;          // default true
    indexer?: SentenceIndexer;
}

/**
 * Result of one category's classification pass, as seen after the barrier
 */
export interface CategoryOutcome<A extends Annotation = Annotation> {
    category: string;
    result: Result<readonly AnnotationCandidate<A>[]>;
}

export interface CategoryFailure {
    category: string;
    reason: string;
}

export interface AggregateOptions extends BuildEvidenceOptions {
    categoryOrder?: readonly string[];
}

export interface DocumentAggregate<A extends Annotation = Annotation> {
    merged: MergedResult<A>;
    coverage: CoverageIndex<A>;
    failures: CategoryFailure[];
}

/**
 * One evidence entry per run of every candidate. Annotation fields are carried
 * into each run-derived entry unchanged.
 */
export function buildEvidence<A extends Annotation>(
    category: string,
    candidates: readonly AnnotationCandidate<A>[],
    tagged: string,
    options: BuildEvidenceOptions = {}
): EvidenceEntry<A>[] {
    const dedupe = options.dedupeSpans ?? true;
    const indexer = options.indexer ?? getSentenceIndexer();
    const entries: EvidenceEntry<A>[] = [];

    for (const candidate of candidates) {
        const sorted = normalizeSpan(candidate.span);
        const ids = dedupe ? uniqueSorted(sorted) : sorted;
        if (ids.length === 0) continue;

        const { annotation } = candidate;

        for (const run of groupRuns(ids)) {
            const evidenceText = resolveRun(tagged, run, indexer);
            if (!evidenceText) continue;

            entries.push({ category, annotation, run, evidenceText });
        }
    }

    return entries;
}

/**
 * Rank of each category in the merge. Listed categories keep their list
 * position; anything else follows, alphabetically.
 */
function orderContributions<A extends Annotation>(
    contributions: readonly CategoryContribution<A>[],
    categoryOrder: readonly string[]
): CategoryContribution<A>[] {
    const rank = new Map(categoryOrder.map((c, i) => [c, i]));

    return [...contributions].sort((a, b) => {
        const ra = rank.get(a.category);
        const rb = rank.get(b.category);
        if (ra !== undefined && rb !== undefined) return ra - rb;
        if (ra !== undefined) return -1;
        if (rb !== undefined) return 1;
        return a.category.localeCompare(b.category);
    });
}

export function mergeEvidence<A extends Annotation>(
    contributions: readonly CategoryContribution<A>[],
    categoryOrder: readonly string[] = []
): MergedResult<A> {
    const concatenated = orderContributions(contributions, categoryOrder)
        .flatMap(c => c.entries);

    // Array.prototype.sort is stable, so ties keep category order
    return concatenated.sort((a, b) => a.run[0] - b.run[0]);
}

export function buildCoverageIndex<A extends Annotation>(merged: MergedResult<A>): CoverageIndex<A> {
    const coverage = new Map<number, EvidenceEntry<A>[]>();

    for (const entry of merged) {
        for (const id of entry.run) {
            const list = coverage.get(id);
            if (list) {
                list.push(entry);
            } else {
                coverage.set(id, [entry]);
            }
        }
    }

    return coverage;
}

/**
 * Barrier-side entry point: call once every category outcome has arrived.
 */
export function aggregateDocument<A extends Annotation>(
    tagged: string,
    outcomes: readonly CategoryOutcome<A>[],
    options: AggregateOptions = {}
): DocumentAggregate<A> {
    const contributions: CategoryContribution<A>[] = [];
    const failures: CategoryFailure[] = [];

    for (const outcome of outcomes) {
        if (!outcome.result.ok) {
            failures.push({ category: outcome.category, reason: outcome.result.error });
            contributions.push({ category: outcome.category, entries: [] });
            continue;
        }

        contributions.push({
            category: outcome.category,
            entries: buildEvidence(outcome.category, outcome.result.value, tagged, options),
        });
    }

    const merged = mergeEvidence(contributions, options.categoryOrder);
    return { merged, coverage: buildCoverageIndex(merged), failures };
}
