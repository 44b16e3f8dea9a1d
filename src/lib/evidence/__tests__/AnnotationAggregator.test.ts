import { describe, it, expect } from 'vitest';
import {
    aggregateDocument,
    buildCoverageIndex,
    buildEvidence,
    mergeEvidence,
} from '../AnnotationAggregator';
import type { AnnotationCandidate, FlagAnnotation } from '../types';
import { SentenceIndexer } from '@/lib/sentences';
import { err, ok } from '@/lib/utils/result';

const indexer = new SentenceIndexer({ segmenter: { split: t => t.split(/(?<=\.)\s+/) } });
const tagged = indexer.tag('S one. S two. S three. S four. S five. S six.');

function flag(label: string, span: unknown, severity = 'Medium'): AnnotationCandidate<FlagAnnotation> {
    return {
        annotation: {
            kind: 'flag',
            label,
            severity,
            confidence: 0.7,
            rationale: `why ${label}`,
            recommendation: null,
        },
        span,
    };
}

describe('buildEvidence', () => {
    it('should create one entry per run with quoted evidence', () => {
        const entries = buildEvidence('violence_harm', [flag('Fight', [1, 2, 4])], tagged, { indexer });

        expect(entries.map(e => e.run)).toEqual([[1, 2], [4]]);
        expect(entries.map(e => e.evidenceText)).toEqual(['S one. S two.', 'S four.']);
        expect(entries.every(e => e.category === 'violence_harm')).toBe(true);
    });

    it('should copy annotation fields unchanged into every run entry', () => {
        const candidate = flag('Fight', [1, 3]);
        const entries = buildEvidence('violence_harm', [candidate], tagged, { indexer });

        expect(entries).toHaveLength(2);
        expect(entries[0].annotation).toEqual(candidate.annotation);
        expect(entries[1].annotation).toEqual(candidate.annotation);
    });

    it('should skip candidates whose span is malformed', () => {
        const entries = buildEvidence('violence_harm', [flag('Bad', 'x'), flag('Ok', 2)], tagged, { indexer });

        expect(entries.map(e => e.annotation.label)).toEqual(['Ok']);
    });

    it('should skip runs that resolve to no text', () => {
        const entries = buildEvidence('violence_harm', [flag('Far', [40, 41])], tagged, { indexer });

        expect(entries).toEqual([]);
    });

    it('should dedupe repeated ids by default', () => {
        const entries = buildEvidence('violence_harm', [flag('Twice', [2, 2, 3])], tagged, { indexer });

        expect(entries.map(e => e.run)).toEqual([[2, 3]]);
    });

    it('should keep repeated ids when dedupe is off', () => {
        const entries = buildEvidence('violence_harm', [flag('Twice', [2, 2, 3])], tagged, {
            indexer,
            dedupeSpans: false,
        });

        expect(entries.map(e => e.run)).toEqual([[2], [2, 3]]);
    });
});

describe('mergeEvidence', () => {
    const a = buildEvidence('critical_safety', [flag('A', 5)], tagged, { indexer });
    const b = buildEvidence('violence_harm', [flag('B', 1)], tagged, { indexer });
    const c = buildEvidence('emotional_safety', [flag('C', 3)], tagged, { indexer });
    const order = ['critical_safety', 'violence_harm', 'emotional_safety'];

    it('should order entries by first sentence id', () => {
        const merged = mergeEvidence(
            [
                { category: 'critical_safety', entries: a },
                { category: 'violence_harm', entries: b },
                { category: 'emotional_safety', entries: c },
            ],
            order
        );

        expect(merged.map(e => e.run[0])).toEqual([1, 3, 5]);
    });

    it('should not depend on the order contributions arrive in', () => {
        const contributions = [
            { category: 'emotional_safety', entries: c },
            { category: 'critical_safety', entries: a },
            { category: 'violence_harm', entries: b },
        ];

        const merged = mergeEvidence(contributions, order);
        const reversed = mergeEvidence([...contributions].reverse(), order);

        expect(merged.map(e => e.annotation.label)).toEqual(['B', 'C', 'A']);
        expect(reversed).toEqual(merged);
    });

    it('should break ties by category order, unknown categories last', () => {
        const first = buildEvidence('critical_safety', [flag('First', 2)], tagged, { indexer });
        const second = buildEvidence('violence_harm', [flag('Second', 2)], tagged, { indexer });
        const extraB = buildEvidence('zeta', [flag('Zeta', 2)], tagged, { indexer });
        const extraA = buildEvidence('alpha', [flag('Alpha', 2)], tagged, { indexer });

        const merged = mergeEvidence(
            [
                { category: 'zeta', entries: extraB },
                { category: 'violence_harm', entries: second },
                { category: 'alpha', entries: extraA },
                { category: 'critical_safety', entries: first },
            ],
            order
        );

        expect(merged.map(e => e.annotation.label)).toEqual(['First', 'Second', 'Alpha', 'Zeta']);
    });
});

describe('buildCoverageIndex', () => {
    it('should list every entry under each id of its run, in merged order', () => {
        const merged = mergeEvidence([
            { category: 'violence_harm', entries: buildEvidence('violence_harm', [flag('Wide', [2, 3, 4])], tagged, { indexer }) },
            { category: 'violence_harm2', entries: buildEvidence('violence_harm2', [flag('Narrow', 3)], tagged, { indexer }) },
        ]);

        const coverage = buildCoverageIndex(merged);

        expect([...coverage.keys()].sort()).toEqual([2, 3, 4]);
        expect(coverage.get(2)?.map(e => e.annotation.label)).toEqual(['Wide']);
        expect(coverage.get(3)?.map(e => e.annotation.label)).toEqual(['Wide', 'Narrow']);
        expect(coverage.get(1)).toBeUndefined();
    });
});

describe('aggregateDocument', () => {
    it('should treat failed categories as empty contributions', () => {
        const { merged, coverage, failures } = aggregateDocument(
            tagged,
            [
                { category: 'critical_safety', result: err('timeout') },
                { category: 'violence_harm', result: ok([flag('Fight', [1, 2], 'High')]) },
            ],
            { indexer, categoryOrder: ['critical_safety', 'violence_harm'] }
        );

        expect(failures).toEqual([{ category: 'critical_safety', reason: 'timeout' }]);
        expect(merged).toHaveLength(1);
        expect(merged[0].evidenceText).toBe('S one. S two.');
        expect(coverage.get(1)).toEqual([merged[0]]);
    });

    it('should return an empty aggregate when every category failed', () => {
        const result = aggregateDocument(tagged, [{ category: 'critical_safety', result: err('boom') }], { indexer });

        expect(result.merged).toEqual([]);
        expect(result.coverage.size).toBe(0);
        expect(result.failures).toHaveLength(1);
    });
});
