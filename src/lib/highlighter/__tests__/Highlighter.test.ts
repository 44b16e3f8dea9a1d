import { describe, it, expect } from 'vitest';
import { escapeHtml, renderHighlightedText, resolveOverlays } from '../Highlighter';
import { severityPolicy, skillCategoryPolicy } from '../policies';
import type { CoverageIndex, EvidenceEntry, FlagAnnotation, SkillAnnotation } from '@/lib/evidence';
import type { Sentence } from '@/lib/sentences';

function flagEntry(label: string, severity: string, run: number[]): EvidenceEntry<FlagAnnotation> {
    return {
        category: 'violence_harm',
        annotation: { kind: 'flag', label, severity, confidence: 0.8, rationale: '', recommendation: null },
        run,
        evidenceText: 'unused',
    };
}

function skillEntry(skillName: string, category: SkillAnnotation['category'], confidence: number): EvidenceEntry<SkillAnnotation> {
    return {
        category: 'skill_tagging',
        annotation: { kind: 'skill', label: 'SKILL-X-001', skillName, category, confidence, rationale: '' },
        run: [1],
        evidenceText: 'unused',
    };
}

const sentences: Sentence[] = [
    { id: 1, text: 'The sun rose.' },
    { id: 2, text: 'A fight broke out.' },
    { id: 3, text: 'Everyone went home.' },
];

describe('renderHighlightedText', () => {
    it('should render plain text when nothing is covered', () => {
        expect(renderHighlightedText(sentences, new Map(), severityPolicy)).toBe(
            'The sun rose. A fight broke out. Everyone went home.'
        );
    });

    it('should style a sentence covered by one flag', () => {
        const coverage: CoverageIndex<FlagAnnotation> = new Map([[2, [flagEntry('Fight', 'High', [2])]]]);

        expect(renderHighlightedText(sentences, coverage, severityPolicy)).toBe(
            'The sun rose. ' +
                '<span class="flag-high" style="background-color: #ff6b6b; padding: 2px 4px; border-radius: 3px;" ' +
                'title="High: Fight">A fight broke out.</span> ' +
                'Everyone went home.'
        );
    });

    it('should use the neutral style and list every flag when several overlap', () => {
        const coverage: CoverageIndex<FlagAnnotation> = new Map([
            [2, [flagEntry('Fight', 'High', [2]), flagEntry('Fear', 'Critical', [2, 3])]],
        ]);

        const html = renderHighlightedText([sentences[1]], coverage, severityPolicy);

        expect(html).toBe(
            '<span class="flag-multiple" style="background-color: #9e9e9e; padding: 2px 4px; border-radius: 3px;" ' +
                'title="Multiple issues - High: Fight; Critical: Fear">A fight broke out.</span>'
        );
    });

    it('should fall back to the Low style for an unknown severity', () => {
        const coverage: CoverageIndex<FlagAnnotation> = new Map([[1, [flagEntry('Odd', 'Severe', [1])]]]);

        const [overlay] = resolveOverlays([sentences[0]], coverage, severityPolicy);

        expect(overlay).toEqual({
            id: 1,
            text: 'The sun rose.',
            kind: 'single',
            style: { color: '#fff59d', className: 'flag-low' },
            title: 'Severe: Odd',
        });
    });

    it('should escape sentence text and titles', () => {
        const coverage: CoverageIndex<FlagAnnotation> = new Map([[1, [flagEntry('"Bad" <words>', 'Low', [1])]]]);

        const html = renderHighlightedText([{ id: 1, text: 'Tom & Jerry <3' }], coverage, severityPolicy);

        expect(html).toBe(
            '<span class="flag-low" style="background-color: #fff59d; padding: 2px 4px; border-radius: 3px;" ' +
                'title="Low: &quot;Bad&quot; &lt;words&gt;">Tom &amp; Jerry &lt;3</span>'
        );
    });

    it('should describe skills with category and confidence', () => {
        const coverage: CoverageIndex<SkillAnnotation> = new Map([[1, [skillEntry('Main idea', 'Comprehension', 0.9)]]]);

        expect(renderHighlightedText([sentences[0]], coverage, skillCategoryPolicy)).toBe(
            '<span class="skill-comprehension" style="background-color: #27ae60; padding: 2px 4px; border-radius: 3px;" ' +
                'title="Comprehension: Main idea (confidence: 0.90)">The sun rose.</span>'
        );
    });

    it('should list overlapping skills without confidence', () => {
        const coverage: CoverageIndex<SkillAnnotation> = new Map([
            [1, [skillEntry('Main idea', 'Comprehension', 0.9), skillEntry('Context clues', 'Vocabulary', 0.7)]],
        ]);

        const [overlay] = resolveOverlays([sentences[0]], coverage, skillCategoryPolicy);

        expect(overlay).toEqual({
            id: 1,
            text: 'The sun rose.',
            kind: 'multiple',
            style: { color: '#9e9e9e', className: 'skill-multiple' },
            title: 'Multiple skills - Comprehension: Main idea; Vocabulary: Context clues',
        });
    });
});

describe('escapeHtml', () => {
    it('should escape markup characters', () => {
        expect(escapeHtml('<a href="x">&</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;');
    });
});
