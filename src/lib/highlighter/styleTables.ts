/**
 * Fixed lookup tables and helpers shared by the highlight policies
 */

import type { Severity, SkillCategory } from '@/lib/evidence';
import type { ConfidenceLevel, HighlightStyle } from './types';

export const SEVERITY_STYLES: Readonly<Record<Severity, HighlightStyle>> = {
    Critical: { color: '#d32f2f', className: 'flag-critical' },
    High: { color: '#ff6b6b', className: 'flag-high' },
    Medium: { color: '#ffa726', className: 'flag-medium' },
    Low: { color: '#fff59d', className: 'flag-low' },
};

export const SKILL_CATEGORY_STYLES: Readonly<Record<SkillCategory, HighlightStyle>> = {
    Decoding: { color: '#3498db', className: 'skill-decoding' },
    Comprehension: { color: '#27ae60', className: 'skill-comprehension' },
    Vocabulary: { color: '#e74c3c', className: 'skill-vocabulary' },
    Knowledge: { color: '#f39c12', className: 'skill-knowledge' },
    Fluency: { color: '#9b59b6', className: 'skill-fluency' },
    Unknown: { color: '#95a5a6', className: 'skill-unknown' },
};

export const MULTIPLE_COLOR = '#9e9e9e';

const SKILL_CATEGORY_CODES: ReadonlyMap<string, SkillCategory> = new Map<string, SkillCategory>([
    ['DEC', 'Decoding'],
    ['COMP', 'Comprehension'],
    ['VOCAB', 'Vocabulary'],
    ['KNOW', 'Knowledge'],
    ['FLUENCY', 'Fluency'],
]);

const SEVERITY_RANK: ReadonlyMap<string, number> = new Map<string, number>([
    ['Critical', 4],
    ['High', 3],
    ['Medium', 2],
    ['Low', 1],
]);

export function isSeverity(value: string): value is Severity {
    return SEVERITY_RANK.has(value);
}

/**
 * "SKILL-COMP-003" → "Comprehension"
 */
export function categoryFromSkillId(skillId: string): SkillCategory {
    const parts = skillId.split('-');
    if (parts.length < 2) return 'Unknown';
    return SKILL_CATEGORY_CODES.get(parts[1]) ?? 'Unknown';
}

export function confidenceLevel(confidence: number): ConfidenceLevel {
    if (confidence >= 0.8) return 'high';
    if (confidence >= 0.6) return 'medium';
    return 'low';
}

/**
 * True when `a` is strictly more severe than `b`. Unknown levels rank lowest.
 */
export function compareSeverity(a: string, b: string): boolean {
    return (SEVERITY_RANK.get(a) ?? 0) > (SEVERITY_RANK.get(b) ?? 0);
}
