/**
 * Boundary validation for classifier payloads (zod).
 *
 * Each field falls back to a default instead of failing the whole item, so a
 * finding with a missing rationale is kept. Items that are not objects at all
 * are rejected.
 */

import { z } from 'zod';
import type { AnnotationCandidate, FlagAnnotation, SkillAnnotation } from '@/lib/evidence';
import { categoryFromSkillId } from '@/lib/highlighter';
import { DEFAULT_SETTINGS } from '@/lib/settings';

function clamp(n: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, n));
}

const confidenceField = (fallback: number) =>
    z.coerce.number().catch(fallback).transform(n => clamp(n, 0, 1));

export function flagCandidateSchema(defaultConfidence: number = DEFAULT_SETTINGS.defaultConfidence) {
    return z
        .object({
            issue_type: z.string().min(1).catch('Unknown'),
            severity_level: z.string().min(1).catch('Low'),
            confidence: confidenceField(defaultConfidence),
            rationale: z.string().catch(''),
            recommendation: z.string().nullable().catch(null),
            tag_numbers: z.unknown(),
        })
        .transform((raw): AnnotationCandidate<FlagAnnotation> => ({
            annotation: {
                kind: 'flag',
                label: raw.issue_type,
                severity: raw.severity_level,
                confidence: raw.confidence,
                rationale: raw.rationale,
                recommendation: raw.recommendation,
            },
            span: raw.tag_numbers,
        }));
}

export function skillCandidateSchema(defaultConfidence: number = DEFAULT_SETTINGS.defaultConfidence) {
    return z
        .object({
            skill_id: z.string().catch(''),
            skill_name: z.string().catch(''),
            confidence: confidenceField(defaultConfidence),
            rationale: z.string().catch(''),
            tag_numbers: z.unknown(),
        })
        .transform((raw): AnnotationCandidate<SkillAnnotation> => ({
            annotation: {
                kind: 'skill',
                label: raw.skill_id,
                skillName: raw.skill_name,
                category: categoryFromSkillId(raw.skill_id),
                confidence: raw.confidence,
                rationale: raw.rationale,
            },
            span: raw.tag_numbers,
        }));
}
