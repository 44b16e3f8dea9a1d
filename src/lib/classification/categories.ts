/**
 * Content review categories, in the fixed order used to break merge ties.
 * Each category is one independent classifier pass.
 */
export const CONTENT_CATEGORIES = [
    'critical_safety',
    'violence_harm',
    'age_appropriateness',
    'cultural_sensitivity',
    'emotional_safety',
    'technical_issues',
    'physical_safety',
] as const;

export type ContentCategory = (typeof CONTENT_CATEGORIES)[number];

// Skill tagging runs as a single pass over the whole taxonomy
export const SKILL_TAGGING_PASS = 'skill_tagging';
