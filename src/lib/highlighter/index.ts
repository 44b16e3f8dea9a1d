/**
 * Highlighter Module
 *
 * Sentence-level HTML overlays for merged evidence
 */

export { renderHighlightedText, resolveOverlays, escapeHtml } from './Highlighter';
export { severityPolicy, skillCategoryPolicy } from './policies';
export {
    SEVERITY_STYLES,
    SKILL_CATEGORY_STYLES,
    MULTIPLE_COLOR,
    isSeverity,
    categoryFromSkillId,
    confidenceLevel,
    compareSeverity,
} from './styleTables';
export type { HighlightStyle, MultipleStyle, StylePolicy, ConfidenceLevel, SentenceOverlay } from './types';
