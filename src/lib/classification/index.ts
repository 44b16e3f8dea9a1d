/**
 * Classification Module
 *
 * Validates classifier answers and orchestrates content flagging, skill
 * tagging and batch review around the pure evidence pipeline.
 */

export { ContentFlagger } from './ContentFlagger';
export type { ContentFlaggerOptions, FlagEntry, FlagReport } from './ContentFlagger';
export { SkillTagger } from './SkillTagger';
export type { SkillTaggerOptions, SkillTag, SkillReport } from './SkillTagger';
export { reviewAll } from './ReviewRunner';
export type { ReviewAllOptions } from './ReviewRunner';
export { parseClassifierResponse } from './responseParser';
export { flagCandidateSchema, skillCandidateSchema } from './candidateSchemas';
export { CONTENT_CATEGORIES, SKILL_TAGGING_PASS } from './categories';
export type { ContentCategory } from './categories';
export { reviewEvents } from './events';
export type {
    ClassificationRequest,
    Classifier,
    ParsedResponse,
    StoryReviewRecord,
    ReviewRun,
    ReviewEvents,
} from './types';
