export { normalizeSpan, uniqueSorted } from './spanNormalizer';
export { groupRuns } from './runGrouper';
export { resolveRun } from './EvidenceAssembler';
export {
    buildEvidence,
    mergeEvidence,
    buildCoverageIndex,
    aggregateDocument,
} from './AnnotationAggregator';
export type {
    BuildEvidenceOptions,
    CategoryOutcome,
    CategoryFailure,
    AggregateOptions,
    DocumentAggregate,
} from './AnnotationAggregator';
export type {
    Severity,
    SkillCategory,
    FlagAnnotation,
    SkillAnnotation,
    Annotation,
    AnnotationCandidate,
    Run,
    EvidenceEntry,
    MergedResult,
    CoverageIndex,
    CategoryContribution,
} from './types';
