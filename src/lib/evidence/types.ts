/**
 * Evidence types
 *
 * Annotations are the validated payload of one classifier finding. The raw
 * sentence reference stays `unknown` until SpanNormalizer turns it into ids.
 */

export type Severity = 'Critical' | 'High' | 'Medium' | 'Low';

export type SkillCategory =
    | 'Decoding'
    | 'Comprehension'
    | 'Vocabulary'
    | 'Knowledge'
    | 'Fluency'
    | 'Unknown';

export interface FlagAnnotation {
    kind: 'flag';
    label: string;                  // issue type, e.g. "Violence & Physical Harm"
    severity: string;               // usually a Severity; unknown values render with the fallback style
    confidence: number;             // 0..1
    rationale: string;
    recommendation: string | null;
}

export interface SkillAnnotation {
    kind: 'skill';
    label: string;                  // skill id, e.g. "SKILL-COMP-003"
    skillName: string;
    category: SkillCategory;
    confidence: number;             // 0..1
    rationale: string;
}

export type Annotation = FlagAnnotation | SkillAnnotation;

export interface AnnotationCandidate<A extends Annotation = Annotation> {
    annotation: A;
    span: unknown;                  // single id or list of ids, as the classifier sent it
}

/**
 * Non-empty, ascending, strictly consecutive sentence ids
 */
export type Run = readonly number[];

export interface EvidenceEntry<A extends Annotation = Annotation> {
    category: string;               // classification pass that produced it
    annotation: A;
    run: Run;
    evidenceText: string;           // never empty
}

export type MergedResult<A extends Annotation = Annotation> = readonly EvidenceEntry<A>[];

export type CoverageIndex<A extends Annotation = Annotation> = ReadonlyMap<number, readonly EvidenceEntry<A>[]>;

/**
 * Entries contributed by one category pass
 */
export interface CategoryContribution<A extends Annotation = Annotation> {
    category: string;
    entries: readonly EvidenceEntry<A>[];
}
