import type { SkillDefinition } from '@/lib/stories';

/**
 * What an external classifier receives. Prompt wording, model choice and
 * network handling all live behind the Classifier function.
 */
export interface ClassificationRequest {
    category: string;
    taggedText: string;
    gradeLevel: number;
    rubric?: string;                            // content review passes
    skills?: readonly SkillDefinition[];        // skill tagging pass
}

/**
 * Resolves to the classifier's raw answer: JSON text or an already parsed
 * object. May reject; a rejection only affects its own category.
 */
export type Classifier = (request: ClassificationRequest) => Promise<unknown>;

export interface ParsedResponse<T> {
    candidates: T[];
    dropped: number;        // items that failed validation
}

export type StoryReviewRecord<R> =
    | { storyId: string; ok: true; report: R }
    | { storyId: string; ok: false; error: string };

export interface ReviewRun<R> {
    runId: string;
    kind: string;
    startedAt: Date;
    finishedAt: Date;
    records: StoryReviewRecord<R>[];
}

export interface ReviewEvents extends Record<string, unknown> {
    'story-reviewed': {
        runId: string;
        kind: string;
        storyId: string;
        ok: boolean;
        completed: number;
        total: number;
    };
}
