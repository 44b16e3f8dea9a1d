/**
 * SkillTagger - tags sentences with the reading skills they exercise
 */

import {
    aggregateDocument,
    type AnnotationCandidate,
    type EvidenceEntry,
    type SkillAnnotation,
} from '@/lib/evidence';
import { confidenceLevel, renderHighlightedText, skillCategoryPolicy, type ConfidenceLevel } from '@/lib/highlighter';
import { getSentenceIndexer, type SentenceIndexer } from '@/lib/sentences';
import { SettingsManager, type ReviewSettings } from '@/lib/settings';
import type { StoryStore } from '@/lib/stories';
import { describeError } from '@/lib/utils/errors';
import { err, ok, type Result } from '@/lib/utils/result';
import { skillCandidateSchema } from './candidateSchemas';
import { SKILL_TAGGING_PASS } from './categories';
import { parseClassifierResponse } from './responseParser';
import { reviewAll } from './ReviewRunner';
import type { Classifier, ReviewRun } from './types';

export interface SkillTag {
    sentenceEvidence: string;
    skillId: string;
    skillName: string;
    category: string;
    rationale: string;
    confidence: number;
    confidenceLevel: ConfidenceLevel;
    tagNumbers: number[];
}

export interface SkillReport {
    storyId: string;
    storyTitle: string;
    gradeLevel: number;
    tags: SkillTag[];
    highlightedText: string;
    warnings: string[];
}

export interface SkillTaggerOptions {
    settings?: Partial<ReviewSettings>;
    indexer?: SentenceIndexer;
}

type SkillCandidate = AnnotationCandidate<SkillAnnotation>;

function toSkillTag({ annotation, run, evidenceText }: EvidenceEntry<SkillAnnotation>): SkillTag {
    return {
        sentenceEvidence: evidenceText,
        skillId: annotation.label,
        skillName: annotation.skillName,
        category: annotation.category,
        rationale: annotation.rationale,
        confidence: annotation.confidence,
        confidenceLevel: confidenceLevel(annotation.confidence),
        tagNumbers: [...run],
    };
}

export class SkillTagger {
    private readonly settings: ReviewSettings;
    private readonly indexer: SentenceIndexer;

    constructor(
        private readonly store: StoryStore,
        private readonly classifier: Classifier,
        options: SkillTaggerOptions = {}
    ) {
        this.settings = { ...SettingsManager.load(), ...options.settings };
        this.indexer = options.indexer ?? getSentenceIndexer();
    }

    /**
     * Tag one story. Throws only when the story id is unknown; a failed
     * classifier call yields an untagged report with a warning.
     */
    async tagStory(storyId: string): Promise<SkillReport> {
        const story = this.store.getTaggedStory(storyId);
        const warnings: string[] = [];

        let result: Result<SkillCandidate[]>;
        try {
            result = await this.classify(story.taggedContent, story.gradeLevel, warnings);
        } catch (error) {
            result = err(describeError(error));
        }

        const { merged, coverage, failures } = aggregateDocument(
            story.taggedContent,
            [{ category: SKILL_TAGGING_PASS, result }],
            { dedupeSpans: this.settings.dedupeSpans, indexer: this.indexer }
        );

        for (const failure of failures) {
            const message = `Error tagging skills for story ${storyId}: ${failure.reason}`;
            console.warn(`[SkillTagger] ${message}`);
            warnings.push(message);
        }

        const sentences = this.indexer.getMapping(story.taggedContent);

        return {
            storyId,
            storyTitle: story.storyTitle,
            gradeLevel: story.gradeLevel,
            tags: merged.map(toSkillTag),
            highlightedText: renderHighlightedText(sentences, coverage, skillCategoryPolicy),
            warnings,
        };
    }

    async tagAllStories(): Promise<ReviewRun<SkillReport>> {
        return reviewAll(
            'skill-tagging',
            this.store.listStoryIds(),
            storyId => this.tagStory(storyId),
            { concurrency: this.settings.documentConcurrency }
        );
    }

    private async classify(
        taggedText: string,
        gradeLevel: number,
        warnings: string[]
    ): Promise<Result<SkillCandidate[]>> {
        const skills = this.store.skills();

        const raw = await this.classifier({
            category: SKILL_TAGGING_PASS,
            taggedText,
            gradeLevel,
            skills,
        });

        const parsed = parseClassifierResponse(raw, 'skill_tags', skillCandidateSchema(this.settings.defaultConfidence));
        if (!parsed.ok) return parsed;

        if (parsed.value.dropped > 0) {
            const message = `Dropped ${parsed.value.dropped} malformed skill tag(s)`;
            console.warn(`[SkillTagger] ${message}`);
            warnings.push(message);
        }

        const known = new Set(skills.map(s => s.skillId));
        const candidates = parsed.value.candidates.filter(candidate => {
            if (known.has(candidate.annotation.label)) return true;

            const message = `Invalid skill_id '${candidate.annotation.label}' returned by classifier`;
            console.warn(`[SkillTagger] ${message}`);
            warnings.push(message);
            return false;
        });

        return ok(candidates);
    }
}
