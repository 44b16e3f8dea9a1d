/**
 * ContentFlagger - flags potentially problematic passages in a story
 *
 * One classifier pass per review category, run in parallel (bounded). The
 * aggregation waits for every pass; a pass that throws or answers garbage
 * contributes nothing and is reported as a warning.
 */

import {
    aggregateDocument,
    type AnnotationCandidate,
    type CategoryOutcome,
    type EvidenceEntry,
    type FlagAnnotation,
} from '@/lib/evidence';
import { compareSeverity, renderHighlightedText, severityPolicy } from '@/lib/highlighter';
import { getSentenceIndexer, type SentenceIndexer } from '@/lib/sentences';
import { SettingsManager, type ReviewSettings } from '@/lib/settings';
import type { StoryStore, TaggedStory } from '@/lib/stories';
import { mapSettled } from '@/lib/utils/concurrency';
import { ok, type Result } from '@/lib/utils/result';
import { flagCandidateSchema } from './candidateSchemas';
import { CONTENT_CATEGORIES } from './categories';
import { parseClassifierResponse } from './responseParser';
import { reviewAll } from './ReviewRunner';
import type { Classifier, ParsedResponse, ReviewRun } from './types';

export interface FlagEntry {
    severity: string;
    cssClass: string;
    color: string;
    issueType: string;
    textEvidence: string;
    rationale: string;
    confidence: number;
    recommendation: string | null;
    category: string;
    tagNumbers: number[];
}

export interface FlagReport {
    storyId: string;
    storyTitle: string;
    gradeLevel: number;
    flagCount: number;
    hasCritical: boolean;
    highestSeverity: string | null;
    highlightedText: string;
    flags: FlagEntry[];
    warnings: string[];
}

export interface ContentFlaggerOptions {
    categories?: readonly string[];     // defaults to CONTENT_CATEGORIES, in that order
    settings?: Partial<ReviewSettings>;
    indexer?: SentenceIndexer;
}

type FlagCandidate = AnnotationCandidate<FlagAnnotation>;

function toFlagEntry(entry: EvidenceEntry<FlagAnnotation>): FlagEntry {
    const { annotation } = entry;
    const style = severityPolicy.styleFor(entry);

    return {
        severity: annotation.severity,
        cssClass: style.className,
        color: style.color,
        issueType: annotation.label,
        textEvidence: entry.evidenceText,
        rationale: annotation.rationale,
        confidence: annotation.confidence,
        recommendation: annotation.recommendation,
        category: entry.category,
        tagNumbers: [...entry.run],
    };
}

export class ContentFlagger {
    private readonly categories: readonly string[];
    private readonly settings: ReviewSettings;
    private readonly indexer: SentenceIndexer;

    constructor(
        private readonly store: StoryStore,
        private readonly classifier: Classifier,
        options: ContentFlaggerOptions = {}
    ) {
        this.categories = options.categories ?? CONTENT_CATEGORIES;
        this.settings = { ...SettingsManager.load(), ...options.settings };
        this.indexer = options.indexer ?? getSentenceIndexer();
    }

    /**
     * Flag one story. Throws only when the story id is unknown.
     */
    async flagStory(storyId: string): Promise<FlagReport> {
        const story = this.store.getTaggedStory(storyId);
        const warnings: string[] = [];

        const settled = await mapSettled(
            this.categories,
            this.settings.categoryConcurrency,
            category => this.checkCategory(category, story)
        );

        // Reported in category order, whichever pass finished first
        const outcomes: CategoryOutcome<FlagAnnotation>[] = this.categories.map((category, i) => {
            const outcome = settled[i];
            const parsed = outcome.ok ? outcome.value : outcome;
            if (!parsed.ok) return { category, result: parsed };

            if (parsed.value.dropped > 0) {
                const message = `Dropped ${parsed.value.dropped} malformed flag(s) from category ${category}`;
                console.warn(`[ContentFlagger] ${message}`);
                warnings.push(message);
            }
            return { category, result: ok(parsed.value.candidates) };
        });

        const { merged, coverage, failures } = aggregateDocument(story.taggedContent, outcomes, {
            categoryOrder: this.categories,
            dedupeSpans: this.settings.dedupeSpans,
            indexer: this.indexer,
        });

        for (const failure of failures) {
            const message = `Error checking category ${failure.category} for story ${storyId}: ${failure.reason}`;
            console.warn(`[ContentFlagger] ${message}`);
            warnings.push(message);
        }

        const sentences = this.indexer.getMapping(story.taggedContent);
        const flags = merged.map(toFlagEntry);
        const highestSeverity = flags.reduce<string | null>(
            (highest, f) => (highest === null || compareSeverity(f.severity, highest) ? f.severity : highest),
            null
        );

        return {
            storyId,
            storyTitle: story.storyTitle,
            gradeLevel: story.gradeLevel,
            flagCount: flags.length,
            hasCritical: flags.some(f => f.severity === 'Critical'),
            highestSeverity,
            highlightedText: renderHighlightedText(sentences, coverage, severityPolicy),
            flags,
            warnings,
        };
    }

    /**
     * Flag every story in the store; failures become error records.
     */
    async flagAllStories(): Promise<ReviewRun<FlagReport>> {
        return reviewAll(
            'content-flagging',
            this.store.listStoryIds(),
            storyId => this.flagStory(storyId),
            { concurrency: this.settings.documentConcurrency }
        );
    }

    private async checkCategory(
        category: string,
        story: TaggedStory
    ): Promise<Result<ParsedResponse<FlagCandidate>>> {
        const rubric = this.store.getRubric(category);

        const raw = await this.classifier({
            category,
            taggedText: story.taggedContent,
            gradeLevel: story.gradeLevel,
            rubric,
        });

        return parseClassifierResponse(raw, 'flags', flagCandidateSchema(this.settings.defaultConfidence));
    }
}
