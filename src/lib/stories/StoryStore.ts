/**
 * StoryStore - in-memory access to stories, the skill taxonomy and rubrics
 *
 * Reading the CSV and markdown sources happens outside; callers hand the
 * loaded rows in. Asking for an unknown story is fatal for that document.
 */

import { getSentenceIndexer, type SentenceIndexer } from '@/lib/sentences';
import { ReviewError, StoryNotFoundError } from '@/lib/utils/errors';
import type { SkillDefinition, Story, StoryStoreData, TaggedStory } from './types';

export class StoryStore {
    private readonly stories = new Map<string, Story>();
    private readonly skillList: readonly SkillDefinition[];
    private readonly rubrics: ReadonlyMap<string, string>;

    constructor(
        data: StoryStoreData,
        private readonly indexer: SentenceIndexer = getSentenceIndexer()
    ) {
        for (const story of data.stories) {
            this.stories.set(story.storyId, story);
        }
        this.skillList = data.skills ?? [];
        this.rubrics = new Map(Object.entries(data.rubrics ?? {}));
    }

    listStoryIds(): string[] {
        return [...this.stories.keys()];
    }

    getStory(storyId: string): Story {
        const story = this.stories.get(storyId);
        if (!story) {
            throw new StoryNotFoundError(storyId);
        }
        return story;
    }

    /**
     * Story plus its sentence-tagged content
     */
    getTaggedStory(storyId: string): TaggedStory {
        const story = this.getStory(storyId);
        return { ...story, taggedContent: this.indexer.tag(story.storyContent) };
    }

    storiesByGrade(gradeLevel: number): Story[] {
        return [...this.stories.values()].filter(s => s.gradeLevel === gradeLevel);
    }

    skills(): readonly SkillDefinition[] {
        return this.skillList;
    }

    rubricCategories(): string[] {
        return [...this.rubrics.keys()];
    }

    getRubric(category: string): string {
        const rubric = this.rubrics.get(category);
        if (rubric === undefined) {
            const available = this.rubricCategories().join(', ');
            throw new ReviewError(
                `Rubric category '${category}' not found. Available: ${available}`,
                'RUBRIC_NOT_FOUND',
                { category }
            );
        }
        return rubric;
    }
}
