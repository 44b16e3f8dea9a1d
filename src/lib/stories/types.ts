export interface Story {
    storyId: string;
    storyTitle: string;
    storyContent: string;
    gradeLevel: number;         // 0 (kindergarten) to 8
}

export interface TaggedStory extends Story {
    taggedContent: string;
}

export interface SkillDefinition {
    skillId: string;            // e.g. "SKILL-COMP-003"
    skillName: string;
    skillCategory: string;
    skillDescription: string;
}

export interface StoryStoreData {
    stories: readonly Story[];
    skills?: readonly SkillDefinition[];
    rubrics?: Readonly<Record<string, string>>;     // review category → rubric text
}
