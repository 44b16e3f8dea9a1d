export { StoryStore } from './StoryStore';
export type { Story, TaggedStory, SkillDefinition, StoryStoreData } from './types';
