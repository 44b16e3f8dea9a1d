export * from './lib/sentences';
export * from './lib/evidence';
export * from './lib/highlighter';
export * from './lib/classification';
export * from './lib/stories';
export * from './lib/settings';
export { ReviewError, StoryNotFoundError, describeError } from './lib/utils/errors';
export type { ReviewErrorCode } from './lib/utils/errors';
export { ok, err } from './lib/utils/result';
export type { Result } from './lib/utils/result';
export { mapSettled } from './lib/utils/concurrency';
export { EventBus } from './lib/utils/event-bus';
export { generateId } from './lib/utils/ids';
