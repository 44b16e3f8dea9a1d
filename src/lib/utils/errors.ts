export type ReviewErrorCode = 'STORY_NOT_FOUND' | 'RUBRIC_NOT_FOUND';

export class ReviewError extends Error {
    constructor(
        message: string,
        public readonly code: ReviewErrorCode,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'ReviewError';
    }
}

/**
 * Raised when a caller asks the story store for an id it does not hold.
 * This is the only fatal condition for a single document.
 */
export class StoryNotFoundError extends ReviewError {
    constructor(public readonly storyId: string) {
        super(`Story with ID ${storyId} not found`, 'STORY_NOT_FOUND', { storyId });
        this.name = 'StoryNotFoundError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
