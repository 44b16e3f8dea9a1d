export interface ReviewSettings {
    // Worker pools
    categoryConcurrency: number;    // parallel category passes per story
    documentConcurrency: number;    // parallel stories per batch

    // Evidence
    dedupeSpans: boolean;           // drop repeated ids before grouping
    defaultConfidence: number;      // used when a classifier omits confidence
}

export const DEFAULT_SETTINGS: ReviewSettings = {
    categoryConcurrency: 7,
    documentConcurrency: 5,
    dedupeSpans: true,
    defaultConfidence: 0.5,
};
