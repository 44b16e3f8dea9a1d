/**
 * Sentence indexing types
 */

export interface Sentence {
    id: number;     // 1-based position in document order
    text: string;   // trimmed sentence text
}

export interface TaggedDocument {
    tagged: string;
    sentences: readonly Sentence[];
}

/**
 * Anything that can cut raw text into sentence strings.
 */
export interface SentenceSegmenter {
    split(text: string): string[];
}

export interface SentenceIndexerOptions {
    segmenter?: SentenceSegmenter;
    tagPrefix?: string;     // marker name, default "tag" → <tag1>…</tag1>
}
