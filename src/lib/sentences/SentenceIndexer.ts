/**
 * SentenceIndexer - stable sentence ids and the tagged-text wire format
 *
 * Sentences are wrapped as `<tagN>…</tagN>` (N is the 1-based position) and
 * joined by a single space. The same string is sent to classifiers and parsed
 * back here, so tag → map must reproduce the original (id, text) pairs.
 */

import { getWinkSegmenter } from './WinkSegmenter';
import type { Sentence, SentenceIndexerOptions, SentenceSegmenter, TaggedDocument } from './types';

const DEFAULT_TAG_PREFIX = 'tag';

function escapeRegex(str: string): string {
    return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class SentenceIndexer {
    private readonly segmenter: SentenceSegmenter;
    private readonly prefix: string;
    private readonly markerPattern: RegExp;
    private readonly pairPattern: RegExp;

    constructor(options: SentenceIndexerOptions = {}) {
        this.segmenter = options.segmenter ?? getWinkSegmenter();
        this.prefix = options.tagPrefix ?? DEFAULT_TAG_PREFIX;

        const p = escapeRegex(this.prefix);
        this.markerPattern = new RegExp(`<${p}\\d+>`);
        this.pairPattern = new RegExp(`<${p}(\\d+)>([\\s\\S]*?)</${p}\\1>`, 'g');
    }

    get tagPrefix(): string {
        return this.prefix;
    }

    /**
     * Trimmed, non-empty sentences in document order
     */
    split(text: string): string[] {
        if (!text || !text.trim()) return [];
        return this.segmenter
            .split(text)
            .map(s => s.trim())
            .filter(s => s.length > 0);
    }

    isTagged(text: string): boolean {
        return this.markerPattern.test(text);
    }

    /**
     * Wrap each sentence in its numbered marker. Already tagged text is
     * returned unchanged.
     */
    tag(text: string): string {
        if (this.isTagged(text)) return text;

        return this.split(text)
            .map((sentence, i) => `<${this.prefix}${i + 1}>${sentence}</${this.prefix}${i + 1}>`)
            .join(' ');
    }

    /**
     * Sentence text for one id, or null when the document has no such marker
     */
    extractOne(tagged: string, id: number): string | null {
        if (!Number.isInteger(id)) return null;

        const p = escapeRegex(this.prefix);
        const match = new RegExp(`<${p}${id}>([\\s\\S]*?)</${p}${id}>`).exec(tagged);
        return match ? match[1] : null;
    }

    /**
     * Recover every (id, text) pair. Untagged input is tagged first.
     */
    getMapping(text: string): Sentence[] {
        const tagged = this.isTagged(text) ? text : this.tag(text);
        const sentences: Sentence[] = [];

        for (const match of tagged.matchAll(this.pairPattern)) {
            sentences.push({ id: Number(match[1]), text: match[2] });
        }

        return sentences;
    }

    index(text: string): TaggedDocument {
        const tagged = this.tag(text);
        return { tagged, sentences: this.getMapping(tagged) };
    }
}

// ==================== SINGLETON INSTANCE ====================

let indexerInstance: SentenceIndexer | null = null;

/**
 * Shared indexer with the default segmenter and "tag" prefix
 */
export function getSentenceIndexer(): SentenceIndexer {
    if (!indexerInstance) {
        indexerInstance = new SentenceIndexer();
    }
    return indexerInstance;
}
