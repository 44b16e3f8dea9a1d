/**
 * WinkSegmenter - sentence boundary detection backed by wink-nlp
 *
 * Uses wink-eng-lite-web-model with the `sbd` pipe only; abbreviations such as
 * "Dr." or "Mrs." do not end a sentence.
 */

import winkNLP from 'wink-nlp';
import model from 'wink-eng-lite-web-model';
import type { SentenceSegmenter } from './types';

type WinkInstance = ReturnType<typeof winkNLP>;

export class WinkSegmenter implements SentenceSegmenter {
    private nlp: WinkInstance | null = null;

    /**
     * Lazy initialization (model load happens on first split)
     */
    private ensureInitialized(): WinkInstance {
        if (!this.nlp) {
            this.nlp = winkNLP(model, ['sbd']);
        }
        return this.nlp;
    }

    split(text: string): string[] {
        if (!text || !text.trim()) return [];

        const doc = this.ensureInitialized().readDoc(text);

        return doc
            .sentences()
            .out()
            .map(s => s.trim())
            .filter(s => s.length > 0);
    }
}

// ==================== SINGLETON INSTANCE ====================

let segmenterInstance: WinkSegmenter | null = null;

export function getWinkSegmenter(): WinkSegmenter {
    if (!segmenterInstance) {
        segmenterInstance = new WinkSegmenter();
    }
    return segmenterInstance;
}
