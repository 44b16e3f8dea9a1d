import { describe, it, expect } from 'vitest';
import { getWinkSegmenter } from '../WinkSegmenter';
import { SentenceIndexer } from '../SentenceIndexer';

describe('WinkSegmenter Integration Tests', () => {
    it('should split simple sentences', () => {
        const sentences = getWinkSegmenter().split('Hello world. How are you? I am fine.');

        expect(sentences).toEqual(['Hello world.', 'How are you?', 'I am fine.']);
    });

    it('should detect sentence boundaries accurately (Dr. test)', () => {
        const sentences = getWinkSegmenter().split('Dr. Smith works at the clinic. He helps sick kids.');

        expect(sentences).toHaveLength(2);
        expect(sentences[0]).toBe('Dr. Smith works at the clinic.');
        expect(sentences[1]).toBe('He helps sick kids.');
    });

    it('should return no sentences for blank text', () => {
        expect(getWinkSegmenter().split('  ')).toEqual([]);
    });

    it('should be the default segmenter of the indexer', () => {
        const indexer = new SentenceIndexer();

        expect(indexer.tag('The cat sat. The dog ran.')).toBe('<tag1>The cat sat.</tag1> <tag2>The dog ran.</tag2>');
    });

    describe('default indexer round trip', () => {
        const indexer = new SentenceIndexer();
        const text =
            'Mrs. Lee opened the door.  "Who is there?" she asked.\n\n' +
            'Dr. Patel smiled. "Just me," he said.\nThey laughed together!';

        it('should tag already tagged text as a no-op', () => {
            const tagged = indexer.tag(text);

            expect(indexer.tag(tagged)).toBe(tagged);
        });

        it('should extract every sentence exactly as split produced it', () => {
            const sentences = indexer.split(text);
            const tagged = indexer.tag(text);

            expect(sentences.length).toBeGreaterThan(1);
            sentences.forEach((sentence, i) => {
                expect(indexer.extractOne(tagged, i + 1)).toBe(sentence);
            });
            expect(indexer.extractOne(tagged, sentences.length + 1)).toBeNull();
        });

        it('should map the tagged text back to the split sentences', () => {
            const sentences = indexer.split(text);

            expect(indexer.getMapping(text)).toEqual(sentences.map((s, i) => ({ id: i + 1, text: s })));
        });
    });
});
