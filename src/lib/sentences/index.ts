export { SentenceIndexer, getSentenceIndexer } from './SentenceIndexer';
export { WinkSegmenter, getWinkSegmenter } from './WinkSegmenter';
export type { Sentence, TaggedDocument, SentenceSegmenter, SentenceIndexerOptions } from './types';
