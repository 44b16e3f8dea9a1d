/**
 * Highlighter Types
 * A style policy is plain data plus pure functions; the overlay algorithm is
 * shared by every policy.
 */

import type { Annotation, EvidenceEntry } from '@/lib/evidence';

export interface HighlightStyle {
    color: string;
    className: string;
}

export interface MultipleStyle extends HighlightStyle {
    titlePrefix: string;        // e.g. "Multiple issues - "
}

export interface StylePolicy<A extends Annotation = Annotation> {
    name: string;
    styleFor(entry: EvidenceEntry<A>): HighlightStyle;
    describe(entry: EvidenceEntry<A>): string;              // title for a single covering entry
    describeInMultiple(entry: EvidenceEntry<A>): string;    // one item of the "multiple" title
    multiple: MultipleStyle;
}

export type ConfidenceLevel = 'high' | 'medium' | 'low';

/**
 * How one sentence was resolved, before it is turned into markup
 */
export type SentenceOverlay =
    | { id: number; text: string; kind: 'plain' }
    | { id: number; text: string; kind: 'single' | 'multiple'; style: HighlightStyle; title: string };
