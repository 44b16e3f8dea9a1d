/**
 * Highlighter - per-sentence overlay with conflict resolution
 *
 * For each sentence in document order the coverage index decides:
 *   0 entries → plain text
 *   1 entry   → the policy's style for that entry
 *   2+        → the policy's neutral "multiple" style, listing every entry in
 *               coverage order (never re-ranked by severity or confidence)
 */

import type { Annotation, CoverageIndex } from '@/lib/evidence';
import type { Sentence } from '@/lib/sentences';
import type { HighlightStyle, SentenceOverlay, StylePolicy } from './types';

const SPAN_LAYOUT = 'padding: 2px 4px; border-radius: 3px;';

export function escapeHtml(input: string): string {
    return input
        .replaceAll('&', '&amp;')
        .replaceAll('<', '&lt;')
        .replaceAll('>', '&gt;')
        .replaceAll('"', '&quot;');
}

export function resolveOverlays<A extends Annotation>(
    sentences: readonly Sentence[],
    coverage: CoverageIndex<A>,
    policy: StylePolicy<A>
): SentenceOverlay[] {
    return sentences.map(({ id, text }): SentenceOverlay => {
        const entries = coverage.get(id) ?? [];

        if (entries.length === 0) {
            return { id, text, kind: 'plain' };
        }

        if (entries.length === 1) {
            return {
                id,
                text,
                kind: 'single',
                style: policy.styleFor(entries[0]),
                title: policy.describe(entries[0]),
            };
        }

        const { titlePrefix, ...style } = policy.multiple;
        return {
            id,
            text,
            kind: 'multiple',
            style,
            title: titlePrefix + entries.map(e => policy.describeInMultiple(e)).join('; '),
        };
    });
}

function renderSpan(text: string, style: HighlightStyle, title: string): string {
    return (
        `<span class="${escapeHtml(style.className)}" ` +
        `style="background-color: ${escapeHtml(style.color)}; ${SPAN_LAYOUT}" ` +
        `title="${escapeHtml(title)}">${escapeHtml(text)}</span>`
    );
}

/**
 * Rebuild the document as HTML, one fragment per sentence joined by a space
 */
export function renderHighlightedText<A extends Annotation>(
    sentences: readonly Sentence[],
    coverage: CoverageIndex<A>,
    policy: StylePolicy<A>
): string {
    return resolveOverlays(sentences, coverage, policy)
        .map(overlay =>
            overlay.kind === 'plain'
                ? escapeHtml(overlay.text)
                : renderSpan(overlay.text, overlay.style, overlay.title)
        )
        .join(' ');
}
