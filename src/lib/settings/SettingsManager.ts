import { z } from 'zod';
import type { ReviewSettings } from './types';
import { DEFAULT_SETTINGS } from './types';

type Env = Record<string, string | undefined>;

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(v => v === 'true' || v === '1');

const EnvSettingsSchema = z.object({
    REVIEW_CATEGORY_CONCURRENCY: z.coerce.number().int().min(1).max(64).optional(),
    REVIEW_DOCUMENT_CONCURRENCY: z.coerce.number().int().min(1).max(64).optional(),
    REVIEW_DEDUPE_SPANS: booleanFlag.optional(),
});

/**
 * Review settings: defaults overlaid with REVIEW_* environment variables.
 * Invalid values are reported and the defaults kept.
 */
export class SettingsManager {
    private static settings: ReviewSettings | null = null;

    static load(env: Env = process.env): ReviewSettings {
        if (this.settings) return this.settings;

        this.settings = this.fromEnv(env);
        return this.settings;
    }

    static fromEnv(env: Env): ReviewSettings {
        const parsed = EnvSettingsSchema.safeParse(env);

        if (!parsed.success) {
            const fields = parsed.error.issues.map(i => i.path.join('.')).join(', ');
            console.warn(`[SettingsManager] Ignoring invalid settings (${fields}), using defaults`);
            return { ...DEFAULT_SETTINGS };
        }

        const values = parsed.data;
        return {
            ...DEFAULT_SETTINGS,
            categoryConcurrency: values.REVIEW_CATEGORY_CONCURRENCY ?? DEFAULT_SETTINGS.categoryConcurrency,
            documentConcurrency: values.REVIEW_DOCUMENT_CONCURRENCY ?? DEFAULT_SETTINGS.documentConcurrency,
            dedupeSpans: values.REVIEW_DEDUPE_SPANS ?? DEFAULT_SETTINGS.dedupeSpans,
        };
    }

    /**
     * Update partial settings (in memory only)
     */
    static update(partial: Partial<ReviewSettings>): ReviewSettings {
        this.settings = { ...this.load(), ...partial };
        return this.settings;
    }

    static reset(): void {
        this.settings = null;
    }
}
