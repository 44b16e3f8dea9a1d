import type { z } from 'zod';
import { describeError } from '@/lib/utils/errors';
import { err, ok, type Result } from '@/lib/utils/result';
import type { ParsedResponse } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON text; chatty output is retried on the span between the first
 * '{' and the last '}'.
 */
function parseJsonText(text: string): Result<unknown> {
    try {
        return ok(JSON.parse(text));
    } catch (error) {
        const start = text.indexOf('{');
        const end = text.lastIndexOf('}');
        if (start !== -1 && end > start) {
            try {
                return ok(JSON.parse(text.substring(start, end + 1)));
            } catch {
                // fall through to the original parse error
            }
        }
        return err(`Failed to parse classifier response: ${describeError(error)}`);
    }
}

/**
 * Validate a classifier answer of the form `{ [envelopeKey]: [...] }`.
 *
 * A missing envelope key means "no findings". Unparseable text, a non-object
 * payload or a non-array envelope are failures. Items failing the schema are
 * dropped and counted.
 */
export function parseClassifierResponse<T>(
    raw: unknown,
    envelopeKey: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<ParsedResponse<T>> {
    let payload: unknown = raw;

    if (typeof raw === 'string') {
        if (!raw.trim()) return err('Empty classifier response');
        const parsed = parseJsonText(raw);
        if (!parsed.ok) return parsed;
        payload = parsed.value;
    }

    if (!isRecord(payload)) {
        return err('Classifier response is not a JSON object');
    }

    const items = payload[envelopeKey];
    if (items === undefined) {
        return ok({ candidates: [], dropped: 0 });
    }
    if (!Array.isArray(items)) {
        return err(`Classifier response field '${envelopeKey}' is not an array`);
    }

    const candidates: T[] = [];
    let dropped = 0;

    for (const item of items) {
        const result = itemSchema.safeParse(item);
        if (result.success) {
            candidates.push(result.data);
        } else {
            dropped++;
        }
    }

    return ok({ candidates, dropped });
}
