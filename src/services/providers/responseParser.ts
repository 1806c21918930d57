import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import type { RawRecommendation } from "../recommendations/types";

const rawRecommendationSchema = z.object({
    artist: z.string().nullish(),
    album: z.string().nullish(),
    genre: z.string().nullish(),
    reason: z.string().nullish(),
    confidence: z.coerce.number().nullish(),
    year: z.coerce.number().int().nullish().catch(null),
});

const payloadSchema = z.union([
    z.object({ recommendations: z.array(z.unknown()) }),
    z.array(z.unknown()),
]);

export interface ParsedPayload {
    items: RawRecommendation[];
    /** Entries that were not recommendation-shaped objects */
    skipped: number;
}

/**
 * Remove markdown code fences a model may wrap around its JSON.
 */
export function stripCodeFences(content: string): string {
    const trimmed = content.trim();
    if (trimmed.startsWith("```json")) {
        return trimmed.replace(/```json\n?/g, "").replace(/```\n?/g, "").trim();
    }
    if (trimmed.startsWith("```")) {
        return trimmed.replace(/```\n?/g, "").trim();
    }
    return trimmed;
}

/**
 * Parses a chat completion body into loose recommendation items. Accepts
 * `{ "recommendations": [...] }` or a bare array.
 */
export function parseRecommendationPayload(content: string): ParsedPayload {
    let json: unknown;
    try {
        json = JSON.parse(stripCodeFences(content));
    } catch {
        throw new AppError(
            ErrorCode.PROVIDER_RESPONSE_INVALID,
            ErrorCategory.TRANSIENT,
            "Provider returned malformed JSON",
            { preview: content.slice(0, 200) }
        );
    }

    const payload = payloadSchema.safeParse(json);
    if (!payload.success) {
        throw new AppError(
            ErrorCode.PROVIDER_RESPONSE_INVALID,
            ErrorCategory.TRANSIENT,
            "Provider response has no recommendations list"
        );
    }

    const entries = Array.isArray(payload.data) ? payload.data : payload.data.recommendations;
    const items: RawRecommendation[] = [];
    let skipped = 0;
    for (const entry of entries) {
        const parsed = rawRecommendationSchema.safeParse(entry);
        if (parsed.success) {
            items.push(parsed.data);
        } else {
            skipped++;
        }
    }
    return { items, skipped };
}
