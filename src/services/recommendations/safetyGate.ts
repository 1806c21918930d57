import type { PipelineSettings, Recommendation } from "./types";

export type SafetyVerdict = { allowed: true } | { allowed: false; reason: string };

/**
 * Veto policy applied after style filtering. Implementations must be pure
 * with respect to the item: same input, same verdict.
 */
export interface SafetyGate {
    evaluate(recommendation: Recommendation, settings: PipelineSettings): SafetyVerdict;
}

export interface ConfidenceSafetyGateOptions {
    /** Case-insensitive terms that veto an item when found in any text field */
    blockedTerms?: string[];
}

/**
 * Default policy: vetoes items below the configured minimum confidence and
 * items mentioning a blocked term.
 */
export class ConfidenceSafetyGate implements SafetyGate {
    private readonly blockedTerms: string[];

    constructor(options: ConfidenceSafetyGateOptions = {}) {
        this.blockedTerms = (options.blockedTerms ?? [])
            .map((term) => term.trim().toLowerCase())
            .filter((term) => term.length > 0);
    }

    evaluate(recommendation: Recommendation, settings: PipelineSettings): SafetyVerdict {
        if (recommendation.confidence < settings.minConfidence) {
            return {
                allowed: false,
                reason: `Safety gate (confidence ${recommendation.confidence.toFixed(2)} < ${settings.minConfidence.toFixed(2)})`,
            };
        }

        const text = [
            recommendation.artist,
            recommendation.album,
            recommendation.genre,
            recommendation.reason,
        ]
            .filter((value): value is string => typeof value === "string")
            .join(" ")
            .toLowerCase();
        const blocked = this.blockedTerms.find((term) => text.includes(term));
        if (blocked) {
            return { allowed: false, reason: `Safety gate (blocked term "${blocked}")` };
        }

        return { allowed: true };
    }
}
