/**
 * Shared recommendation types
 */

/** Provider output before sanitizing and validation */
export interface RawRecommendation {
    artist?: string | null;
    album?: string | null;
    genre?: string | null;
    reason?: string | null;
    confidence?: number | null;
    year?: number | null;
}

export interface Recommendation {
    artist: string;
    /** Empty in artist mode */
    album: string;
    genre?: string;
    reason?: string;
    /** Always within [0, 1] */
    confidence: number;
    year?: number;
}

export type RecommendationMode = "albums" | "artists";

export enum BackfillStrategy {
    Off = "off",
    Standard = "standard",
    Aggressive = "aggressive",
}

export interface PipelineSettings {
    maxRecommendations: number;
    mode: RecommendationMode;
    styleFilters: string[];
    relaxStyleMatching: boolean;
    backfill: BackfillStrategy;
    minConfidence: number;
}

export interface ValidationReport {
    totalItems: number;
    droppedItems: number;
    clampedConfidences: number;
    trimmedFields: number;
    warnings: string[];
}

export type PipelineStage =
    | "sanitize"
    | "validate"
    | "deduplicate"
    | "style"
    | "safety";

export interface FilteredRecommendation {
    recommendation: Recommendation;
    stage: Exclude<PipelineStage, "sanitize" | "validate">;
    reason: string;
    /** False for items that are already owned or repeated within the batch */
    reviewable: boolean;
}

export interface PipelineResult {
    recommendations: Recommendation[];
    filtered: FilteredRecommendation[];
    report: ValidationReport;
    topUpAttempts: number;
    /** Items released from the review queue and merged ahead of the batch */
    released: number;
    cancelled: boolean;
    cacheKey?: string;
}

export function emptyValidationReport(): ValidationReport {
    return {
        totalItems: 0,
        droppedItems: 0,
        clampedConfidences: 0,
        trimmedFields: 0,
        warnings: [],
    };
}

export function mergeValidationReports(
    target: ValidationReport,
    source: ValidationReport
): ValidationReport {
    return {
        totalItems: target.totalItems + source.totalItems,
        droppedItems: target.droppedItems + source.droppedItems,
        clampedConfidences: target.clampedConfidences + source.clampedConfidences,
        trimmedFields: target.trimmedFields + source.trimmedFields,
        warnings: [...target.warnings, ...source.warnings],
    };
}
