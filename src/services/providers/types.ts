import type { RawRecommendation } from "../recommendations/types";

/**
 * A generative source of candidate recommendations. Implementations may be
 * slow and may fail; the pipeline never caches a failed call.
 */
export interface RecommendationProvider {
    /** Stable identity used in cache keys */
    readonly id: string;
    getRecommendations(prompt: string, signal?: AbortSignal): Promise<RawRecommendation[]>;
    testConnection(): Promise<boolean>;
    listModels(): Promise<string[]>;
}
