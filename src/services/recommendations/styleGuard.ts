import type { FilteredRecommendation, Recommendation } from "./types";
import { StyleCatalog } from "./styleCatalog";

export interface StyleGuardOutcome {
    kept: Recommendation[];
    filtered: FilteredRecommendation[];
}

/**
 * Keeps items whose genres intersect the configured style filters. In
 * relaxed mode nothing is removed; matching items move ahead of the rest.
 */
export class StyleGuard {
    constructor(private readonly catalog: StyleCatalog) {}

    apply(
        items: Recommendation[],
        styleFilters: string[],
        relaxed: boolean
    ): StyleGuardOutcome {
        const wanted = new Set(this.catalog.normalizeAll(styleFilters));
        if (wanted.size === 0) {
            return { kept: [...items], filtered: [] };
        }

        const matching: Recommendation[] = [];
        const others: Recommendation[] = [];
        for (const item of items) {
            const matches = this.catalog
                .genreSlugs(item.genre)
                .some((slug) => wanted.has(slug));
            (matches ? matching : others).push(item);
        }

        if (relaxed) {
            return { kept: [...matching, ...others], filtered: [] };
        }

        return {
            kept: matching,
            filtered: others.map((recommendation): FilteredRecommendation => ({
                recommendation,
                stage: "style",
                reason: recommendation.genre
                    ? `Style mismatch (${recommendation.genre})`
                    : "Style mismatch (no genre)",
                reviewable: true,
            })),
        };
    }
}
