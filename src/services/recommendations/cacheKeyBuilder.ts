import { buildSha256CacheKey } from "../cacheHelpers";
import { StyleCatalog } from "./styleCatalog";
import type { PipelineSettings } from "./types";

/**
 * Supplies the planner/config version folded into cache keys. Bumping it
 * invalidates every cached pipeline result.
 */
export interface ConfigVersionProvider {
    getVersion(): string;
}

export class StaticConfigVersionProvider implements ConfigVersionProvider {
    constructor(private readonly version: string) {}

    getVersion(): string {
        return this.version;
    }
}

export interface CacheKeyInput {
    providerId: string;
    libraryFingerprint: string;
    settings: PipelineSettings;
}

export class RecommendationCacheKeyBuilder {
    constructor(
        private readonly versionProvider: ConfigVersionProvider,
        private readonly catalog: StyleCatalog
    ) {}

    /**
     * Same inputs give the same key. Every setting that changes which items
     * survive is part of the identity; style filters are compared as a sorted
     * set of slugs so their order and spelling do not matter.
     */
    build({ providerId, libraryFingerprint, settings }: CacheKeyInput): string {
        const identity = [
            `provider=${providerId.trim().toLowerCase()}`,
            `max=${settings.maxRecommendations}`,
            `library=${libraryFingerprint}`,
            `version=${this.versionProvider.getVersion()}`,
            `mode=${settings.mode}`,
            `styles=${this.catalog.normalizeAll(settings.styleFilters).join(",")}`,
            `relaxed=${settings.relaxStyleMatching ? 1 : 0}`,
            `backfill=${settings.backfill}`,
            `minConfidence=${settings.minConfidence}`,
        ].join("|");

        return buildSha256CacheKey({ identity, suffix: "recommendations" });
    }
}
