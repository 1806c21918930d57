/**
 * Recommendation pipeline
 *
 * Stage order for every provider batch:
 *   Sanitize → SchemaValidate → Deduplicate → StyleGuard → SafetyGate
 *   → CacheConsult → TopUp → Truncate
 *
 * run() consults the cache before asking the provider for a fresh batch, so
 * concurrent runs with the same key share one provider call. Items removed by
 * exclusion, style or safety checks are offered to the review queue instead
 * of being discarded.
 */

import { waitWithSignal } from "../../utils/async";
import { isCancellation, requireDependency } from "../../utils/errors";
import { buildItemKey } from "../../utils/itemKey";
import { createLogger, Logger, withLogTiming } from "../../utils/logger";
import { BoundedCache } from "../cache/boundedCache";
import type { SuggestionHistory } from "../history/suggestionHistory";
import type { LibraryCatalog, LibrarySnapshot } from "../library/types";
import type { RecommendationProvider } from "../providers/types";
import type { ReviewQueue } from "../review/reviewQueue";
import { RecommendationCacheKeyBuilder } from "./cacheKeyBuilder";
import { Deduplicator } from "./deduplicator";
import { ImportHandoff } from "./importHandoff";
import { RecommendationPromptBuilder } from "./promptBuilder";
import type { SafetyGate } from "./safetyGate";
import { RecommendationSanitizer } from "./sanitizer";
import { SchemaValidator } from "./schemaValidator";
import { StyleCatalog } from "./styleCatalog";
import { StyleGuard } from "./styleGuard";
import { TopUpPlanner } from "./topUpPlanner";
import {
    BackfillStrategy,
    emptyValidationReport,
    FilteredRecommendation,
    mergeValidationReports,
    PipelineResult,
    PipelineSettings,
    RawRecommendation,
    Recommendation,
    ValidationReport,
} from "./types";

export interface RecommendationPipelineDeps {
    provider: RecommendationProvider;
    library: LibraryCatalog;
    cache: BoundedCache<string, PipelineResult>;
    reviewQueue: ReviewQueue;
    history: SuggestionHistory;
    safetyGate: SafetyGate;
    cacheKeyBuilder: RecommendationCacheKeyBuilder;
    handoff: ImportHandoff;
    styleCatalog?: StyleCatalog;
    promptBuilder?: RecommendationPromptBuilder;
    logger?: Logger;
}

interface BatchState {
    library: LibrarySnapshot;
    settings: PipelineSettings;
    seen: Set<string>;
    filtered: FilteredRecommendation[];
    report: ValidationReport;
}

function uniqueByKey(items: Recommendation[]): Recommendation[] {
    const seen = new Set<string>();
    return items.filter((item) => {
        const key = buildItemKey(item.artist, item.album);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

export class RecommendationPipeline {
    private readonly provider: RecommendationProvider;
    private readonly library: LibraryCatalog;
    private readonly cache: BoundedCache<string, PipelineResult>;
    private readonly reviewQueue: ReviewQueue;
    private readonly history: SuggestionHistory;
    private readonly safetyGate: SafetyGate;
    private readonly cacheKeyBuilder: RecommendationCacheKeyBuilder;
    private readonly handoff: ImportHandoff;
    private readonly promptBuilder: RecommendationPromptBuilder;
    private readonly sanitizer = new RecommendationSanitizer();
    private readonly validator = new SchemaValidator();
    private readonly deduplicator: Deduplicator;
    private readonly styleGuard: StyleGuard;
    private readonly topUpPlanner: TopUpPlanner;
    private readonly log: Logger;

    constructor(deps: RecommendationPipelineDeps) {
        this.provider = requireDependency(deps.provider, "provider");
        this.library = requireDependency(deps.library, "library");
        this.cache = requireDependency(deps.cache, "cache");
        this.reviewQueue = requireDependency(deps.reviewQueue, "reviewQueue");
        this.history = requireDependency(deps.history, "history");
        this.safetyGate = requireDependency(deps.safetyGate, "safetyGate");
        this.cacheKeyBuilder = requireDependency(deps.cacheKeyBuilder, "cacheKeyBuilder");
        this.handoff = requireDependency(deps.handoff, "handoff");
        this.log = deps.logger ?? createLogger("pipeline");
        this.promptBuilder = deps.promptBuilder ?? new RecommendationPromptBuilder();

        this.deduplicator = new Deduplicator(this.history, this.reviewQueue);
        this.styleGuard = new StyleGuard(deps.styleCatalog ?? new StyleCatalog());
        this.topUpPlanner = new TopUpPlanner(
            this.provider,
            this.promptBuilder,
            this.log.child("top-up")
        );
    }

    /**
     * Full run: merges released review items, then serves the cached batch or
     * computes a fresh one. The signal only abandons this caller's wait; a
     * shared computation keeps going and still fills the cache. When the run
     * fails, released items go back to the handoff.
     */
    async run(settings: PipelineSettings, signal?: AbortSignal): Promise<PipelineResult> {
        return withLogTiming(
            this.log,
            "Recommendation run",
            async () => {
                const released = uniqueByKey([
                    ...this.reviewQueue.dequeueAccepted(),
                    ...this.handoff.drain(),
                ]);

                let cacheKey: string | undefined;
                let computedHere = false;
                let batch: PipelineResult;
                try {
                    const library = await waitWithSignal(
                        this.library.getSnapshot(signal),
                        signal,
                        "library snapshot"
                    );
                    const key = this.cacheKeyBuilder.build({
                        providerId: this.provider.id,
                        libraryFingerprint: library.fingerprint,
                        settings,
                    });
                    cacheKey = key;
                    batch = await this.cache.getOrCompute(
                        key,
                        async () => {
                            computedHere = true;
                            return this.computeFresh(settings, library);
                        },
                        { signal }
                    );
                } catch (error) {
                    if (!isCancellation(error)) {
                        // Released items left the queue; keep them for the next run.
                        this.handoff.add(released);
                        throw error;
                    }
                    this.log.info("Recommendation run cancelled; returning released items");
                    this.history.recordSuggestions(released);
                    return {
                        recommendations: released.slice(0, settings.maxRecommendations),
                        filtered: [],
                        report: emptyValidationReport(),
                        topUpAttempts: 0,
                        released: released.length,
                        cancelled: true,
                        cacheKey,
                    };
                }

                const releasedKeys = new Set(
                    released.map((item) => buildItemKey(item.artist, item.album))
                );
                const recommendations = [
                    ...released,
                    ...batch.recommendations.filter(
                        (item) => !releasedKeys.has(buildItemKey(item.artist, item.album))
                    ),
                ].slice(0, settings.maxRecommendations);

                this.history.recordSuggestions(
                    computedHere
                        ? recommendations
                        : recommendations.filter((item) =>
                              releasedKeys.has(buildItemKey(item.artist, item.album))
                          )
                );

                return {
                    ...batch,
                    recommendations,
                    released: released.length,
                    cacheKey,
                };
            },
            { providerId: this.provider.id, max: settings.maxRecommendations }
        );
    }

    /**
     * Runs the filtering stages, top-up and truncation on a given batch.
     * On cancellation the items that already passed are returned.
     */
    async processBatch(
        candidates: RawRecommendation[],
        settings: PipelineSettings,
        signal?: AbortSignal
    ): Promise<PipelineResult> {
        const library = await this.library.getSnapshot(signal);
        return this.processWithSnapshot(candidates, settings, library, signal);
    }

    private async computeFresh(
        settings: PipelineSettings,
        library: LibrarySnapshot
    ): Promise<PipelineResult> {
        const prompt = this.promptBuilder.build({
            count: settings.maxRecommendations,
            mode: settings.mode,
            styleFilters: settings.styleFilters,
            avoid: this.history.getExclusions(),
        });
        const candidates = await this.provider.getRecommendations(prompt);
        return this.processWithSnapshot(candidates, settings, library);
    }

    private async processWithSnapshot(
        candidates: RawRecommendation[],
        settings: PipelineSettings,
        library: LibrarySnapshot,
        signal?: AbortSignal
    ): Promise<PipelineResult> {
        const state: BatchState = {
            library,
            settings,
            seen: new Set(),
            filtered: [],
            report: emptyValidationReport(),
        };

        const accepted = this.runFilterStages(candidates, state);
        let topUpAttempts = 0;
        let cancelled = signal?.aborted ?? false;

        if (
            !cancelled &&
            accepted.length > 0 &&
            accepted.length < settings.maxRecommendations &&
            settings.backfill !== BackfillStrategy.Off
        ) {
            const outcome = await this.topUpPlanner.topUp({
                deficit: settings.maxRecommendations - accepted.length,
                settings,
                avoid: [...this.history.getExclusions(), ...accepted],
                filter: (batch) => this.runFilterStages(batch, state),
                signal,
            });
            accepted.push(...outcome.items);
            topUpAttempts = outcome.attempts;
            cancelled = outcome.cancelled;
        }

        this.offerForReview(state.filtered);

        const recommendations = accepted.slice(0, settings.maxRecommendations);
        this.log.debug("Batch processed", {
            received: candidates.length,
            accepted: recommendations.length,
            filtered: state.filtered.length,
            topUpAttempts,
        });

        return {
            recommendations,
            filtered: state.filtered,
            report: state.report,
            topUpAttempts,
            released: 0,
            cancelled,
        };
    }

    private runFilterStages(batch: RawRecommendation[], state: BatchState): Recommendation[] {
        const { settings } = state;

        const sanitized = this.sanitizer.sanitize(batch, settings.mode);
        const validated = this.validator.validate(sanitized.items, settings.mode);
        state.report = mergeValidationReports(state.report, {
            ...validated.report,
            totalItems: batch.length,
            droppedItems: validated.report.droppedItems + sanitized.dropped,
            warnings: [...sanitized.warnings, ...validated.report.warnings],
        });

        const deduplicated = this.deduplicator.apply(validated.items, {
            library: state.library,
            mode: settings.mode,
            seen: state.seen,
        });
        const styled = this.styleGuard.apply(
            deduplicated.kept,
            settings.styleFilters,
            settings.relaxStyleMatching
        );

        const safe: Recommendation[] = [];
        const vetoed: FilteredRecommendation[] = [];
        for (const recommendation of styled.kept) {
            const verdict = this.safetyGate.evaluate(recommendation, settings);
            if (verdict.allowed) {
                safe.push(recommendation);
            } else {
                vetoed.push({
                    recommendation,
                    stage: "safety",
                    reason: verdict.reason,
                    reviewable: true,
                });
            }
        }

        state.filtered.push(...deduplicated.filtered, ...styled.filtered, ...vetoed);
        return safe;
    }

    private offerForReview(filtered: FilteredRecommendation[]): void {
        const byReason = new Map<string, Recommendation[]>();
        for (const entry of filtered) {
            if (!entry.reviewable) continue;
            const group = byReason.get(entry.reason) ?? [];
            group.push(entry.recommendation);
            byReason.set(entry.reason, group);
        }

        for (const [reason, items] of byReason) {
            this.reviewQueue.enqueue(items, reason);
        }
    }
}
