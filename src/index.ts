import path from "path";
import { createApp } from "./app";
import { config } from "./config";
import { BoundedCache } from "./services/cache/boundedCache";
import {
    historyDocumentSchema,
    SuggestionHistory,
} from "./services/history/suggestionHistory";
import { LidarrLibraryCatalog } from "./services/library/lidarrLibrary";
import { OpenAICompatibleProvider } from "./services/providers/openaiProvider";
import { ProviderRateLimiter } from "./services/rateLimiter";
import {
    RecommendationCacheKeyBuilder,
    StaticConfigVersionProvider,
} from "./services/recommendations/cacheKeyBuilder";
import {
    ImportHandoff,
    importHandoffDocumentSchema,
} from "./services/recommendations/importHandoff";
import { RecommendationPipeline } from "./services/recommendations/pipeline";
import { ConfidenceSafetyGate } from "./services/recommendations/safetyGate";
import { StyleCatalog } from "./services/recommendations/styleCatalog";
import {
    BackfillStrategy,
    PipelineResult,
    PipelineSettings,
} from "./services/recommendations/types";
import {
    ApprovalSelection,
    approvalSelectionDocumentSchema,
} from "./services/review/approvalSelection";
import { ReviewActionHandler } from "./services/review/reviewActions";
import {
    ReviewQueue,
    reviewQueueDocumentSchema,
} from "./services/review/reviewQueue";
import { JsonDocumentStore } from "./services/storage/jsonDocumentStore";
import { getLogLevel, logger, setLogLevel } from "./utils/logger";

const BACKFILL_BY_SETTING: Record<typeof config.recommendations.backfill, BackfillStrategy> = {
    off: BackfillStrategy.Off,
    standard: BackfillStrategy.Standard,
    aggressive: BackfillStrategy.Aggressive,
};

async function main(): Promise<void> {
    setLogLevel(config.logLevel);
    const dataFile = (name: string) => path.join(config.dataDir, name);

    const reviewQueue = new ReviewQueue({
        store: new JsonDocumentStore({
            filePath: dataFile("review_queue.json"),
            schema: reviewQueueDocumentSchema,
        }),
    });
    const history = new SuggestionHistory({
        store: new JsonDocumentStore({
            filePath: dataFile("recommendation_history.json"),
            schema: historyDocumentSchema,
        }),
        rejectGuardMs: config.history.rejectGuardMs,
        rejectWindowMs: config.history.rejectWindowMs,
    });
    const selection = new ApprovalSelection({
        store: new JsonDocumentStore({
            filePath: dataFile("review_selection.json"),
            schema: approvalSelectionDocumentSchema,
        }),
    });
    const handoff = new ImportHandoff({
        store: new JsonDocumentStore({
            filePath: dataFile("import_handoff.json"),
            schema: importHandoffDocumentSchema,
        }),
    });
    await Promise.all([
        reviewQueue.load(),
        history.load(),
        selection.load(),
        handoff.load(),
    ]);

    const rateLimiter = new ProviderRateLimiter();
    const provider = new OpenAICompatibleProvider({
        id: config.provider.id,
        baseUrl: config.provider.baseUrl,
        apiKey: config.provider.apiKey,
        model: config.provider.model,
        timeoutMs: config.provider.timeoutMs,
        scheduler: rateLimiter,
    });
    const library = new LidarrLibraryCatalog({
        url: config.lidarr.url,
        apiKey: config.lidarr.apiKey,
    });

    const cache = new BoundedCache<string, PipelineResult>({
        maxSize: config.cache.maxSize,
        defaultTtlMs: config.cache.ttlMs,
        sweepIntervalMs: config.cache.sweepIntervalMs,
        logger: logger.child("cache"),
    });
    const styleCatalog = new StyleCatalog();

    const pipeline = new RecommendationPipeline({
        provider,
        library,
        cache,
        reviewQueue,
        history,
        safetyGate: new ConfidenceSafetyGate({
            blockedTerms: config.recommendations.blockedTerms,
        }),
        cacheKeyBuilder: new RecommendationCacheKeyBuilder(
            new StaticConfigVersionProvider(config.plannerConfigVersion),
            styleCatalog
        ),
        handoff,
        styleCatalog,
    });
    const actions = new ReviewActionHandler({
        reviewQueue,
        history,
        selection,
        handoff,
        provider,
    });

    const defaults: PipelineSettings = {
        maxRecommendations: config.recommendations.maxRecommendations,
        mode: config.recommendations.mode,
        styleFilters: config.recommendations.styleFilters,
        relaxStyleMatching: config.recommendations.relaxStyleMatching,
        backfill: BACKFILL_BY_SETTING[config.recommendations.backfill],
        minConfidence: config.recommendations.minConfidence,
    };

    const app = createApp({ pipeline, cache, actions, provider, defaults });
    const server = app.listen(config.port, () => {
        logger.info(`Crate planner listening on port ${config.port}`, {
            dataDir: config.dataDir,
            provider: config.provider.id,
            logLevel: getLogLevel(),
        });
    });

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        server.close();
        cache.dispose();
        Promise.all([
            reviewQueue.flush(),
            history.flush(),
            selection.flush(),
            handoff.flush(),
            rateLimiter.drain(),
        ]).then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error("Shutdown flush failed", { error });
                process.exit(1);
            }
        );
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
    logger.error("Failed to start", { error });
    process.exit(1);
});
