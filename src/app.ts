import express, { Express } from "express";
import { apiLimiter, recommendationRunLimiter } from "./middleware/rateLimiter";
import { errorHandler } from "./middleware/errorHandler";
import { createActionsRouter } from "./routes/actions";
import { createRecommendationsRouter } from "./routes/recommendations";
import type { BoundedCache } from "./services/cache/boundedCache";
import type { RecommendationProvider } from "./services/providers/types";
import type { RecommendationPipeline } from "./services/recommendations/pipeline";
import type { PipelineResult, PipelineSettings } from "./services/recommendations/types";
import type { ReviewActionHandler } from "./services/review/reviewActions";

export interface AppDeps {
    pipeline: RecommendationPipeline;
    cache: BoundedCache<string, PipelineResult>;
    actions: ReviewActionHandler;
    provider: RecommendationProvider;
    defaults: PipelineSettings;
}

export function createApp(deps: AppDeps): Express {
    const app = express();
    app.set("trust proxy", true);
    app.use(express.json({ limit: "256kb" }));
    app.use("/api", apiLimiter);

    app.get("/api/health", async (_req, res) => {
        const providerReachable = await deps.provider.testConnection();
        res.json({ status: "ok", provider: { id: deps.provider.id, reachable: providerReachable } });
    });

    app.use("/api/actions", createActionsRouter(deps.actions));
    app.use("/api/recommendations/run", recommendationRunLimiter);
    app.use(
        "/api/recommendations",
        createRecommendationsRouter({
            pipeline: deps.pipeline,
            cache: deps.cache,
            defaults: deps.defaults,
        })
    );

    app.use(errorHandler);
    return app;
}
