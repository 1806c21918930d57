import { Router } from "express";
import { z } from "zod";
import type { BoundedCache } from "../services/cache/boundedCache";
import type { RecommendationPipeline } from "../services/recommendations/pipeline";
import {
    BackfillStrategy,
    PipelineResult,
    PipelineSettings,
} from "../services/recommendations/types";
import { sendRouteError } from "./routeErrorResponse";

const runRequestSchema = z
    .object({
        maxRecommendations: z.number().int().min(1).max(100),
        mode: z.enum(["albums", "artists"]),
        styleFilters: z.array(z.string().max(100)).max(50),
        relaxStyleMatching: z.boolean(),
        backfill: z.nativeEnum(BackfillStrategy),
        minConfidence: z.number().min(0).max(1),
    })
    .partial()
    .strict();

export interface RecommendationRoutesDeps {
    pipeline: RecommendationPipeline;
    cache: BoundedCache<string, PipelineResult>;
    defaults: PipelineSettings;
}

export function createRecommendationsRouter({
    pipeline,
    cache,
    defaults,
}: RecommendationRoutesDeps): Router {
    const router = Router();

    // POST /run - body overrides the configured defaults
    router.post("/run", async (req, res, next) => {
        const parsed = runRequestSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            return sendRouteError(res, 400, "Invalid settings", {
                issues: parsed.error.errors.map(
                    (issue) => `${issue.path.join(".")}: ${issue.message}`
                ),
            });
        }

        const controller = new AbortController();
        res.on("close", () => {
            if (!res.writableFinished) controller.abort();
        });

        try {
            const result = await pipeline.run(
                { ...defaults, ...parsed.data },
                controller.signal
            );
            return res.json(result);
        } catch (error) {
            next(error);
        }
    });

    router.get("/cache", (_req, res) => {
        res.json(cache.statistics());
    });

    return router;
}
