import request from "supertest";
import { createApp } from "../app";
import { BoundedCache } from "../services/cache/boundedCache";
import { HistoryDocument, SuggestionHistory } from "../services/history/suggestionHistory";
import { FakeLibrary } from "../services/library/__tests__/helpers/fakeLibrary";
import { FakeProvider } from "../services/providers/__tests__/helpers/fakeProvider";
import {
    RecommendationCacheKeyBuilder,
    StaticConfigVersionProvider,
} from "../services/recommendations/cacheKeyBuilder";
import { ImportHandoff } from "../services/recommendations/importHandoff";
import { RecommendationPipeline } from "../services/recommendations/pipeline";
import { ConfidenceSafetyGate } from "../services/recommendations/safetyGate";
import { StyleCatalog } from "../services/recommendations/styleCatalog";
import { BackfillStrategy, PipelineResult } from "../services/recommendations/types";
import { ApprovalSelection } from "../services/review/approvalSelection";
import { ReviewActionHandler } from "../services/review/reviewActions";
import { ReviewQueue, ReviewQueueDocument } from "../services/review/reviewQueue";
import { MemoryDocumentStore } from "../services/storage/__tests__/helpers/memoryDocumentStore";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";

describe("createApp", () => {
    let provider: FakeProvider;

    function buildApp() {
        provider = new FakeProvider([[{ artist: "Duster", album: "Stratosphere" }]]);
        const reviewQueue = new ReviewQueue({
            store: new MemoryDocumentStore<ReviewQueueDocument>(),
        });
        const history = new SuggestionHistory({
            store: new MemoryDocumentStore<HistoryDocument>(),
        });
        const handoff = new ImportHandoff();
        const cache = new BoundedCache<string, PipelineResult>({ maxSize: 5, sweepIntervalMs: 0 });
        const styleCatalog = new StyleCatalog();

        return createApp({
            pipeline: new RecommendationPipeline({
                provider,
                library: new FakeLibrary(),
                cache,
                reviewQueue,
                history,
                safetyGate: new ConfidenceSafetyGate(),
                cacheKeyBuilder: new RecommendationCacheKeyBuilder(
                    new StaticConfigVersionProvider("1"),
                    styleCatalog
                ),
                handoff,
                styleCatalog,
            }),
            cache,
            actions: new ReviewActionHandler({
                reviewQueue,
                history,
                selection: new ApprovalSelection(),
                handoff,
                provider,
            }),
            provider,
            defaults: {
                maxRecommendations: 5,
                mode: "albums",
                styleFilters: [],
                relaxStyleMatching: false,
                backfill: BackfillStrategy.Off,
                minConfidence: 0,
            },
        });
    }

    it("reports health with provider reachability", async () => {
        const res = await request(buildApp()).get("/api/health");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ status: "ok", provider: { id: "fake", reachable: true } });
    });

    it("maps provider outages to 503 through the error handler", async () => {
        const app = buildApp();
        provider.failWith = new AppError(
            ErrorCode.PROVIDER_UNAVAILABLE,
            ErrorCategory.TRANSIENT,
            "Provider fake request failed"
        );

        const res = await request(app).post("/api/recommendations/run").send({});

        expect(res.status).toBe(503);
        expect(res.body).toEqual({
            error: "Provider fake request failed",
            code: "PROVIDER_UNAVAILABLE",
            category: "TRANSIENT",
        });
    });

    it("returns 404 for actions outside the closed set", async () => {
        const res = await request(buildApp()).post("/api/actions/library/scan");

        expect(res.status).toBe(404);
        expect(res.body.code).toBe("UNKNOWN_ACTION");
    });
});
