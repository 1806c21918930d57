import request from "supertest";
import { HistoryDocument, SuggestionHistory } from "../../services/history/suggestionHistory";
import { FakeProvider } from "../../services/providers/__tests__/helpers/fakeProvider";
import { ImportHandoff } from "../../services/recommendations/importHandoff";
import { ApprovalSelection } from "../../services/review/approvalSelection";
import { ReviewActionHandler } from "../../services/review/reviewActions";
import {
    ReviewQueue,
    ReviewQueueDocument,
    ReviewStatus,
} from "../../services/review/reviewQueue";
import { MemoryDocumentStore } from "../../services/storage/__tests__/helpers/memoryDocumentStore";
import { createActionsRouter } from "../actions";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

describe("actions routes", () => {
    let reviewQueue: ReviewQueue;

    function createApp() {
        reviewQueue = new ReviewQueue({ store: new MemoryDocumentStore<ReviewQueueDocument>() });
        reviewQueue.enqueue([{ artist: "Duster", album: "Stratosphere", confidence: 0.8 }]);
        const actions = new ReviewActionHandler({
            reviewQueue,
            history: new SuggestionHistory({ store: new MemoryDocumentStore<HistoryDocument>() }),
            selection: new ApprovalSelection(),
            handoff: new ImportHandoff(),
            provider: new FakeProvider(),
        });
        return createRouteTestApp("/api/actions", createActionsRouter(actions));
    }

    it("dispatches a known action", async () => {
        const res = await request(createApp()).post("/api/actions/review/getqueue");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({
            options: [{ value: "Duster|Stratosphere", name: "Duster — Stratosphere (80%)" }],
        });
    });

    it("passes body parameters to the action", async () => {
        const res = await request(createApp())
            .post("/api/actions/Review/Accept")
            .send({ artist: "Duster", album: "Stratosphere" });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ ok: true });
        expect(reviewQueue.getStatus("Duster", "Stratosphere")).toBe(ReviewStatus.Accepted);
    });

    it("answers unknown actions with 404 and a structured error", async () => {
        const res = await request(createApp()).post("/api/actions/review/explode");

        expect(res.status).toBe(404);
        expect(res.body).toEqual({
            ok: false,
            code: "UNKNOWN_ACTION",
            error: "Unknown action: review/explode",
        });
    });

    it("rejects nested parameters", async () => {
        const res = await request(createApp())
            .post("/api/actions/review/accept")
            .send({ artist: { name: "Duster" } });

        expect(res.status).toBe(400);
        expect(res.body).toEqual({
            error: "Action parameters must be a flat object",
            ok: false,
            code: "INVALID_PARAMS",
        });
    });
});
