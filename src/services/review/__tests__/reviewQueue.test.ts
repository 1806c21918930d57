import { MemoryDocumentStore } from "../../storage/__tests__/helpers/memoryDocumentStore";
import { ApprovalSelection } from "../approvalSelection";
import { ReviewQueue, ReviewQueueDocument, ReviewStatus } from "../reviewQueue";

describe("ReviewQueue", () => {
    let clock: Date;
    let store: MemoryDocumentStore<ReviewQueueDocument>;

    beforeEach(() => {
        clock = new Date("2024-05-10T08:00:00.000Z");
        store = new MemoryDocumentStore<ReviewQueueDocument>();
    });

    function createQueue() {
        return new ReviewQueue({ store, now: () => clock });
    }

    it("fails fast without a store", () => {
        const options = { store, now: () => clock };
        Reflect.deleteProperty(options, "store");

        expect(() => new ReviewQueue(options)).toThrow("Missing required collaborator: store");
    });

    it("applies an artist-wide status only to that exact artist", async () => {
        const queue = createQueue();
        await queue.load();
        queue.enqueue([
            { artist: "a", album: "First", confidence: 0.5 },
            { artist: "a|b", album: "Second", confidence: 0.5 },
            { artist: "A", album: "Third", confidence: 0.5 },
        ]);

        expect(queue.setArtistStatus("a", ReviewStatus.NeverAgain)).toBe(2);

        expect(queue.getStatus("a", "First")).toBe(ReviewStatus.NeverAgain);
        expect(queue.getStatus("A", "Third")).toBe(ReviewStatus.NeverAgain);
        expect(queue.getStatus("a|b", "Second")).toBe(ReviewStatus.Pending);
    });

    it("enqueues new items as pending and skips known keys", async () => {
        const queue = createQueue();
        await queue.load();

        expect(
            queue.enqueue(
                [
                    { artist: "Duster", album: "Stratosphere", confidence: 0.8 },
                    { artist: "Low", album: "Secret Name", confidence: 0.6 },
                ],
                "Style mismatch (genre)"
            )
        ).toBe(2);
        queue.setStatus("Low", "Secret Name", ReviewStatus.Rejected);

        expect(
            queue.enqueue([{ artist: "low", album: "SECRET NAME ", confidence: 0.9 }])
        ).toBe(0);
        expect(queue.getStatus("Low", "Secret Name")).toBe(ReviewStatus.Rejected);
        expect(queue.getCounts()).toEqual({ pending: 1, accepted: 0, rejected: 1, never: 0 });
    });

    it("lists pending items newest first", async () => {
        const queue = createQueue();
        queue.enqueue([{ artist: "Older", album: "A", confidence: 0.5 }]);
        clock = new Date("2024-05-11T08:00:00.000Z");
        queue.enqueue([{ artist: "Newer", album: "B", confidence: 0.5 }]);

        expect(queue.getPending().map((item) => item.artist)).toEqual(["Newer", "Older"]);
    });

    it("returns false when setting the status of an unknown item", () => {
        const queue = createQueue();

        expect(queue.setStatus("Nobody", "Nothing", ReviewStatus.Accepted)).toBe(false);
        expect(store.writes).toBe(0);
    });

    it("dequeues accepted items and persists the remainder", async () => {
        const queue = createQueue();
        queue.enqueue([
            { artist: "Duster", album: "Stratosphere", genre: "slowcore", confidence: 0.8 },
            { artist: "Low", album: "Secret Name", confidence: 0.6 },
        ]);
        queue.setStatus("Duster", "Stratosphere", ReviewStatus.Accepted, "yes");

        expect(queue.dequeueAccepted()).toEqual([
            {
                artist: "Duster",
                album: "Stratosphere",
                genre: "slowcore",
                reason: undefined,
                confidence: 0.8,
                year: undefined,
            },
        ]);
        expect(queue.dequeueAccepted()).toEqual([]);

        await queue.flush();
        expect(store.document?.items.map((item) => item.artist)).toEqual(["Low"]);
    });

    it("applies a status to every album by an artist", () => {
        const queue = createQueue();
        queue.enqueue([
            { artist: "Low", album: "Secret Name", confidence: 0.6 },
            { artist: "Low", album: "Trust", confidence: 0.6 },
            { artist: "Lowercase", album: "Kill the Lights", confidence: 0.6 },
        ]);

        expect(queue.setArtistStatus("LOW", ReviewStatus.NeverAgain)).toBe(2);
        expect(queue.getStatus("Lowercase", "Kill the Lights")).toBe(ReviewStatus.Pending);
    });

    it("survives a reload from its store", async () => {
        const first = createQueue();
        first.enqueue([{ artist: "Duster", album: "Stratosphere", confidence: 0.8 }]);
        await first.flush();

        const second = createQueue();
        await second.load();

        expect(second.getItems()).toEqual([
            {
                artist: "Duster",
                album: "Stratosphere",
                confidence: 0.8,
                status: ReviewStatus.Pending,
                createdAt: "2024-05-10T08:00:00.000Z",
            },
        ]);
    });

    it("keeps in-memory state when persistence fails", async () => {
        const queue = createQueue();
        store.failWrites = true;

        queue.enqueue([{ artist: "Duster", album: "Stratosphere", confidence: 0.8 }]);
        await queue.flush();

        expect(queue.getCounts().pending).toBe(1);
        expect(store.document).toBeNull();
    });

    it("clears items by status and empties a selection", () => {
        const queue = createQueue();
        const selection = new ApprovalSelection();
        queue.enqueue([
            { artist: "A", album: "1", confidence: 0.5 },
            { artist: "B", album: "2", confidence: 0.5 },
        ]);
        queue.setStatus("A", "1", ReviewStatus.Rejected);
        selection.replace([{ artist: "B", album: "2" }]);

        expect(queue.clearSelection(selection)).toBe(1);
        expect(selection.getKeys()).toEqual([]);
        expect(queue.getStatus("B", "2")).toBe(ReviewStatus.Pending);

        expect(queue.clear(ReviewStatus.Rejected)).toBe(1);
        expect(queue.clear()).toBe(1);
        expect(queue.getItems()).toEqual([]);
    });
});
