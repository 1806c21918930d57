import { createTestLogger } from "../../../utils/__tests__/helpers/testLogger";
import { MemoryDocumentStore } from "../../storage/__tests__/helpers/memoryDocumentStore";
import { ImportHandoff, ImportHandoffDocument } from "../importHandoff";

describe("ImportHandoff", () => {
    let store: MemoryDocumentStore<ImportHandoffDocument>;

    beforeEach(() => {
        store = new MemoryDocumentStore<ImportHandoffDocument>();
    });

    it("keeps approved items across a restart until a run drains them", async () => {
        const handoff = new ImportHandoff({ store });
        await handoff.load();
        expect(
            handoff.add([
                { artist: "Slint", album: "Spiderland", confidence: 0.9 },
                { artist: "slint", album: "SPIDERLAND", confidence: 0.4 },
                { artist: "Hum", album: "Downward Is Heavenward", confidence: 0.7 },
            ])
        ).toBe(2);
        await handoff.flush();

        const restarted = new ImportHandoff({ store });
        await restarted.load();

        expect(restarted.size).toBe(2);
        expect(restarted.drain()).toEqual([
            { artist: "Slint", album: "Spiderland", confidence: 0.9 },
            { artist: "Hum", album: "Downward Is Heavenward", confidence: 0.7 },
        ]);
        await restarted.flush();
        expect(store.document).toEqual({ version: 1, items: [] });
    });

    it("does not write when nothing changes", async () => {
        const handoff = new ImportHandoff({ store });

        expect(handoff.drain()).toEqual([]);
        expect(handoff.add([])).toBe(0);
        await handoff.flush();

        expect(store.writes).toBe(0);
    });

    it("starts empty when the stored document cannot be read", async () => {
        const logger = createTestLogger();
        const handoff = new ImportHandoff({ store, logger });
        jest.spyOn(store, "read").mockRejectedValue(new Error("disk unavailable"));

        await handoff.load();

        expect(handoff.size).toBe(0);
        expect(logger.error).toHaveBeenCalledWith(
            "Failed to load import handoff; starting empty",
            { error: expect.objectContaining({ message: "disk unavailable" }) }
        );
    });
});
