import { ConfidenceSafetyGate } from "../safetyGate";
import { BackfillStrategy, PipelineSettings } from "../types";

const settings: PipelineSettings = {
    maxRecommendations: 10,
    mode: "albums",
    styleFilters: [],
    relaxStyleMatching: false,
    backfill: BackfillStrategy.Off,
    minConfidence: 0.5,
};

describe("ConfidenceSafetyGate", () => {
    const gate = new ConfidenceSafetyGate({ blockedTerms: [" Explicit ", ""] });

    it("allows confident items without blocked terms", () => {
        expect(
            gate.evaluate({ artist: "Low", album: "Trust", confidence: 0.5 }, settings)
        ).toEqual({ allowed: true });
    });

    it("vetoes items below the minimum confidence", () => {
        expect(
            gate.evaluate({ artist: "Low", album: "Trust", confidence: 0.3 }, settings)
        ).toEqual({ allowed: false, reason: "Safety gate (confidence 0.30 < 0.50)" });
    });

    it("vetoes items mentioning a blocked term in any text field", () => {
        expect(
            gate.evaluate(
                {
                    artist: "Someone",
                    album: "Record",
                    reason: "An EXPLICIT classic",
                    confidence: 0.9,
                },
                settings
            )
        ).toEqual({ allowed: false, reason: 'Safety gate (blocked term "explicit")' });
    });
});
