import { SchemaValidator } from "../schemaValidator";

describe("SchemaValidator", () => {
    const validator = new SchemaValidator();

    it("repairs fixable items, drops malformed ones and reports every change", () => {
        const { items, report } = validator.validate(
            [
                { artist: "  Low ", album: "Trust", confidence: 1.4, year: 2002 },
                { artist: "Duster", album: "  ", confidence: 0.5 },
                { artist: "Slowdive", album: "Pygmalion", genre: " shoegaze ", confidence: NaN },
                { artist: "Cocteau Twins", album: "Heaven or Las Vegas", year: 90 },
                { album: "Orphan" },
            ],
            "albums"
        );

        expect(items).toEqual([
            { artist: "Low", album: "Trust", confidence: 1, year: 2002 },
            { artist: "Slowdive", album: "Pygmalion", genre: "shoegaze", confidence: 0 },
            { artist: "Cocteau Twins", album: "Heaven or Las Vegas", confidence: 0.5 },
        ]);
        expect(report).toEqual({
            totalItems: 5,
            droppedItems: 2,
            clampedConfidences: 2,
            trimmedFields: 2,
            warnings: [
                "Item 1 (Duster) has no album",
                "Item 2 has a non-numeric confidence",
                "Item 3 has an invalid year; ignored",
                "Item 4 has no artist",
            ],
        });
    });

    it("clears the album in artist mode", () => {
        const { items } = validator.validate(
            [
                { artist: "Low", album: "Trust", confidence: 0.7 },
                { artist: "Duster", confidence: -0.2 },
            ],
            "artists"
        );

        expect(items).toEqual([
            { artist: "Low", album: "", confidence: 0.7 },
            { artist: "Duster", album: "", confidence: 0 },
        ]);
    });
});
