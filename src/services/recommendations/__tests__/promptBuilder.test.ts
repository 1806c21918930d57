import { RecommendationPromptBuilder } from "../promptBuilder";

describe("RecommendationPromptBuilder", () => {
    const builder = new RecommendationPromptBuilder();

    it("lists the count, styles and items to avoid", () => {
        const prompt = builder.build({
            count: 5,
            mode: "albums",
            styleFilters: ["shoegaze", "dream-pop"],
            avoid: [
                { artist: "Low", album: "Trust" },
                { artist: "Duster", album: "" },
            ],
        });

        expect(prompt.split("\n").slice(0, 4)).toEqual([
            "Recommend 5 albums the listener does not own yet.",
            "",
            "Preferred styles: shoegaze, dream-pop",
            "Never recommend: Low - Trust; Duster",
        ]);
    });

    it("uses placeholders when there is nothing to constrain", () => {
        const prompt = builder.build({ count: 2, mode: "artists", styleFilters: [], avoid: [] });

        expect(prompt).toContain("Recommend 2 artists the listener does not own yet.");
        expect(prompt).toContain("Preferred styles: any\nNever recommend: None");
        expect(prompt).toContain('"album": "",');
    });

    it("caps the avoid list", () => {
        const avoid = Array.from({ length: 250 }, (_, index) => ({
            artist: `Artist ${index}`,
            album: "",
        }));
        const line = builder
            .build({ count: 1, mode: "artists", styleFilters: [], avoid })
            .split("\n")[3];

        expect(line.split("; ")).toHaveLength(200);
        expect(line.endsWith("Artist 199")).toBe(true);
    });
});
