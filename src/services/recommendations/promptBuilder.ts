import type { ItemIdentity } from "../../utils/itemKey";
import type { RecommendationMode } from "./types";

export interface PromptRequest {
    count: number;
    mode: RecommendationMode;
    styleFilters: string[];
    /** Items the provider must not return */
    avoid: ItemIdentity[];
}

const MAX_AVOID_ENTRIES = 200;

function formatIdentity({ artist, album }: ItemIdentity): string {
    return album ? `${artist} - ${album}` : artist;
}

export class RecommendationPromptBuilder {
    build({ count, mode, styleFilters, avoid }: PromptRequest): string {
        const subject = mode === "artists" ? "artists" : "albums";
        const styles = styleFilters.length > 0 ? styleFilters.join(", ") : "any";
        const avoidList = avoid
            .slice(0, MAX_AVOID_ENTRIES)
            .map(formatIdentity)
            .join("; ");

        return `Recommend ${count} ${subject} the listener does not own yet.

Preferred styles: ${styles}
Never recommend: ${avoidList || "None"}

OUTPUT FORMAT (JSON):
{
  "recommendations": [
    {
      "artist": "Artist Name",
      "album": "${mode === "artists" ? "" : "Album Title"}",
      "genre": "Primary genre",
      "year": 1999,
      "confidence": 0.8,
      "reason": "One short sentence"
    }
  ]
}

Return ONLY valid JSON, no markdown formatting.`;
    }
}
