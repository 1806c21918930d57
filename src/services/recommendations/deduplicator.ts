import { buildItemKey } from "../../utils/itemKey";
import type { SuggestionHistory } from "../history/suggestionHistory";
import type { LibrarySnapshot } from "../library/types";
import { ReviewQueue, ReviewStatus } from "../review/reviewQueue";
import type {
    FilteredRecommendation,
    Recommendation,
    RecommendationMode,
} from "./types";

export interface DeduplicateContext {
    library: LibrarySnapshot;
    mode: RecommendationMode;
    /** Keys already accepted earlier in the same run; extended in place */
    seen: Set<string>;
}

export interface DeduplicateOutcome {
    kept: Recommendation[];
    filtered: FilteredRecommendation[];
}

export class Deduplicator {
    constructor(
        private readonly history: Pick<SuggestionHistory, "wasRejectedOrDisliked">,
        private readonly reviewQueue: Pick<ReviewQueue, "getStatus">
    ) {}

    apply(items: Recommendation[], context: DeduplicateContext): DeduplicateOutcome {
        const kept: Recommendation[] = [];
        const filtered: FilteredRecommendation[] = [];

        for (const recommendation of items) {
            const key = buildItemKey(recommendation.artist, recommendation.album);
            const exclusion = this.exclusionFor(recommendation, key, context);

            if (exclusion) {
                filtered.push({ recommendation, stage: "deduplicate", ...exclusion });
                continue;
            }

            context.seen.add(key);
            kept.push(recommendation);
        }

        return { kept, filtered };
    }

    private exclusionFor(
        recommendation: Recommendation,
        key: string,
        context: DeduplicateContext
    ): { reason: string; reviewable: boolean } | null {
        const { artist, album } = recommendation;

        const owned =
            context.mode === "artists"
                ? context.library.hasArtist(artist)
                : context.library.hasAlbum(artist, album);
        if (owned) {
            return { reason: "Already in library", reviewable: false };
        }
        if (context.seen.has(key)) {
            return { reason: "Duplicate recommendation", reviewable: false };
        }
        if (this.reviewQueue.getStatus(artist, album) === ReviewStatus.NeverAgain) {
            return { reason: "Marked never again", reviewable: true };
        }
        if (this.history.wasRejectedOrDisliked(artist, album)) {
            return { reason: "Previously rejected", reviewable: true };
        }
        return null;
    }
}
