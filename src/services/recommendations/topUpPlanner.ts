import { waitWithSignal } from "../../utils/async";
import { isCancellation } from "../../utils/errors";
import type { ItemIdentity } from "../../utils/itemKey";
import { createLogger, Logger } from "../../utils/logger";
import type { RecommendationProvider } from "../providers/types";
import { RecommendationPromptBuilder } from "./promptBuilder";
import {
    BackfillStrategy,
    PipelineSettings,
    RawRecommendation,
    Recommendation,
} from "./types";

interface IterationProfile {
    maxAttempts: number;
    /** How many candidates to ask for per missing slot */
    requestMultiplier: number;
}

const ITERATION_PROFILES: Record<BackfillStrategy, IterationProfile> = {
    [BackfillStrategy.Off]: { maxAttempts: 0, requestMultiplier: 1 },
    [BackfillStrategy.Standard]: { maxAttempts: 2, requestMultiplier: 1 },
    [BackfillStrategy.Aggressive]: { maxAttempts: 4, requestMultiplier: 2 },
};

export interface TopUpRequest {
    deficit: number;
    settings: PipelineSettings;
    avoid: ItemIdentity[];
    /** Runs the filtering stages on a fresh provider batch */
    filter: (batch: RawRecommendation[]) => Recommendation[];
    signal?: AbortSignal;
}

export interface TopUpOutcome {
    items: Recommendation[];
    attempts: number;
    cancelled: boolean;
}

/**
 * Asks the provider for more candidates until the deficit is filled, the
 * attempt budget runs out, or an attempt yields nothing new. Provider
 * failures propagate; cancellation returns what was collected so far.
 */
export class TopUpPlanner {
    private readonly log: Logger;

    constructor(
        private readonly provider: RecommendationProvider,
        private readonly promptBuilder: RecommendationPromptBuilder,
        logger?: Logger
    ) {
        this.log = logger ?? createLogger("top-up");
    }

    async topUp({ deficit, settings, avoid, filter, signal }: TopUpRequest): Promise<TopUpOutcome> {
        const profile = ITERATION_PROFILES[settings.backfill];
        const items: Recommendation[] = [];
        let attempts = 0;

        while (items.length < deficit && attempts < profile.maxAttempts) {
            if (signal?.aborted) {
                return { items, attempts, cancelled: true };
            }

            attempts++;
            const remaining = deficit - items.length;
            const prompt = this.promptBuilder.build({
                count: remaining * profile.requestMultiplier,
                mode: settings.mode,
                styleFilters: settings.styleFilters,
                avoid: [...avoid, ...items],
            });

            let batch: RawRecommendation[];
            try {
                batch = await waitWithSignal(
                    this.provider.getRecommendations(prompt, signal),
                    signal,
                    "top-up request"
                );
            } catch (error) {
                if (isCancellation(error)) {
                    return { items, attempts, cancelled: true };
                }
                throw error;
            }

            const accepted = filter(batch).slice(0, remaining);
            this.log.debug(`Top-up attempt ${attempts} added ${accepted.length}`, {
                requested: remaining,
                received: batch.length,
            });
            if (accepted.length === 0) {
                break;
            }
            items.push(...accepted);
        }

        return { items, attempts, cancelled: false };
    }
}
