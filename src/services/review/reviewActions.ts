/**
 * Review actions
 *
 * Closed set of UI actions over the review queue. Every name maps to one
 * handler through a typed table; unknown names produce a structured error
 * instead of throwing.
 */

import { requireDependency } from "../../utils/errors";
import { ItemIdentity, parseItemKeys } from "../../utils/itemKey";
import { createLogger, Logger } from "../../utils/logger";
import type { SuggestionHistory } from "../history/suggestionHistory";
import type { RecommendationProvider } from "../providers/types";
import type { ImportHandoff } from "../recommendations/importHandoff";
import type { ApprovalSelection } from "./approvalSelection";
import { ReviewItem, ReviewQueue, ReviewStatus } from "./reviewQueue";

export const REVIEW_ACTIONS = [
    "review/getqueue",
    "review/getsummary",
    "review/accept",
    "review/reject",
    "review/never",
    "review/apply",
    "review/clear",
    "review/select",
    "review/rejectselected",
    "review/neverselected",
    "provider/getmodels",
] as const;

export type ReviewActionName = (typeof REVIEW_ACTIONS)[number];

export type ActionParams = Record<string, string | undefined>;

export interface ActionOption {
    value: string;
    name: string;
}

export type ActionFailureCode = "UNKNOWN_ACTION" | "INVALID_PARAMS" | "NOT_FOUND";

export interface ActionFailure {
    ok: false;
    code: ActionFailureCode;
    error: string;
}

export type ActionResult =
    | ActionFailure
    | { options: ActionOption[]; counts?: Record<string, number> }
    | { ok: true; updated?: number; selected?: number }
    | { ok: true; approved: number; released: number; cleared: true; note: string }
    | { ok: true; updated: number; cleared: true }
    | { ok: true; cleared: number };

type ActionHandler = (params: ActionParams) => ActionResult | Promise<ActionResult>;

export interface ReviewActionDeps {
    reviewQueue: ReviewQueue;
    history: SuggestionHistory;
    selection: ApprovalSelection;
    handoff: ImportHandoff;
    provider: RecommendationProvider;
    logger?: Logger;
}

export function isReviewActionName(name: string): name is ReviewActionName {
    return REVIEW_ACTIONS.some((action) => action === name);
}

function failure(code: ActionFailureCode, error: string): ActionFailure {
    return { ok: false, code, error };
}

function readParam(params: ActionParams, name: string): string {
    return params[name]?.trim() ?? "";
}

function formatOption(item: ReviewItem): ActionOption {
    const label = item.album ? `${item.artist} — ${item.album}` : item.artist;
    const details = [
        item.genre,
        `${Math.round(item.confidence * 100)}%`,
        item.notes,
    ].filter((part): part is string => Boolean(part));
    return {
        value: `${item.artist}|${item.album}`,
        name: `${label} (${details.join(", ")})`,
    };
}

export class ReviewActionHandler {
    private readonly reviewQueue: ReviewQueue;
    private readonly history: SuggestionHistory;
    private readonly selection: ApprovalSelection;
    private readonly handoff: ImportHandoff;
    private readonly provider: RecommendationProvider;
    private readonly log: Logger;
    private readonly handlers: Record<ReviewActionName, ActionHandler>;

    constructor(deps: ReviewActionDeps) {
        this.reviewQueue = requireDependency(deps.reviewQueue, "reviewQueue");
        this.history = requireDependency(deps.history, "history");
        this.selection = requireDependency(deps.selection, "selection");
        this.handoff = requireDependency(deps.handoff, "handoff");
        this.provider = requireDependency(deps.provider, "provider");
        this.log = deps.logger ?? createLogger("review-actions");

        this.handlers = {
            "review/getqueue": () => this.getQueue(),
            "review/getsummary": () => this.getSummary(),
            "review/accept": (params) => this.setSingle(params, ReviewStatus.Accepted),
            "review/reject": (params) => this.setSingle(params, ReviewStatus.Rejected),
            "review/never": (params) => this.never(params),
            "review/apply": (params) => this.apply(params),
            "review/clear": () => this.clearSelection(),
            "review/select": (params) => this.select(params),
            "review/rejectselected": (params) =>
                this.applyToSelection(params, ReviewStatus.Rejected),
            "review/neverselected": (params) =>
                this.applyToSelection(params, ReviewStatus.NeverAgain),
            "provider/getmodels": () => this.getModels(),
        };
    }

    async dispatch(action: string, params: ActionParams = {}): Promise<ActionResult> {
        const name = action.trim().toLowerCase();
        if (!isReviewActionName(name)) {
            this.log.warn(`Unknown action requested: ${action}`);
            return failure("UNKNOWN_ACTION", `Unknown action: ${action}`);
        }
        return this.handlers[name](params);
    }

    private getQueue(): ActionResult {
        return { options: this.reviewQueue.getPending().map(formatOption) };
    }

    private getSummary(): ActionResult {
        const counts = this.reviewQueue.getCounts();
        return {
            options: [
                { value: "pending", name: `Pending (${counts.pending})` },
                { value: "accepted", name: `Accepted (${counts.accepted})` },
                { value: "rejected", name: `Rejected (${counts.rejected})` },
                { value: "never", name: `Never again (${counts.never})` },
            ],
            counts: { ...counts },
        };
    }

    private setSingle(
        params: ActionParams,
        status: ReviewStatus.Accepted | ReviewStatus.Rejected
    ): ActionResult {
        const artist = readParam(params, "artist");
        const album = readParam(params, "album");
        if (!artist || !album) {
            return failure("INVALID_PARAMS", "artist and album are required");
        }
        const notes = readParam(params, "notes") || undefined;

        if (!this.reviewQueue.setStatus(artist, album, status, notes)) {
            return failure("NOT_FOUND", `No review item for ${artist} — ${album}`);
        }
        if (status === ReviewStatus.Rejected) {
            this.history.recordRejected(artist, album, notes);
        }
        return { ok: true };
    }

    private never(params: ActionParams): ActionResult {
        const artist = readParam(params, "artist");
        const album = readParam(params, "album");
        if (!artist) {
            return failure("INVALID_PARAMS", "artist is required");
        }
        const notes = readParam(params, "notes") || undefined;

        const updated = album
            ? Number(this.reviewQueue.setStatus(artist, album, ReviewStatus.NeverAgain, notes))
            : this.reviewQueue.setArtistStatus(artist, ReviewStatus.NeverAgain, notes);
        this.history.recordDisliked(artist, album, notes);
        return { ok: true, updated };
    }

    private apply(params: ActionParams): ActionResult {
        const targets = this.resolveTargets(params);
        let approved = 0;
        for (const { artist, album } of targets) {
            if (this.reviewQueue.setStatus(artist, album, ReviewStatus.Accepted)) {
                approved++;
            }
        }

        const released = this.reviewQueue.dequeueAccepted();
        this.handoff.add(released);
        this.reviewQueue.clearSelection(this.selection);

        this.log.info(`Applied ${approved} approval(s); released ${released.length}`);
        return {
            ok: true,
            approved,
            released: released.length,
            cleared: true,
            note: `Approved ${approved}; ${released.length} item(s) will be delivered on the next run`,
        };
    }

    private clearSelection(): ActionResult {
        return { ok: true, cleared: this.reviewQueue.clearSelection(this.selection) };
    }

    private select(params: ActionParams): ActionResult {
        const identities = parseItemKeys(params.keys);
        this.selection.replace(identities);
        return { ok: true, selected: this.selection.getKeys().length };
    }

    private applyToSelection(
        params: ActionParams,
        status: ReviewStatus.Rejected | ReviewStatus.NeverAgain
    ): ActionResult {
        let updated = 0;
        for (const { artist, album } of this.resolveTargets(params)) {
            if (!this.reviewQueue.setStatus(artist, album, status)) continue;
            updated++;
            if (status === ReviewStatus.Rejected) {
                this.history.recordRejected(artist, album);
            } else {
                this.history.recordDisliked(artist, album);
            }
        }
        this.reviewQueue.clearSelection(this.selection);
        return { ok: true, updated, cleared: true };
    }

    private async getModels(): Promise<ActionResult> {
        const models = await this.provider.listModels();
        return { options: models.map((model) => ({ value: model, name: model })) };
    }

    /**
     * Explicit `keys` win over the stored selection.
     */
    private resolveTargets(params: ActionParams): ItemIdentity[] {
        const explicit = parseItemKeys(params.keys);
        return explicit.length > 0 ? explicit : this.selection.getIdentities();
    }
}
