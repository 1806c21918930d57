/**
 * Suggestion history
 *
 * Append-only ledger of what was suggested and what the user turned down.
 * Deduplication asks it whether an item carries a standing rejection, and the
 * prompt builder asks it for the avoid list.
 */

import { differenceInMilliseconds, parseISO } from "date-fns";
import { z } from "zod";
import { requireDependency } from "../../utils/errors";
import { buildItemKey, ItemIdentity } from "../../utils/itemKey";
import { createLogger, Logger, logErrorWithContext } from "../../utils/logger";
import { DocumentStore, SoftDurableWriter } from "../storage/jsonDocumentStore";

export type HistoryStatus = "Suggested" | "Rejected" | "Disliked";

export interface HistoryRecord {
    artist: string;
    album: string;
    status: HistoryStatus;
    timestamp: string;
    notes?: string;
}

export interface HistoryDocument {
    version: 1;
    records: HistoryRecord[];
}

export const historyDocumentSchema = z.object({
    version: z.literal(1),
    records: z.array(
        z.object({
            artist: z.string(),
            album: z.string(),
            status: z.enum(["Suggested", "Rejected", "Disliked"]),
            timestamp: z.string(),
            notes: z.string().optional(),
        })
    ),
});

export interface HistoryStats {
    totalRecords: number;
    distinctItems: number;
    suggested: number;
    rejected: number;
    disliked: number;
    overSuggested: number;
}

export interface SuggestionHistoryOptions {
    store: DocumentStore<HistoryDocument>;
    /** Minimum age of the latest Suggested record before a rejection is accepted */
    rejectGuardMs?: number;
    /** How long a plain rejection keeps an item excluded */
    rejectWindowMs?: number;
    now?: () => Date;
    logger?: Logger;
}

interface ItemSummary extends ItemIdentity {
    suggestedCount: number;
    lastSuggestedAt?: Date;
    lastRejectedAt?: Date;
    disliked: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const OVER_SUGGESTED_THRESHOLD = 3;

export class SuggestionHistory {
    private records: HistoryRecord[] = [];
    private readonly summaries = new Map<string, ItemSummary>();
    private readonly store: DocumentStore<HistoryDocument>;
    private readonly writer: SoftDurableWriter<HistoryDocument>;
    private readonly rejectGuardMs: number;
    private readonly rejectWindowMs: number;
    private readonly now: () => Date;
    private readonly log: Logger;

    constructor(options: SuggestionHistoryOptions) {
        this.store = requireDependency(options.store, "store");
        this.log = options.logger ?? createLogger("history");
        this.writer = new SoftDurableWriter(this.store, this.log);
        this.rejectGuardMs = options.rejectGuardMs ?? DAY_MS;
        this.rejectWindowMs = options.rejectWindowMs ?? 30 * DAY_MS;
        this.now = options.now ?? (() => new Date());
    }

    async load(): Promise<void> {
        try {
            const document = await this.store.read();
            this.records = document?.records ?? [];
        } catch (error) {
            logErrorWithContext(this.log, "Failed to load history; starting empty", error);
            this.records = [];
        }

        this.summaries.clear();
        for (const record of this.records) {
            this.index(record);
        }
        this.log.debug(`Loaded ${this.records.length} history records`);
    }

    recordSuggestions(items: ItemIdentity[]): number {
        const timestamp = this.now().toISOString();
        for (const item of items) {
            this.append({
                artist: item.artist,
                album: item.album,
                status: "Suggested",
                timestamp,
            });
        }
        if (items.length > 0) {
            this.persist();
        }
        return items.length;
    }

    recordRejected(artist: string, album: string, notes?: string): boolean {
        return this.recordOutcome("Rejected", artist, album, notes);
    }

    recordDisliked(artist: string, album: string, notes?: string): boolean {
        return this.recordOutcome("Disliked", artist, album, notes);
    }

    /**
     * Disliked items stay excluded forever; rejected ones for the rejection
     * window. An artist-level dislike (empty album) covers every album.
     */
    wasRejectedOrDisliked(artist: string, album: string): boolean {
        if (album && this.summaries.get(buildItemKey(artist, ""))?.disliked) {
            return true;
        }

        const summary = this.summaries.get(buildItemKey(artist, album));
        if (!summary) {
            return false;
        }
        if (summary.disliked) {
            return true;
        }
        return (
            summary.lastRejectedAt !== undefined &&
            differenceInMilliseconds(this.now(), summary.lastRejectedAt) <
                this.rejectWindowMs
        );
    }

    /**
     * Items the provider should be told to avoid: standing rejections and
     * dislikes, plus anything already suggested too often.
     */
    getExclusions(): ItemIdentity[] {
        const exclusions: ItemIdentity[] = [];
        for (const summary of this.summaries.values()) {
            if (
                summary.suggestedCount >= OVER_SUGGESTED_THRESHOLD ||
                this.wasRejectedOrDisliked(summary.artist, summary.album)
            ) {
                exclusions.push({ artist: summary.artist, album: summary.album });
            }
        }
        return exclusions;
    }

    getStats(): HistoryStats {
        let suggested = 0;
        let rejected = 0;
        let disliked = 0;
        for (const record of this.records) {
            if (record.status === "Suggested") suggested++;
            else if (record.status === "Rejected") rejected++;
            else disliked++;
        }

        let overSuggested = 0;
        for (const summary of this.summaries.values()) {
            if (summary.suggestedCount >= OVER_SUGGESTED_THRESHOLD) overSuggested++;
        }

        return {
            totalRecords: this.records.length,
            distinctItems: this.summaries.size,
            suggested,
            rejected,
            disliked,
            overSuggested,
        };
    }

    flush(): Promise<void> {
        return this.writer.flush();
    }

    private recordOutcome(
        status: Exclude<HistoryStatus, "Suggested">,
        artist: string,
        album: string,
        notes?: string
    ): boolean {
        const now = this.now();
        const summary = this.summaries.get(buildItemKey(artist, album));

        if (
            summary?.lastSuggestedAt &&
            differenceInMilliseconds(now, summary.lastSuggestedAt) < this.rejectGuardMs
        ) {
            this.log.debug(`Skipping ${status} record; suggestion is too recent`, {
                artist,
                album,
            });
            return false;
        }

        this.append({
            artist,
            album,
            status,
            timestamp: now.toISOString(),
            ...(notes ? { notes } : {}),
        });
        this.persist();
        return true;
    }

    private append(record: HistoryRecord): void {
        this.records.push(record);
        this.index(record);
    }

    private index(record: HistoryRecord): void {
        const key = buildItemKey(record.artist, record.album);
        const summary: ItemSummary = this.summaries.get(key) ?? {
            artist: record.artist,
            album: record.album,
            suggestedCount: 0,
            disliked: false,
        };
        const at = parseISO(record.timestamp);

        switch (record.status) {
            case "Suggested":
                summary.suggestedCount++;
                summary.lastSuggestedAt = latest(summary.lastSuggestedAt, at);
                break;
            case "Rejected":
                summary.lastRejectedAt = latest(summary.lastRejectedAt, at);
                break;
            case "Disliked":
                summary.disliked = true;
                break;
        }
        this.summaries.set(key, summary);
    }

    private persist(): void {
        void this.writer.schedule(() => ({
            version: 1,
            records: this.records,
        }));
    }
}

function latest(current: Date | undefined, candidate: Date): Date {
    if (Number.isNaN(candidate.getTime())) {
        return current ?? candidate;
    }
    return current && current > candidate ? current : candidate;
}
