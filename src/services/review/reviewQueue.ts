/**
 * Review queue
 *
 * Durable store of suggestions the pipeline held back. Each item moves
 * through Pending → Accepted | Rejected | NeverAgain; Accepted items leave
 * the queue when dequeueAccepted() hands them to the import step.
 *
 * Mutations persist the whole document through a SoftDurableWriter. A failed
 * write is logged and the in-memory state stays authoritative until the next
 * mutation succeeds.
 */

import { z } from "zod";
import { requireDependency } from "../../utils/errors";
import { buildItemKey } from "../../utils/itemKey";
import { createLogger, Logger, logErrorWithContext } from "../../utils/logger";
import type { Recommendation } from "../recommendations/types";
import { DocumentStore, SoftDurableWriter } from "../storage/jsonDocumentStore";
import type { ApprovalSelection } from "./approvalSelection";

export enum ReviewStatus {
    Pending = "Pending",
    Accepted = "Accepted",
    Rejected = "Rejected",
    NeverAgain = "NeverAgain",
}

export interface ReviewItem {
    artist: string;
    album: string;
    genre?: string;
    reason?: string;
    confidence: number;
    year?: number;
    status: ReviewStatus;
    createdAt: string;
    updatedAt?: string;
    notes?: string;
}

export interface ReviewCounts {
    pending: number;
    accepted: number;
    rejected: number;
    never: number;
}

export interface ReviewQueueDocument {
    version: 1;
    items: ReviewItem[];
}

export const reviewQueueDocumentSchema = z.object({
    version: z.literal(1),
    items: z.array(
        z.object({
            artist: z.string().min(1),
            album: z.string(),
            genre: z.string().optional(),
            reason: z.string().optional(),
            confidence: z.number(),
            year: z.number().int().optional(),
            status: z.nativeEnum(ReviewStatus),
            createdAt: z.string(),
            updatedAt: z.string().optional(),
            notes: z.string().optional(),
        })
    ),
});

export interface ReviewQueueOptions {
    store: DocumentStore<ReviewQueueDocument>;
    now?: () => Date;
    logger?: Logger;
}

export class ReviewQueue {
    private readonly items = new Map<string, ReviewItem>();
    private readonly store: DocumentStore<ReviewQueueDocument>;
    private readonly writer: SoftDurableWriter<ReviewQueueDocument>;
    private readonly now: () => Date;
    private readonly log: Logger;

    constructor(options: ReviewQueueOptions) {
        this.store = requireDependency(options.store, "store");
        this.log = options.logger ?? createLogger("review-queue");
        this.writer = new SoftDurableWriter(this.store, this.log);
        this.now = options.now ?? (() => new Date());
    }

    async load(): Promise<void> {
        this.items.clear();
        try {
            const document = await this.store.read();
            for (const item of document?.items ?? []) {
                this.items.set(buildItemKey(item.artist, item.album), item);
            }
            this.log.debug(`Loaded ${this.items.size} review items`);
        } catch (error) {
            logErrorWithContext(this.log, "Failed to load review queue; starting empty", error);
        }
    }

    /**
     * Adds new items as Pending. Keys already present keep their current
     * status and data. Returns how many items were added.
     */
    enqueue(recommendations: Recommendation[], notes?: string): number {
        const createdAt = this.now().toISOString();
        let added = 0;

        for (const recommendation of recommendations) {
            const key = buildItemKey(recommendation.artist, recommendation.album);
            if (this.items.has(key)) continue;

            this.items.set(key, {
                artist: recommendation.artist,
                album: recommendation.album,
                genre: recommendation.genre,
                reason: recommendation.reason,
                confidence: recommendation.confidence,
                year: recommendation.year,
                status: ReviewStatus.Pending,
                createdAt,
                ...(notes ? { notes } : {}),
            });
            added++;
        }

        if (added > 0) {
            this.log.debug(`Queued ${added} item(s) for review`, { notes });
            this.persist();
        }
        return added;
    }

    /**
     * Newest first.
     */
    getPending(): ReviewItem[] {
        return this.getItems()
            .filter((item) => item.status === ReviewStatus.Pending)
            .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    }

    getItems(): ReviewItem[] {
        return Array.from(this.items.values(), (item) => ({ ...item }));
    }

    getStatus(artist: string, album: string): ReviewStatus | undefined {
        return this.items.get(buildItemKey(artist, album))?.status;
    }

    /**
     * Returns false when no item exists for the key.
     */
    setStatus(
        artist: string,
        album: string,
        status: ReviewStatus,
        notes?: string
    ): boolean {
        const item = this.items.get(buildItemKey(artist, album));
        if (!item) {
            return false;
        }

        item.status = status;
        item.updatedAt = this.now().toISOString();
        if (notes) {
            item.notes = notes;
        }
        this.persist();
        return true;
    }

    /**
     * Applies a status to every item by the artist. Returns how many changed.
     */
    setArtistStatus(artist: string, status: ReviewStatus, notes?: string): number {
        const artistKey = buildItemKey(artist, "");
        let updated = 0;
        for (const item of this.items.values()) {
            if (buildItemKey(item.artist, "") !== artistKey) continue;
            item.status = status;
            item.updatedAt = this.now().toISOString();
            if (notes) item.notes = notes;
            updated++;
        }
        if (updated > 0) {
            this.persist();
        }
        return updated;
    }

    /**
     * Removes every Accepted item and returns them as recommendations.
     */
    dequeueAccepted(): Recommendation[] {
        const released: Recommendation[] = [];
        for (const [key, item] of this.items) {
            if (item.status !== ReviewStatus.Accepted) continue;

            this.items.delete(key);
            released.push({
                artist: item.artist,
                album: item.album,
                genre: item.genre,
                reason: item.reason,
                confidence: item.confidence,
                year: item.year,
            });
        }

        if (released.length > 0) {
            this.log.info(`Released ${released.length} accepted item(s)`);
            this.persist();
        }
        return released;
    }

    getCounts(): ReviewCounts {
        const counts: ReviewCounts = { pending: 0, accepted: 0, rejected: 0, never: 0 };
        for (const item of this.items.values()) {
            switch (item.status) {
                case ReviewStatus.Pending:
                    counts.pending++;
                    break;
                case ReviewStatus.Accepted:
                    counts.accepted++;
                    break;
                case ReviewStatus.Rejected:
                    counts.rejected++;
                    break;
                case ReviewStatus.NeverAgain:
                    counts.never++;
                    break;
            }
        }
        return counts;
    }

    /**
     * Empties an externally tracked approval selection. Queue statuses are
     * left as they are. Returns how many keys were cleared.
     */
    clearSelection(selection: ApprovalSelection): number {
        const cleared = selection.getKeys().length;
        selection.clear();
        return cleared;
    }

    /**
     * Drops items with the given status, or all items when none is given.
     */
    clear(status?: ReviewStatus): number {
        let removed = 0;
        for (const [key, item] of this.items) {
            if (status === undefined || item.status === status) {
                this.items.delete(key);
                removed++;
            }
        }
        if (removed > 0) {
            this.persist();
        }
        return removed;
    }

    flush(): Promise<void> {
        return this.writer.flush();
    }

    private persist(): void {
        void this.writer.schedule(() => ({
            version: 1,
            items: Array.from(this.items.values()),
        }));
    }
}
