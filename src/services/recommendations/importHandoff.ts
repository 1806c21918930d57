import { z } from "zod";
import { buildItemKey } from "../../utils/itemKey";
import { createLogger, Logger, logErrorWithContext } from "../../utils/logger";
import { DocumentStore, SoftDurableWriter } from "../storage/jsonDocumentStore";
import type { Recommendation } from "./types";

export interface ImportHandoffDocument {
    version: 1;
    items: Recommendation[];
}

export const importHandoffDocumentSchema = z.object({
    version: z.literal(1),
    items: z.array(
        z.object({
            artist: z.string().min(1),
            album: z.string(),
            genre: z.string().optional(),
            reason: z.string().optional(),
            confidence: z.number().min(0).max(1),
            year: z.number().int().optional(),
        })
    ),
});

/**
 * Holds items a user approved from the review queue until the next pipeline
 * run delivers them. Once they leave the queue this is their only record, so
 * every change is saved when a store is configured.
 */
export class ImportHandoff {
    private readonly pending = new Map<string, Recommendation>();
    private readonly store?: DocumentStore<ImportHandoffDocument>;
    private readonly writer?: SoftDurableWriter<ImportHandoffDocument>;
    private readonly log: Logger;

    constructor(
        options: { store?: DocumentStore<ImportHandoffDocument>; logger?: Logger } = {}
    ) {
        this.log = options.logger ?? createLogger("import-handoff");
        this.store = options.store;
        if (options.store) {
            this.writer = new SoftDurableWriter(options.store, this.log);
        }
    }

    async load(): Promise<void> {
        if (!this.store) return;
        this.pending.clear();
        try {
            const document = await this.store.read();
            for (const item of document?.items ?? []) {
                this.pending.set(buildItemKey(item.artist, item.album), item);
            }
            if (this.pending.size > 0) {
                this.log.info(`Restored ${this.pending.size} approved item(s) awaiting delivery`);
            }
        } catch (error) {
            logErrorWithContext(this.log, "Failed to load import handoff; starting empty", error);
        }
    }

    add(items: Recommendation[]): number {
        let added = 0;
        for (const item of items) {
            const key = buildItemKey(item.artist, item.album);
            if (this.pending.has(key)) continue;
            this.pending.set(key, item);
            added++;
        }
        if (added > 0) {
            this.persist();
        }
        return added;
    }

    drain(): Recommendation[] {
        const items = Array.from(this.pending.values());
        if (items.length > 0) {
            this.pending.clear();
            this.persist();
        }
        return items;
    }

    get size(): number {
        return this.pending.size;
    }

    flush(): Promise<void> {
        return this.writer?.flush() ?? Promise.resolve();
    }

    private persist(): void {
        if (!this.writer) return;
        void this.writer.schedule(() => ({
            version: 1,
            items: Array.from(this.pending.values()),
        }));
    }
}
