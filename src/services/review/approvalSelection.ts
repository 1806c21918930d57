import { z } from "zod";
import { buildItemKey, ItemIdentity, parseItemKeys } from "../../utils/itemKey";
import { createLogger, Logger } from "../../utils/logger";
import { DocumentStore, SoftDurableWriter } from "../storage/jsonDocumentStore";

export interface ApprovalSelectionDocument {
    version: 1;
    keys: string[];
}

export const approvalSelectionDocumentSchema = z.object({
    version: z.literal(1),
    keys: z.array(z.string()),
});

/**
 * The "approved keys" list a user builds up in the settings UI before
 * running a bulk review action. Keys are stored as "artist|album".
 */
export class ApprovalSelection {
    private keys: string[] = [];
    private readonly store?: DocumentStore<ApprovalSelectionDocument>;
    private readonly writer?: SoftDurableWriter<ApprovalSelectionDocument>;
    private readonly log: Logger;

    constructor(
        options: { store?: DocumentStore<ApprovalSelectionDocument>; logger?: Logger } = {}
    ) {
        this.log = options.logger ?? createLogger("review-selection");
        this.store = options.store;
        if (options.store) {
            this.writer = new SoftDurableWriter(options.store, this.log);
        }
    }

    async load(): Promise<void> {
        if (!this.store) return;
        try {
            const document = await this.store.read();
            this.keys = document?.keys ?? [];
        } catch (error) {
            this.log.warn("Failed to load approval selection", { error });
            this.keys = [];
        }
    }

    getKeys(): string[] {
        return [...this.keys];
    }

    getIdentities(): ItemIdentity[] {
        return parseItemKeys(this.keys.join(","));
    }

    /**
     * Replaces the selection with the given identities, dropping duplicates.
     */
    replace(identities: ItemIdentity[]): void {
        const seen = new Set<string>();
        this.keys = [];
        for (const identity of identities) {
            const normalized = buildItemKey(identity.artist, identity.album);
            if (seen.has(normalized)) continue;
            seen.add(normalized);
            this.keys.push(`${identity.artist}|${identity.album}`);
        }
        this.persist();
    }

    clear(): void {
        this.keys = [];
        this.persist();
    }

    flush(): Promise<void> {
        return this.writer?.flush() ?? Promise.resolve();
    }

    private persist(): void {
        if (!this.writer) return;
        void this.writer.schedule(() => ({ version: 1, keys: this.keys }));
    }
}
