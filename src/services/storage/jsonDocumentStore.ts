import { promises as fs } from "fs";
import path from "path";
import type { ZodType, ZodTypeDef } from "zod";
import { wrapPersistenceError } from "../../utils/errors";
import { createLogger, Logger, logErrorWithContext } from "../../utils/logger";

/**
 * Whole-document persistence used by the review queue and the history.
 */
export interface DocumentStore<T> {
    read(): Promise<T | null>;
    write(document: T): Promise<void>;
}

export interface JsonDocumentStoreOptions<T> {
    filePath: string;
    schema: ZodType<T, ZodTypeDef, unknown>;
    logger?: Logger;
}

/**
 * Stores one JSON document per file. Writes go to a sibling temp file and
 * are renamed over the target, so readers never observe a partial document.
 */
export class JsonDocumentStore<T> implements DocumentStore<T> {
    private readonly filePath: string;
    private readonly schema: ZodType<T, ZodTypeDef, unknown>;
    private readonly log: Logger;
    private writeSequence = 0;

    constructor(options: JsonDocumentStoreOptions<T>) {
        this.filePath = options.filePath;
        this.schema = options.schema;
        this.log =
            options.logger ?? createLogger("storage").child(path.basename(options.filePath));
    }

    get path(): string {
        return this.filePath;
    }

    /**
     * Returns null when the file does not exist yet. A document that fails
     * to parse or validate is logged and treated as absent.
     */
    async read(): Promise<T | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, "utf-8");
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw wrapPersistenceError(error, this.filePath);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            this.log.warn("Ignoring unreadable document", {
                filePath: this.filePath,
                error,
            });
            return null;
        }

        const result = this.schema.safeParse(parsed);
        if (!result.success) {
            this.log.warn("Ignoring document with unexpected shape", {
                filePath: this.filePath,
                issues: result.error.errors.map((issue) => issue.message),
            });
            return null;
        }
        return result.data;
    }

    async write(document: T): Promise<void> {
        this.writeSequence += 1;
        const tempPath = `${this.filePath}.${process.pid}.${this.writeSequence}.tmp`;

        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.writeFile(tempPath, JSON.stringify(document, null, 2), "utf-8");
            await fs.rename(tempPath, this.filePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                this.log.debug("Temp file cleanup failed", {
                    tempPath,
                    error: cleanupError,
                });
            });
            throw wrapPersistenceError(error, this.filePath);
        }
    }
}

function isMissingFile(error: unknown): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        error.code === "ENOENT"
    );
}

/**
 * Serializes saves of a single document and never rejects: failures are
 * logged and the next mutation writes the full document again. Saves
 * scheduled while one is still waiting to start collapse into that one, which
 * writes the latest snapshot.
 */
export class SoftDurableWriter<T> {
    private chain: Promise<void> = Promise.resolve();
    private queued: Promise<void> | null = null;
    private nextSnapshot: (() => T) | null = null;

    constructor(
        private readonly store: DocumentStore<T>,
        private readonly log: Logger
    ) {}

    schedule(snapshot: () => T): Promise<void> {
        this.nextSnapshot = snapshot;
        if (this.queued) {
            return this.queued;
        }

        const queued = this.chain.then(() => this.writeLatest());
        this.queued = queued;
        this.chain = queued;
        return queued;
    }

    flush(): Promise<void> {
        return this.chain;
    }

    private async writeLatest(): Promise<void> {
        this.queued = null;
        const snapshot = this.nextSnapshot;
        this.nextSnapshot = null;
        if (!snapshot) return;

        try {
            await this.store.write(snapshot());
        } catch (error) {
            logErrorWithContext(
                this.log,
                "Failed to persist document; keeping in-memory state",
                error
            );
        }
    }
}
