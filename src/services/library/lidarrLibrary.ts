import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { waitWithSignal } from "../../utils/async";
import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import { createLogger, Logger } from "../../utils/logger";
import { buildSha256CacheKey } from "../cacheHelpers";
import type { LibraryCatalog, LibrarySnapshot } from "./types";

const artistListSchema = z.array(
    z.object({
        id: z.number(),
        artistName: z.string(),
    })
);

const albumListSchema = z.array(
    z.object({
        title: z.string(),
        artistId: z.number(),
        artist: z.object({ artistName: z.string() }).nullish(),
    })
);

export function normalizeLibraryName(value: string): string {
    return value
        .normalize("NFKD")
        .replace(/[\u0300-\u036f]/g, "")
        .toLowerCase()
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * Membership sets keyed by normalized names.
 */
export class IndexedLibrarySnapshot implements LibrarySnapshot {
    readonly fingerprint: string;
    private readonly artists: Set<string>;
    private readonly albums: Set<string>;

    constructor(artistNames: string[], albums: Array<{ artist: string; title: string }>) {
        this.artists = new Set(artistNames.map(normalizeLibraryName));
        this.albums = new Set(
            albums.map(({ artist, title }) => `${normalizeLibraryName(artist)}|${normalizeLibraryName(title)}`)
        );
        const identity = [
            ...Array.from(this.artists).sort(),
            "--",
            ...Array.from(this.albums).sort(),
        ].join("\n");
        this.fingerprint = buildSha256CacheKey({ identity, length: 16 });
    }

    hasArtist(artist: string): boolean {
        return this.artists.has(normalizeLibraryName(artist));
    }

    hasAlbum(artist: string, album: string): boolean {
        return this.albums.has(`${normalizeLibraryName(artist)}|${normalizeLibraryName(album)}`);
    }
}

export interface LidarrLibraryCatalogOptions {
    url: string;
    apiKey: string;
    /** How long a fetched snapshot is reused */
    refreshIntervalMs?: number;
    logger?: Logger;
}

/**
 * Reads the owned artists and albums from Lidarr's v1 API.
 */
export class LidarrLibraryCatalog implements LibraryCatalog {
    private readonly client: AxiosInstance;
    private readonly refreshIntervalMs: number;
    private readonly log: Logger;
    private snapshot: { value: IndexedLibrarySnapshot; fetchedAt: number } | null = null;
    private pending: Promise<IndexedLibrarySnapshot> | null = null;

    constructor(options: LidarrLibraryCatalogOptions) {
        this.refreshIntervalMs = options.refreshIntervalMs ?? 5 * 60 * 1000;
        this.log = options.logger ?? createLogger("library");
        this.client = axios.create({
            baseURL: options.url,
            timeout: 30000,
            headers: { "X-Api-Key": options.apiKey },
        });
    }

    async getSnapshot(signal?: AbortSignal): Promise<LibrarySnapshot> {
        if (this.snapshot && Date.now() - this.snapshot.fetchedAt < this.refreshIntervalMs) {
            return this.snapshot.value;
        }

        if (!this.pending) {
            const pending = this.fetchSnapshot().finally(() => {
                if (this.pending === pending) this.pending = null;
            });
            this.pending = pending;
        }
        return waitWithSignal(this.pending, signal, "library snapshot");
    }

    private async fetchSnapshot(): Promise<IndexedLibrarySnapshot> {
        try {
            const [artistsResponse, albumsResponse] = await Promise.all([
                this.client.get("/api/v1/artist"),
                this.client.get("/api/v1/album"),
            ]);

            const artists = artistListSchema.parse(artistsResponse.data);
            const albums = albumListSchema.parse(albumsResponse.data);
            const artistNames = new Map(
                artists.map((artist): [number, string] => [artist.id, artist.artistName])
            );

            const value = new IndexedLibrarySnapshot(
                artists.map((artist) => artist.artistName),
                albums.map((album) => ({
                    artist: album.artist?.artistName ?? artistNames.get(album.artistId) ?? "",
                    title: album.title,
                }))
            );
            this.snapshot = { value, fetchedAt: Date.now() };
            this.log.debug("Library snapshot refreshed", {
                artists: artists.length,
                albums: albums.length,
                fingerprint: value.fingerprint,
            });
            return value;
        } catch (error) {
            this.log.error("Failed to read library from Lidarr", {
                error: error instanceof Error ? error.message : String(error),
            });
            throw new AppError(
                ErrorCode.LIBRARY_UNAVAILABLE,
                ErrorCategory.TRANSIENT,
                "Library is unavailable"
            );
        }
    }
}
