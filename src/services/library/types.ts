/**
 * Point-in-time view of the user's collection used for deduplication and
 * cache keys.
 */
export interface LibrarySnapshot {
    /** Changes whenever membership changes */
    fingerprint: string;
    hasArtist(artist: string): boolean;
    hasAlbum(artist: string, album: string): boolean;
}

export interface LibraryCatalog {
    getSnapshot(signal?: AbortSignal): Promise<LibrarySnapshot>;
}
