export interface ItemIdentity {
    artist: string;
    album: string;
}

/**
 * Identity used by the review queue, the history and deduplication:
 * lower(trim(artist)) + "|" + lower(trim(album)).
 */
export function buildItemKey(artist: string, album: string | undefined): string {
    return `${artist.trim().toLowerCase()}|${(album ?? "").trim().toLowerCase()}`;
}

/**
 * Splits a comma separated list of "artist|album" keys. Entries without a
 * separator are treated as artist-only keys.
 */
export function parseItemKeys(csv: string | undefined): ItemIdentity[] {
    if (!csv) {
        return [];
    }

    const seen = new Set<string>();
    const identities: ItemIdentity[] = [];
    for (const raw of csv.split(",")) {
        const entry = raw.trim();
        if (!entry) continue;

        const separator = entry.indexOf("|");
        const artist = (separator === -1 ? entry : entry.slice(0, separator)).trim();
        const album = separator === -1 ? "" : entry.slice(separator + 1).trim();
        if (!artist) continue;

        const key = buildItemKey(artist, album);
        if (seen.has(key)) continue;
        seen.add(key);
        identities.push({ artist, album });
    }
    return identities;
}
