import styleAliasData from "../../data/styleAliases.json";

const GENRE_SEPARATORS = /[,;/|]+/;

/**
 * "Progressive Rock" → "progressive-rock", "R&B" → "r-and-b".
 */
export function slugifyStyle(value: string): string {
    return value
        .normalize("NFKD")
        .replace(/[\u0300-\u036f]/g, "")
        .toLowerCase()
        .replace(/&/g, " and ")
        .replace(/[^a-z0-9]+/g, "-")
        .replace(/^-+|-+$/g, "");
}

/**
 * Maps free-form style names to canonical slugs so filters and provider
 * genres compare regardless of case, punctuation or common spellings.
 */
export class StyleCatalog {
    private readonly aliases: ReadonlyMap<string, string>;

    constructor(aliases: Record<string, string> = styleAliasData.aliases) {
        this.aliases = new Map(
            Object.entries(aliases).map(([alias, canonical]) => [
                slugifyStyle(alias),
                slugifyStyle(canonical),
            ])
        );
    }

    normalize(value: string): string | null {
        const slug = slugifyStyle(value);
        if (!slug) {
            return null;
        }
        return this.aliases.get(slug) ?? slug;
    }

    /**
     * Distinct, sorted slugs for a filter list.
     */
    normalizeAll(values: string[]): string[] {
        const slugs = new Set<string>();
        for (const value of values) {
            const slug = this.normalize(value);
            if (slug) slugs.add(slug);
        }
        return Array.from(slugs).sort();
    }

    /**
     * Splits a genre field such as "Shoegaze, Dream Pop" into slugs.
     */
    genreSlugs(genre: string | undefined): string[] {
        if (!genre) {
            return [];
        }
        return this.normalizeAll(genre.split(GENRE_SEPARATORS));
    }
}
