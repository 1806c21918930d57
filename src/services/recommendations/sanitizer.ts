/**
 * Strips injection payloads from provider text before anything else looks
 * at it. Items whose identity does not survive cleaning are dropped.
 */

import type { RawRecommendation, RecommendationMode } from "./types";

export const MAX_NAME_LENGTH = 500;
export const MAX_GENRE_LENGTH = 100;
export const MAX_REASON_LENGTH = 1000;

const NULL_BYTES = /\u0000|%00/g;
const CONTROL_CHARACTERS = /[\u0001-\u001f\u007f]/g;
const SCRIPT_BLOCKS =
    /<\s*(script|style|iframe|object|embed)\b[^>]*>[\s\S]*?<\s*\/\s*\1\s*>/gi;
const MARKUP_TAGS = /<\/?[a-z!][^>]*>/gi;
const EVENT_HANDLERS = /\bon[a-z]+\s*=\s*(["'])[^"']*\1/gi;
const SCRIPT_URLS = /(?:javascript|vbscript)\s*:/gi;
const ANGLE_BRACKETS = /[<>]/g;
const PATH_TRAVERSAL = /(?:\.\.[/\\])|(?:%2e%2e(?:%2f|%5c|[/\\])?)/gi;
const SQL_STATEMENTS =
    /['";]+\s*(?:drop|delete|insert|update|exec|select|union|alter|truncate)\b.*$/gi;
const SQL_UNION = /\bunion\s+(?:all\s+)?select\b.*$/gi;
const SQL_COMMENTS = /--.*$|\/\*[\s\S]*?(?:\*\/|$)/g;

const DANGEROUS_PATTERNS: RegExp[] = [
    NULL_BYTES,
    SCRIPT_BLOCKS,
    MARKUP_TAGS,
    EVENT_HANDLERS,
    SCRIPT_URLS,
    PATH_TRAVERSAL,
    SQL_STATEMENTS,
    SQL_UNION,
    SQL_COMMENTS,
];

export interface SanitizeOutcome {
    items: RawRecommendation[];
    dropped: number;
    warnings: string[];
}

/**
 * Removes dangerous content from a single text field.
 */
export function sanitizeText(value: string): string {
    return value
        .replace(NULL_BYTES, "")
        .replace(CONTROL_CHARACTERS, " ")
        .replace(SCRIPT_BLOCKS, "")
        .replace(MARKUP_TAGS, "")
        .replace(EVENT_HANDLERS, "")
        .replace(SCRIPT_URLS, "")
        .replace(ANGLE_BRACKETS, "")
        .replace(PATH_TRAVERSAL, "")
        .replace(SQL_STATEMENTS, "")
        .replace(SQL_UNION, "")
        .replace(SQL_COMMENTS, "");
}

export function containsDangerousContent(value: string): boolean {
    // search() ignores the g flag's lastIndex
    return DANGEROUS_PATTERNS.some((pattern) => value.search(pattern) !== -1);
}

function cleanOptional(
    value: string | null | undefined,
    maxLength: number
): string | null | undefined {
    if (typeof value !== "string") {
        return value;
    }
    return sanitizeText(value).slice(0, maxLength);
}

export class RecommendationSanitizer {
    sanitize(batch: RawRecommendation[], mode: RecommendationMode): SanitizeOutcome {
        const items: RawRecommendation[] = [];
        const warnings: string[] = [];
        let dropped = 0;

        batch.forEach((raw, index) => {
            const artist = typeof raw.artist === "string" ? sanitizeText(raw.artist) : "";
            const album = typeof raw.album === "string" ? sanitizeText(raw.album) : "";

            const problem = this.identityProblem(artist, album, mode);
            if (problem) {
                dropped++;
                warnings.push(`Item ${index} dropped during sanitizing: ${problem}`);
                return;
            }

            items.push({
                ...raw,
                artist,
                album: typeof raw.album === "string" ? album : raw.album,
                genre: cleanOptional(raw.genre, MAX_GENRE_LENGTH),
                reason: cleanOptional(raw.reason, MAX_REASON_LENGTH),
            });
        });

        return { items, dropped, warnings };
    }

    /**
     * Strict check applied when a provider payload is ingested: the raw
     * values must already be clean and in range.
     */
    isValidRecommendation(raw: RawRecommendation): boolean {
        if (typeof raw.artist !== "string" || raw.artist.trim().length === 0) {
            return false;
        }
        if (raw.artist.length > MAX_NAME_LENGTH) {
            return false;
        }
        if (typeof raw.album === "string" && raw.album.length > MAX_NAME_LENGTH) {
            return false;
        }

        const texts = [raw.artist, raw.album, raw.genre, raw.reason].filter(
            (value): value is string => typeof value === "string"
        );
        if (texts.some(containsDangerousContent)) {
            return false;
        }

        if (raw.confidence !== undefined && raw.confidence !== null) {
            if (!Number.isFinite(raw.confidence) || raw.confidence < 0 || raw.confidence > 1) {
                return false;
            }
        }
        return true;
    }

    private identityProblem(
        artist: string,
        album: string,
        mode: RecommendationMode
    ): string | null {
        if (artist.trim().length === 0) {
            return "empty artist";
        }
        if (mode === "albums" && album.trim().length === 0) {
            return "empty album";
        }
        if (artist.trim().length > MAX_NAME_LENGTH || album.trim().length > MAX_NAME_LENGTH) {
            return "name too long";
        }
        return null;
    }
}
