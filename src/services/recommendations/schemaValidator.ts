import type {
    RawRecommendation,
    Recommendation,
    RecommendationMode,
    ValidationReport,
} from "./types";

export const DEFAULT_CONFIDENCE = 0.5;

export interface SchemaValidationOutcome {
    items: Recommendation[];
    report: ValidationReport;
}

interface TrimResult {
    value: string | undefined;
    trimmed: boolean;
}

function trimField(value: string | null | undefined): TrimResult {
    if (typeof value !== "string") {
        return { value: undefined, trimmed: false };
    }
    const result = value.trim();
    return {
        value: result.length > 0 ? result : undefined,
        trimmed: result !== value,
    };
}

/**
 * Normalizes loose provider items into Recommendations. Never throws:
 * malformed items are dropped, fixable ones repaired, and every change is
 * counted in the report.
 */
export class SchemaValidator {
    validate(batch: RawRecommendation[], mode: RecommendationMode): SchemaValidationOutcome {
        const report: ValidationReport = {
            totalItems: batch.length,
            droppedItems: 0,
            clampedConfidences: 0,
            trimmedFields: 0,
            warnings: [],
        };
        const items: Recommendation[] = [];

        batch.forEach((raw, index) => {
            const artist = trimField(raw.artist);
            const album = trimField(raw.album);
            const genre = trimField(raw.genre);
            const reason = trimField(raw.reason);

            if (!artist.value) {
                report.droppedItems++;
                report.warnings.push(`Item ${index} has no artist`);
                return;
            }
            if (mode === "albums" && !album.value) {
                report.droppedItems++;
                report.warnings.push(`Item ${index} (${artist.value}) has no album`);
                return;
            }

            report.trimmedFields += [artist, album, genre, reason].filter(
                (field) => field.trimmed
            ).length;

            const recommendation: Recommendation = {
                artist: artist.value,
                album: mode === "artists" ? "" : album.value ?? "",
                confidence: this.normalizeConfidence(raw.confidence, index, report),
            };
            if (genre.value) recommendation.genre = genre.value;
            if (reason.value) recommendation.reason = reason.value;

            const year = raw.year;
            if (typeof year === "number" && Number.isInteger(year) && year >= 1000 && year <= 9999) {
                recommendation.year = year;
            } else if (year !== undefined && year !== null) {
                report.warnings.push(`Item ${index} has an invalid year; ignored`);
            }

            items.push(recommendation);
        });

        return { items, report };
    }

    private normalizeConfidence(
        value: number | null | undefined,
        index: number,
        report: ValidationReport
    ): number {
        if (value === undefined || value === null) {
            return DEFAULT_CONFIDENCE;
        }
        if (!Number.isFinite(value)) {
            report.clampedConfidences++;
            report.warnings.push(`Item ${index} has a non-numeric confidence`);
            return 0;
        }
        if (value < 0 || value > 1) {
            report.clampedConfidences++;
            return Math.min(1, Math.max(0, value));
        }
        return value;
    }
}
