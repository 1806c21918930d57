import dotenv from "dotenv";
import path from "path";
import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import {
    isEnvFlagEnabled,
    parseEnvCsv,
    parseEnvFloat,
    parseEnvInt,
} from "./utils/envParsers";
import { LogLevel, resolveLogLevel } from "./utils/logger";

dotenv.config();

const positiveInt = (name: string) =>
    z.number().int(`${name} must be an integer`).positive(`${name} must be positive`);

const envSchema = z.object({
    PORT: z.string().regex(/^\d+$/, "PORT must be numeric").optional(),
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
    DATA_DIR: z.string().min(1).optional(),
    PROVIDER_BASE_URL: z.string().url("PROVIDER_BASE_URL must be a URL").optional(),
    LIDARR_URL: z.string().url("LIDARR_URL must be a URL").optional(),
    RECOMMENDATION_MODE: z.enum(["albums", "artists"]).optional(),
    BACKFILL_STRATEGY: z.enum(["off", "standard", "aggressive"]).optional(),
});

const numericSchema = z.object({
    cacheMaxSize: positiveInt("CACHE_MAX_SIZE"),
    cacheTtlMinutes: positiveInt("CACHE_TTL_MINUTES"),
    cacheSweepSeconds: positiveInt("CACHE_SWEEP_SECONDS"),
    maxRecommendations: positiveInt("MAX_RECOMMENDATIONS"),
    providerTimeoutMs: positiveInt("PROVIDER_TIMEOUT_MS"),
    minConfidence: z
        .number()
        .min(0, "MIN_CONFIDENCE must be between 0 and 1")
        .max(1, "MIN_CONFIDENCE must be between 0 and 1"),
    historyRejectGuardHours: z.number().int().nonnegative(),
    historyRejectWindowDays: positiveInt("HISTORY_REJECT_WINDOW_DAYS"),
});

export type BackfillSetting = "off" | "standard" | "aggressive";

export interface AppConfig {
    port: number;
    nodeEnv: "development" | "production" | "test";
    logLevel: LogLevel;
    dataDir: string;
    provider: {
        id: string;
        baseUrl: string;
        apiKey: string;
        model: string;
        timeoutMs: number;
    };
    lidarr: {
        url: string;
        apiKey: string;
    };
    plannerConfigVersion: string;
    cache: {
        maxSize: number;
        ttlMs: number;
        sweepIntervalMs: number;
    };
    recommendations: {
        maxRecommendations: number;
        mode: "albums" | "artists";
        styleFilters: string[];
        relaxStyleMatching: boolean;
        backfill: BackfillSetting;
        minConfidence: number;
        blockedTerms: string[];
    };
    history: {
        rejectGuardMs: number;
        rejectWindowMs: number;
    };
}

function formatIssues(error: z.ZodError): string[] {
    return error.errors.map((err) => `${err.path.join(".")}: ${err.message}`);
}

/**
 * Validates the environment and builds the typed configuration. Every key
 * has a default; malformed values raise INVALID_CONFIG with all issues.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsedEnv = envSchema.safeParse(env);
    if (!parsedEnv.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Environment validation failed",
            { issues: formatIssues(parsedEnv.error) }
        );
    }

    const numeric = numericSchema.safeParse({
        cacheMaxSize: parseEnvInt(env.CACHE_MAX_SIZE, 100),
        cacheTtlMinutes: parseEnvInt(env.CACHE_TTL_MINUTES, 60),
        cacheSweepSeconds: parseEnvInt(env.CACHE_SWEEP_SECONDS, 60),
        maxRecommendations: parseEnvInt(env.MAX_RECOMMENDATIONS, 20),
        providerTimeoutMs: parseEnvInt(env.PROVIDER_TIMEOUT_MS, 60000),
        minConfidence: parseEnvFloat(env.MIN_CONFIDENCE, 0),
        historyRejectGuardHours: parseEnvInt(env.HISTORY_REJECT_GUARD_HOURS, 24),
        historyRejectWindowDays: parseEnvInt(env.HISTORY_REJECT_WINDOW_DAYS, 30),
    });
    if (!numeric.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Environment validation failed",
            { issues: formatIssues(numeric.error) }
        );
    }

    const values = parsedEnv.data;
    const numbers = numeric.data;

    return {
        port: parseEnvInt(values.PORT, 3030),
        nodeEnv: values.NODE_ENV ?? "development",
        logLevel: resolveLogLevel(env.LOG_LEVEL, values.NODE_ENV),
        dataDir: path.resolve(values.DATA_DIR ?? "./data"),
        provider: {
            id: env.PROVIDER_ID?.trim() || "openai",
            baseUrl: values.PROVIDER_BASE_URL ?? "https://api.openai.com/v1",
            apiKey: env.PROVIDER_API_KEY ?? "",
            model: env.PROVIDER_MODEL?.trim() || "gpt-4o-mini",
            timeoutMs: numbers.providerTimeoutMs,
        },
        lidarr: {
            url: values.LIDARR_URL ?? "http://localhost:8686",
            apiKey: env.LIDARR_API_KEY ?? "",
        },
        plannerConfigVersion: env.PLANNER_CONFIG_VERSION?.trim() || "1",
        cache: {
            maxSize: numbers.cacheMaxSize,
            ttlMs: numbers.cacheTtlMinutes * 60 * 1000,
            sweepIntervalMs: numbers.cacheSweepSeconds * 1000,
        },
        recommendations: {
            maxRecommendations: numbers.maxRecommendations,
            mode: values.RECOMMENDATION_MODE ?? "albums",
            styleFilters: parseEnvCsv(env.STYLE_FILTERS) ?? [],
            relaxStyleMatching: isEnvFlagEnabled(env.RELAX_STYLE_MATCHING),
            backfill: values.BACKFILL_STRATEGY ?? "standard",
            minConfidence: numbers.minConfidence,
            blockedTerms: parseEnvCsv(env.BLOCKED_TERMS) ?? [],
        },
        history: {
            rejectGuardMs: numbers.historyRejectGuardHours * 60 * 60 * 1000,
            rejectWindowMs: numbers.historyRejectWindowDays * 24 * 60 * 60 * 1000,
        },
    };
}

export const config = loadConfig();
