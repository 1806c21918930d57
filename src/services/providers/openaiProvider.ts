import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { AppError, cancellationError, ErrorCategory, ErrorCode } from "../../utils/errors";
import { createLogger, Logger } from "../../utils/logger";
import type { RequestScheduler } from "../rateLimiter";
import { RecommendationSanitizer } from "../recommendations/sanitizer";
import type { RawRecommendation } from "../recommendations/types";
import { parseRecommendationPayload } from "./responseParser";
import type { RecommendationProvider } from "./types";

export interface OpenAICompatibleProviderOptions {
    id: string;
    baseUrl: string;
    apiKey: string;
    model: string;
    timeoutMs?: number;
    scheduler: RequestScheduler;
    sanitizer?: RecommendationSanitizer;
    logger?: Logger;
}

const chatCompletionSchema = z.object({
    choices: z
        .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
        .min(1),
});

const modelListSchema = z.object({
    data: z.array(z.object({ id: z.string() })),
});

const SYSTEM_PROMPT =
    "You are an expert music curator. You always respond with valid JSON only. Ensure all strings are properly escaped.";

function describeAxiosError(error: unknown): unknown {
    if (axios.isAxiosError(error)) {
        return error.response?.data ?? error.message;
    }
    return error instanceof Error ? error.message : error;
}

/**
 * Talks to any OpenAI-compatible chat completions endpoint.
 */
export class OpenAICompatibleProvider implements RecommendationProvider {
    readonly id: string;
    private readonly client: AxiosInstance;
    private readonly model: string;
    private readonly scheduler: RequestScheduler;
    private readonly sanitizer: RecommendationSanitizer;
    private readonly log: Logger;

    constructor(options: OpenAICompatibleProviderOptions) {
        this.id = options.id;
        this.model = options.model;
        this.scheduler = options.scheduler;
        this.sanitizer = options.sanitizer ?? new RecommendationSanitizer();
        this.log = options.logger ?? createLogger("provider").child(options.id);
        this.client = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs ?? 60000,
            headers: {
                Authorization: `Bearer ${options.apiKey}`,
                "Content-Type": "application/json",
            },
        });
    }

    async getRecommendations(prompt: string, signal?: AbortSignal): Promise<RawRecommendation[]> {
        let content: string;
        try {
            const response = await this.scheduler.execute(
                this.id,
                () =>
                    this.client.post(
                        "/chat/completions",
                        {
                            model: this.model,
                            messages: [
                                { role: "system", content: SYSTEM_PROMPT },
                                { role: "user", content: prompt },
                            ],
                            temperature: 0.7,
                            response_format: { type: "json_object" },
                        },
                        { signal }
                    ),
                { signal }
            );
            const parsed = chatCompletionSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new AppError(
                    ErrorCode.PROVIDER_RESPONSE_INVALID,
                    ErrorCategory.TRANSIENT,
                    "Provider returned an unexpected completion shape"
                );
            }
            content = parsed.data.choices[0].message.content ?? "";
        } catch (error) {
            if (error instanceof AppError) {
                throw error;
            }
            if (signal?.aborted || axios.isCancel(error)) {
                throw cancellationError("Provider request");
            }
            this.log.error("Provider API error:", describeAxiosError(error));
            throw new AppError(
                ErrorCode.PROVIDER_UNAVAILABLE,
                ErrorCategory.TRANSIENT,
                `Provider ${this.id} request failed`,
                { cause: describeAxiosError(error) }
            );
        }

        const { items, skipped } = parseRecommendationPayload(content);
        const valid = items.filter((item) => this.sanitizer.isValidRecommendation(item));
        const rejected = items.length - valid.length + skipped;
        if (rejected > 0) {
            this.log.debug(`Ignored ${rejected} invalid provider item(s)`);
        }
        return valid;
    }

    async testConnection(): Promise<boolean> {
        try {
            await this.client.get("/models", { timeout: 10000 });
            return true;
        } catch (error) {
            this.log.warn("Provider connection test failed", {
                error: describeAxiosError(error),
            });
            return false;
        }
    }

    /**
     * Falls back to the configured model when the endpoint cannot list them.
     */
    async listModels(): Promise<string[]> {
        try {
            const response = await this.client.get("/models", { timeout: 10000 });
            const parsed = modelListSchema.safeParse(response.data);
            if (!parsed.success) {
                this.log.warn("Unexpected model list shape; using configured model");
                return [this.model];
            }
            return parsed.data.data.map((model) => model.id).sort();
        } catch (error) {
            this.log.warn("Model list unavailable; using configured model", {
                error: describeAxiosError(error),
            });
            return [this.model];
        }
    }
}
