/**
 * Provider Rate Limiter
 *
 * Queues outbound provider calls per service with exponential backoff on
 * rate limits and transient failures. A circuit breaker pauses a service
 * after repeated 429 responses.
 */

import PQueue from "p-queue";
import { sleep } from "../utils/async";
import { createLogger, Logger } from "../utils/logger";

export interface RateLimitConfig {
    /** Requests per interval */
    intervalCap: number;
    /** Interval in milliseconds */
    interval: number;
    /** Maximum concurrent requests */
    concurrency: number;
    /** Maximum retries on 429 or transient errors */
    maxRetries: number;
    /** Base delay for exponential backoff (ms) */
    baseDelay: number;
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
    intervalCap: 3,
    interval: 1000,
    concurrency: 2,
    maxRetries: 2,
    baseDelay: 1000,
};

interface CircuitState {
    isOpen: boolean;
    openedAt: number;
    consecutiveFailures: number;
    resetAfterMs: number;
}

export interface ExecuteOptions {
    priority?: number;
    skipRetry?: boolean;
    signal?: AbortSignal;
}

/**
 * Anything that can run a request under a rate limit.
 */
export interface RequestScheduler {
    execute<T>(service: string, requestFn: () => Promise<T>, options?: ExecuteOptions): Promise<T>;
}

const CIRCUIT_RESET_MS = 30000;
const CIRCUIT_FAILURE_THRESHOLD = 5;

const TRANSIENT_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "ERR_SOCKET_CLOSED",
]);

interface ErrorShape {
    code?: string;
    message: string;
    status?: number;
    retryAfter?: string;
}

function describeError(error: unknown): ErrorShape {
    const shape: ErrorShape = {
        message: error instanceof Error ? error.message : String(error),
    };
    if (typeof error !== "object" || error === null) {
        return shape;
    }
    if ("code" in error && typeof error.code === "string") {
        shape.code = error.code;
    }
    if ("response" in error && typeof error.response === "object" && error.response !== null) {
        const response = error.response;
        if ("status" in response && typeof response.status === "number") {
            shape.status = response.status;
        }
        if ("headers" in response && typeof response.headers === "object" && response.headers !== null) {
            const headers: object = response.headers;
            const retryAfter = "retry-after" in headers ? headers["retry-after"] : undefined;
            if (typeof retryAfter === "string") {
                shape.retryAfter = retryAfter;
            }
        }
    }
    return shape;
}

export class ProviderRateLimiter implements RequestScheduler {
    private queues: Map<string, PQueue> = new Map();
    private circuitBreakers: Map<string, CircuitState> = new Map();
    private readonly configs: Map<string, RateLimitConfig> = new Map();
    private readonly log: Logger;

    constructor(
        configs: Record<string, RateLimitConfig> = {},
        logger?: Logger
    ) {
        this.log = logger ?? createLogger("rate-limiter");
        for (const [service, config] of Object.entries(configs)) {
            this.configs.set(service, config);
        }
    }

    /**
     * Execute a request with rate limiting and automatic retry
     */
    async execute<T>(
        service: string,
        requestFn: () => Promise<T>,
        options: ExecuteOptions = {}
    ): Promise<T> {
        const config = this.configFor(service);
        const queue = this.queueFor(service, config);
        const circuit = this.circuitFor(service);

        if (circuit.isOpen) {
            const elapsed = Date.now() - circuit.openedAt;
            if (elapsed < circuit.resetAfterMs) {
                const waitTime = circuit.resetAfterMs - elapsed;
                this.log.debug(`Circuit breaker open for ${service} - waiting ${waitTime}ms`);
                await sleep(waitTime, options.signal);
            }
            circuit.isOpen = false;
            circuit.consecutiveFailures = 0;
            circuit.resetAfterMs = CIRCUIT_RESET_MS;
        }

        const maxRetries = options.skipRetry ? 0 : config.maxRetries;

        for (let attempt = 0; ; attempt++) {
            try {
                const result = await queue.add(() => requestFn(), {
                    priority: options.priority ?? 0,
                });
                circuit.consecutiveFailures = 0;
                return result;
            } catch (error) {
                const shape = describeError(error);
                const isRateLimit =
                    shape.status === 429 || shape.message.toLowerCase().includes("rate limit");
                const retryable = isRateLimit || this.isTransientError(shape);

                if (!retryable || attempt >= maxRetries || options.signal?.aborted) {
                    throw error;
                }

                const delay = this.calculateBackoff(attempt, config.baseDelay, shape);
                if (isRateLimit) {
                    circuit.consecutiveFailures++;
                    this.log.warn(
                        `Rate limited by ${service} (attempt ${attempt + 1}/${maxRetries + 1}) - backing off ${delay}ms`
                    );
                    if (circuit.consecutiveFailures >= CIRCUIT_FAILURE_THRESHOLD) {
                        circuit.isOpen = true;
                        circuit.openedAt = Date.now();
                        circuit.resetAfterMs = Math.min(60000, circuit.resetAfterMs * 2);
                        this.log.warn(
                            `Circuit breaker opened for ${service} - will reset in ${circuit.resetAfterMs}ms`
                        );
                    }
                } else {
                    this.log.warn(
                        `Transient ${service} error (attempt ${attempt + 1}/${maxRetries + 1}) - retrying in ${delay}ms: ${shape.message}`
                    );
                }

                await sleep(delay, options.signal);
            }
        }
    }

    async drain(): Promise<void> {
        await Promise.all(Array.from(this.queues.values(), (queue) => queue.onIdle()));
    }

    /**
     * Retry-After wins over exponential backoff with jitter, capped at 60s
     */
    private calculateBackoff(attempt: number, baseDelay: number, error: ErrorShape): number {
        if (error.retryAfter) {
            const parsed = Number.parseInt(error.retryAfter, 10);
            if (!Number.isNaN(parsed)) {
                return parsed * 1000;
            }
        }

        const exponentialDelay = baseDelay * Math.pow(2, attempt);
        const jitter = Math.random() * 1000;
        return Math.min(exponentialDelay + jitter, 60000);
    }

    private isTransientError(error: ErrorShape): boolean {
        if (error.code && TRANSIENT_CODES.has(error.code)) {
            return true;
        }
        if (typeof error.status === "number" && error.status >= 500 && error.status <= 599) {
            return true;
        }
        const message = error.message.toLowerCase();
        return (
            message.includes("socket hang up") ||
            message.includes("network error") ||
            message.includes("timeout")
        );
    }

    private configFor(service: string): RateLimitConfig {
        return this.configs.get(service) ?? DEFAULT_RATE_LIMIT;
    }

    private queueFor(service: string, config: RateLimitConfig): PQueue {
        let queue = this.queues.get(service);
        if (!queue) {
            queue = new PQueue({
                concurrency: config.concurrency,
                intervalCap: config.intervalCap,
                interval: config.interval,
                carryoverConcurrencyCount: true,
            });
            this.queues.set(service, queue);
        }
        return queue;
    }

    private circuitFor(service: string): CircuitState {
        let circuit = this.circuitBreakers.get(service);
        if (!circuit) {
            circuit = {
                isOpen: false,
                openedAt: 0,
                consecutiveFailures: 0,
                resetAfterMs: CIRCUIT_RESET_MS,
            };
            this.circuitBreakers.set(service, circuit);
        }
        return circuit;
    }
}
