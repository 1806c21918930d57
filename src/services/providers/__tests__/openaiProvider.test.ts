import type { RequestScheduler } from "../../rateLimiter";

const mockPost = jest.fn();
const mockGet = jest.fn();
const mockCreate = jest.fn((_config: unknown) => ({ post: mockPost, get: mockGet }));

jest.mock("axios", () => ({
    __esModule: true,
    default: {
        create: (config: unknown) => mockCreate(config),
        isAxiosError: () => false,
        isCancel: () => false,
    },
}));

import { OpenAICompatibleProvider } from "../openaiProvider";

const scheduler: RequestScheduler = {
    execute: (_service, requestFn) => requestFn(),
};

function createProvider() {
    return new OpenAICompatibleProvider({
        id: "fake",
        baseUrl: "http://llm.local/v1",
        apiKey: "test-secret",
        model: "test-model",
        timeoutMs: 1000,
        scheduler,
    });
}

function completion(content: string) {
    return { data: { choices: [{ message: { content } }] } };
}

describe("OpenAICompatibleProvider", () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    it("creates an axios client with bearer auth", () => {
        createProvider();

        expect(mockCreate).toHaveBeenCalledWith({
            baseURL: "http://llm.local/v1",
            timeout: 1000,
            headers: {
                Authorization: "Bearer test-secret",
                "Content-Type": "application/json",
            },
        });
    });

    it("parses fenced JSON and drops items that fail the ingestion check", async () => {
        mockPost.mockResolvedValue(
            completion(
                '```json\n{"recommendations":[{"artist":"Low","album":"Trust","confidence":0.8},{"artist":"Bad","album":"X","confidence":1.7}]}\n```'
            )
        );

        await expect(createProvider().getRecommendations("prompt")).resolves.toEqual([
            { artist: "Low", album: "Trust", confidence: 0.8 },
        ]);
        expect(mockPost).toHaveBeenCalledWith(
            "/chat/completions",
            expect.objectContaining({
                model: "test-model",
                response_format: { type: "json_object" },
                messages: [
                    expect.objectContaining({ role: "system" }),
                    { role: "user", content: "prompt" },
                ],
            }),
            { signal: undefined }
        );
    });

    it("rejects an unexpected completion shape", async () => {
        mockPost.mockResolvedValue({ data: { choices: [] } });

        await expect(createProvider().getRecommendations("prompt")).rejects.toMatchObject({
            code: "PROVIDER_RESPONSE_INVALID",
            message: "Provider returned an unexpected completion shape",
        });
    });

    it("maps request failures to PROVIDER_UNAVAILABLE", async () => {
        mockPost.mockRejectedValue(new Error("connect ECONNREFUSED"));

        await expect(createProvider().getRecommendations("prompt")).rejects.toMatchObject({
            code: "PROVIDER_UNAVAILABLE",
            category: "TRANSIENT",
            message: "Provider fake request failed",
        });
    });

    it("reports cancellation when the signal aborted", async () => {
        const controller = new AbortController();
        controller.abort();
        mockPost.mockRejectedValue(new Error("canceled"));

        await expect(
            createProvider().getRecommendations("prompt", controller.signal)
        ).rejects.toMatchObject({
            code: "OPERATION_CANCELLED",
            message: "Provider request was cancelled",
        });
    });

    it("lists models sorted and falls back to the configured model", async () => {
        const provider = createProvider();
        mockGet.mockResolvedValueOnce({ data: { data: [{ id: "b-model" }, { id: "a-model" }] } });
        await expect(provider.listModels()).resolves.toEqual(["a-model", "b-model"]);

        mockGet.mockRejectedValueOnce(new Error("404"));
        await expect(provider.listModels()).resolves.toEqual(["test-model"]);
    });

    it("tests the connection against the models endpoint", async () => {
        const provider = createProvider();
        mockGet.mockResolvedValueOnce({ data: { data: [] } });
        await expect(provider.testConnection()).resolves.toBe(true);

        mockGet.mockRejectedValueOnce(new Error("401"));
        await expect(provider.testConnection()).resolves.toBe(false);
    });
});
