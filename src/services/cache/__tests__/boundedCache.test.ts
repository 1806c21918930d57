import { BoundedCache } from "../boundedCache";

describe("BoundedCache", () => {
    let clock: number;
    const now = () => clock;

    beforeEach(() => {
        clock = 1_000_000;
    });

    function createCache(maxSize: number, defaultTtlMs?: number) {
        return new BoundedCache<string, string>({
            maxSize,
            defaultTtlMs,
            sweepIntervalMs: 0,
            now,
        });
    }

    it("returns stored values and reports misses for unknown keys", () => {
        const cache = createCache(3);
        cache.set("a", "alpha");

        expect(cache.get("a")).toEqual({ found: true, value: "alpha" });
        expect(cache.get("b")).toEqual({ found: false });
        expect(cache.statistics()).toEqual(
            expect.objectContaining({ hits: 1, misses: 1, hitRate: 50 })
        );
    });

    it("evicts exactly the least-recently accessed entry when full", () => {
        const cache = createCache(3);
        cache.set("a", "1");
        clock += 1;
        cache.set("b", "2");
        clock += 1;
        cache.set("c", "3");
        clock += 1;
        cache.get("a");
        clock += 1;
        cache.set("d", "4");

        expect(cache.size).toBe(3);
        expect(cache.get("b")).toEqual({ found: false });
        expect(cache.get("a")).toEqual({ found: true, value: "1" });
        expect(cache.get("c")).toEqual({ found: true, value: "3" });
        expect(cache.get("d")).toEqual({ found: true, value: "4" });
        expect(cache.statistics().evictions).toBe(1);
    });

    it("keeps size unchanged when a key is overwritten", () => {
        const cache = createCache(2);
        cache.set("a", "1");
        cache.set("a", "2");

        expect(cache.size).toBe(1);
        expect(cache.get("a")).toEqual({ found: true, value: "2" });
        expect(cache.statistics().evictions).toBe(0);
    });

    it("enforces capacity for values produced by getOrCompute", async () => {
        const cache = createCache(2);
        await cache.getOrCompute("a", async () => "1");
        await cache.getOrCompute("b", async () => "2");
        await cache.getOrCompute("c", async () => "3");

        expect(cache.size).toBe(2);
        expect(cache.get("a")).toEqual({ found: false });
        expect(cache.statistics().evictions).toBe(1);
    });

    it("hides expired entries before any sweep runs", () => {
        const cache = createCache(5);
        cache.set("a", "1", 1000);

        clock += 999;
        expect(cache.get("a")).toEqual({ found: true, value: "1" });

        clock += 1;
        expect(cache.get("a")).toEqual({ found: false });
    });

    it("removes expired entries during cleanup and shrinks the reported size", () => {
        const cache = createCache(5, 500);
        cache.set("a", "1");
        cache.set("b", "2");
        cache.set("c", "3", 10_000);

        clock += 600;

        expect(cache.size).toBe(3);
        expect(cache.cleanupExpired()).toBe(2);
        expect(cache.size).toBe(1);
        expect(cache.statistics().size).toBe(1);
    });

    it("runs the factory once for concurrent callers of the same key", async () => {
        const cache = createCache(5);
        let release: (value: string) => void = () => undefined;
        const factory = jest.fn(
            () =>
                new Promise<string>((resolve) => {
                    release = resolve;
                })
        );

        const callers = Array.from({ length: 5 }, () =>
            cache.getOrCompute("k", factory)
        );
        await Promise.resolve();
        release("computed");

        await expect(Promise.all(callers)).resolves.toEqual([
            "computed",
            "computed",
            "computed",
            "computed",
            "computed",
        ]);
        expect(factory).toHaveBeenCalledTimes(1);
        expect(cache.get("k")).toEqual({ found: true, value: "computed" });
    });

    it("propagates factory failures without caching and retries next time", async () => {
        const cache = createCache(5);
        const failing = jest.fn(async () => {
            throw new Error("provider down");
        });

        await expect(cache.getOrCompute("k", failing)).rejects.toThrow(
            "provider down"
        );
        expect(cache.get("k")).toEqual({ found: false });

        const succeeding = jest.fn(async () => "ok");
        await expect(cache.getOrCompute("k", succeeding)).resolves.toBe("ok");
        expect(succeeding).toHaveBeenCalledTimes(1);
    });

    it("lets a caller abandon its wait without disturbing the computation", async () => {
        const cache = createCache(5);
        let release: (value: string) => void = () => undefined;
        const factory = () =>
            new Promise<string>((resolve) => {
                release = resolve;
            });
        const controller = new AbortController();

        const abandoned = cache.getOrCompute("k", factory, {
            signal: controller.signal,
        });
        const patient = cache.getOrCompute("k", factory);
        await Promise.resolve();

        controller.abort();
        await expect(abandoned).rejects.toMatchObject({
            code: "OPERATION_CANCELLED",
        });

        release("value");
        await expect(patient).resolves.toBe("value");
        expect(cache.get("k")).toEqual({ found: true, value: "value" });
    });

    it("does not store a result whose key was removed mid-computation", async () => {
        const cache = createCache(5);
        let release: (value: string) => void = () => undefined;
        const pending = cache.getOrCompute(
            "k",
            () =>
                new Promise<string>((resolve) => {
                    release = resolve;
                })
        );
        await Promise.resolve();

        cache.remove("k");
        release("stale");

        await expect(pending).resolves.toBe("stale");
        expect(cache.get("k")).toEqual({ found: false });
    });

    it("reports memory and hit rate statistics", async () => {
        const cache = createCache(10);
        await cache.getOrCompute("a", async () => "1");
        await cache.getOrCompute("a", async () => "unused");
        cache.get("a");
        cache.get("missing");

        expect(cache.statistics()).toEqual({
            size: 1,
            maxSize: 10,
            hits: 2,
            misses: 2,
            evictions: 0,
            hitRate: 50,
            approxMemory: 1024 + 1104,
        });
    });

    it("rejects a non-positive capacity", () => {
        expect(() => createCache(0)).toThrow(RangeError);
    });

    it("stops the sweep timer on dispose", () => {
        jest.useFakeTimers();
        try {
            const cache = new BoundedCache<string, string>({
                maxSize: 2,
                defaultTtlMs: 100,
                sweepIntervalMs: 1000,
                now,
            });
            const sweep = jest.spyOn(cache, "cleanupExpired");

            jest.advanceTimersByTime(1000);
            expect(sweep).toHaveBeenCalledTimes(1);

            cache.dispose();
            jest.advanceTimersByTime(5000);
            expect(sweep).toHaveBeenCalledTimes(1);
        } finally {
            jest.useRealTimers();
        }
    });
});
