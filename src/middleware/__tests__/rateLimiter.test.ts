const mockRateLimit = jest.fn((options: Record<string, unknown>) => options);

describe("rateLimiter middleware config", () => {
    async function loadRateLimiterModule() {
        jest.resetModules();
        mockRateLimit.mockClear();

        jest.doMock("express-rate-limit", () => ({
            __esModule: true,
            default: (options: Record<string, unknown>) => mockRateLimit(options),
        }));

        return import("../rateLimiter");
    }

    it("creates both limiters with trustProxy validation disabled", async () => {
        const mod = await loadRateLimiterModule();

        expect(mockRateLimit).toHaveBeenCalledTimes(2);
        expect(mod.apiLimiter).toBeDefined();
        expect(mod.catalogSearchLimiter).toBeDefined();

        for (const [options] of mockRateLimit.mock.calls) {
            expect(options.validate).toEqual({ trustProxy: false });
            expect(options.standardHeaders).toBe(true);
            expect(options.legacyHeaders).toBe(false);
        }
    });

    it("keeps catalog searches under the Discogs budget", async () => {
        await loadRateLimiterModule();

        const [apiOptions] = mockRateLimit.mock.calls[0];
        const [searchOptions] = mockRateLimit.mock.calls[1];

        expect(apiOptions.limit).toBe(600);
        expect(apiOptions.windowMs).toBe(60_000);
        expect(apiOptions.message).toBe(
            "Too many requests from this IP, please try again later."
        );

        expect(searchOptions.limit).toBe(30);
        expect(searchOptions.windowMs).toBe(60_000);
        expect(searchOptions.message).toBe(
            "Too many catalog searches, please slow down."
        );
    });
});
