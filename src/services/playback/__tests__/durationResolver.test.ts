import {
    DEFAULT_DURATION_DISPLAY,
    DEFAULT_DURATION_SECONDS,
    DurationResolver,
} from "../durationResolver";

function lookupReturning(value: number | null) {
    return {
        lookupDuration: jest.fn(async (_artist: string, _title: string) => value),
    };
}

describe("DurationResolver", () => {
    it("uses a parseable catalog duration as-is for display", async () => {
        const lookup = lookupReturning(999000);
        const resolver = new DurationResolver({ lookup });

        await expect(resolver.resolve("2:05", "Artist", "Title")).resolves.toEqual({
            durationSeconds: 125,
            durationDisplay: "2:05",
            source: "catalog",
        });
        await expect(resolver.resolve("1:02:03", "Artist", "Title")).resolves.toEqual({
            durationSeconds: 3723,
            durationDisplay: "1:02:03",
            source: "catalog",
        });
        expect(lookup.lookupDuration).not.toHaveBeenCalled();
    });

    it("trims surrounding whitespace from a catalog duration", async () => {
        const resolver = new DurationResolver();

        await expect(resolver.resolve(" 2:05 ", "Artist", "Title")).resolves.toEqual({
            durationSeconds: 125,
            durationDisplay: "2:05",
            source: "catalog",
        });
    });

    it("falls back to the lookup when the catalog has no duration", async () => {
        const lookup = lookupReturning(185000);
        const resolver = new DurationResolver({ lookup });

        await expect(resolver.resolve("", "Artist", "Title")).resolves.toEqual({
            durationSeconds: 185,
            durationDisplay: "3:05",
            source: "lookup",
        });
        expect(lookup.lookupDuration).toHaveBeenCalledWith("Artist", "Title");
    });

    it("falls back to the default when the lookup fails", async () => {
        const failure = new Error("service unavailable");
        const onLookupFailure = jest.fn();
        const resolver = new DurationResolver({
            lookup: { lookupDuration: jest.fn(async () => Promise.reject(failure)) },
            onLookupFailure,
        });

        await expect(resolver.resolve("garbage", "Artist", "Title")).resolves.toEqual({
            durationSeconds: DEFAULT_DURATION_SECONDS,
            durationDisplay: DEFAULT_DURATION_DISPLAY,
            source: "default",
        });
        expect(onLookupFailure).toHaveBeenCalledWith(failure, "Artist", "Title");
    });

    it.each([null, 0, -5, Number.NaN])(
        "ignores an unusable lookup result (%p)",
        async (value) => {
            const resolver = new DurationResolver({ lookup: lookupReturning(value) });

            const resolved = await resolver.resolve(undefined, "Artist", "Title");

            expect(resolved.source).toBe("default");
            expect(resolved.durationSeconds).toBe(210);
        }
    );

    it("uses the default when no lookup is configured", async () => {
        const resolver = new DurationResolver();

        await expect(resolver.resolve(null, "Artist", "Title")).resolves.toEqual({
            durationSeconds: 210,
            durationDisplay: "3:30",
            source: "default",
        });
    });

    it("never resolves to less than one second", async () => {
        const resolver = new DurationResolver({ lookup: lookupReturning(400) });

        await expect(resolver.resolve("0:00", "Artist", "Title")).resolves.toEqual({
            durationSeconds: 1,
            durationDisplay: "0:00",
            source: "catalog",
        });
        await expect(resolver.resolve("", "Artist", "Title")).resolves.toEqual({
            durationSeconds: 1,
            durationDisplay: "0:01",
            source: "lookup",
        });
    });
});
