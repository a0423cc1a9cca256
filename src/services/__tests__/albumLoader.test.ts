jest.mock("../../config", () => ({
    config: { discogs: { token: undefined } },
}));

jest.mock("../../utils/logger", () => {
    const logger = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    };
    logger.child.mockReturnValue(logger);
    return { logger };
});

import { AlbumLoader } from "../albumLoader";
import type { CatalogRelease } from "../discogs";
import { ErrorCode } from "../../utils/errors";
import type { TrackList } from "../playback/trackList";

const release: CatalogRelease = {
    id: 249504,
    title: "Dots and Loops",
    artist: "Stereolab",
    year: 1997,
    uri: null,
    coverImageUrl: "https://img.test/discogs.jpg",
    tracklist: [
        { position: "", title: "Side A", type: "heading" },
        { position: "A1", title: "Brakhage", duration: "7:58", type: "track" },
        { position: "A2", title: "Miss Modular", duration: "" },
    ],
};

function createDeps() {
    return {
        engine: { loadAlbum: jest.fn((_tracks: TrackList) => undefined) },
        catalog: { getRelease: jest.fn(async (_id: number) => release) },
        lookup: {
            lookupDuration: jest.fn(
                async (_artist: string, _title: string): Promise<number | null> => 185000
            ),
        },
        artwork: {
            getAlbumArtworkUrl: jest.fn(
                async (_artist: string, _album: string): Promise<string | null> =>
                    "https://img.test/lastfm.jpg"
            ),
        },
        sink: { onError: jest.fn((_message: string) => undefined) },
    };
}

function loadedTracks(deps: ReturnType<typeof createDeps>, call = 0) {
    return deps.engine.loadAlbum.mock.calls[call][0].toArray();
}

describe("AlbumLoader", () => {
    it("loads a release into the engine and summarises where durations came from", async () => {
        const deps = createDeps();
        const loader = new AlbumLoader(deps);

        const summary = await loader.loadRelease(
            "https://www.discogs.com/release/249504-Stereolab-Dots-And-Loops"
        );

        expect(deps.catalog.getRelease).toHaveBeenCalledWith(249504);
        expect(deps.lookup.lookupDuration).toHaveBeenCalledTimes(1);
        expect(deps.lookup.lookupDuration).toHaveBeenCalledWith("Stereolab", "Miss Modular");
        expect(summary).toEqual({
            releaseId: 249504,
            artist: "Stereolab",
            title: "Dots and Loops",
            trackCount: 2,
            artworkUrl: "https://img.test/lastfm.jpg",
            durations: { catalog: 1, lookup: 1, default: 0 },
        });
        expect(
            loadedTracks(deps).map((track) => [track.position, track.durationSeconds, track.durationDisplay])
        ).toEqual([
            ["A1", 478, "7:58"],
            ["A2", 185, "3:05"],
        ]);
    });

    it("falls back to the catalog cover", async () => {
        const deps = createDeps();
        deps.artwork.getAlbumArtworkUrl.mockResolvedValueOnce(null);

        const summary = await new AlbumLoader(deps).loadRelease("249504");

        expect(summary.artworkUrl).toBe("https://img.test/discogs.jpg");
    });

    it("falls back to the catalog cover when the artwork lookup throws", async () => {
        const deps = createDeps();
        deps.artwork.getAlbumArtworkUrl.mockRejectedValueOnce(new Error("offline"));

        const summary = await new AlbumLoader(deps).loadRelease("249504");

        expect(summary.artworkUrl).toBe("https://img.test/discogs.jpg");
    });

    it("rejects an invalid reference before contacting the catalog", () => {
        const deps = createDeps();

        expect(() => new AlbumLoader(deps).loadRelease("Dots and Loops")).toThrow(
            expect.objectContaining({ code: ErrorCode.INVALID_RELEASE_REFERENCE })
        );
        expect(deps.catalog.getRelease).not.toHaveBeenCalled();
    });

    it("reports duration lookup failures and uses the default duration", async () => {
        const deps = createDeps();
        deps.lookup.lookupDuration.mockRejectedValueOnce(new Error("offline"));

        const summary = await new AlbumLoader(deps).loadRelease("249504");

        expect(deps.sink.onError).toHaveBeenCalledWith(
            "Duration lookup failed for Stereolab - Miss Modular: offline"
        );
        expect(summary.durations).toEqual({ catalog: 1, lookup: 0, default: 1 });
        expect(loadedTracks(deps)[1].durationSeconds).toBe(210);
    });

    it("loads without lookup or artwork services", async () => {
        const deps = { ...createDeps(), lookup: null, artwork: null };

        const summary = await new AlbumLoader(deps).loadTracks(
            { artist: "Stereolab", title: "Dots and Loops" },
            release.tracklist
        );

        expect(summary).toMatchObject({
            releaseId: null,
            artworkUrl: null,
            durations: { catalog: 1, lookup: 0, default: 1 },
        });
    });

    it("does not touch the engine when the release has no playable tracks", async () => {
        const deps = createDeps();

        await expect(
            new AlbumLoader(deps).loadTracks({ artist: "Stereolab", title: "Empty" }, [
                { position: "", title: "Side A", type: "heading" },
            ])
        ).rejects.toMatchObject({ code: ErrorCode.EMPTY_ALBUM });
        expect(deps.engine.loadAlbum).not.toHaveBeenCalled();
    });

    it("runs loads one at a time in request order", async () => {
        const deps = createDeps();
        let finishLookup: (ms: number) => void = () => undefined;
        deps.lookup.lookupDuration.mockImplementationOnce(
            () =>
                new Promise<number>((resolve) => {
                    finishLookup = resolve;
                })
        );
        const loader = new AlbumLoader(deps);

        const slow = loader.loadTracks({ artist: "Stereolab", title: "Slow" }, [
            { position: "1", title: "Needs lookup" },
        ]);
        const fast = loader.loadTracks({ artist: "Stereolab", title: "Fast" }, [
            { position: "1", title: "Known", duration: "1:00" },
        ]);
        await new Promise((resolve) => setImmediate(resolve));

        expect(deps.engine.loadAlbum).not.toHaveBeenCalled();

        finishLookup(120000);
        await Promise.all([slow, fast]);

        expect(loadedTracks(deps, 0)[0].album).toBe("Slow");
        expect(loadedTracks(deps, 1)[0].album).toBe("Fast");
    });
});
