import { combineSinks, createLoggingSink, noopSink } from "../sinks";
import type { PresentationSink, Track } from "../types";

const track: Track = {
    position: "B2",
    title: "Cybele's Reverie",
    artist: "Stereolab",
    album: "Emperor Tomato Ketchup",
    durationSeconds: 207,
    durationDisplay: "3:27",
};

function createLoggerMock() {
    const logger = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    };
    logger.child.mockReturnValue(logger);
    return logger;
}

function createSink() {
    return {
        onTrackChanged: jest.fn(),
        onProgress: jest.fn(),
        onAlbumEnded: jest.fn(),
        onError: jest.fn(),
    } satisfies PresentationSink;
}

describe("combineSinks", () => {
    it("fans every notification out to each sink", () => {
        const a = createSink();
        const b = createSink();
        const combined = combineSinks([a, b], createLoggerMock());

        combined.onTrackChanged(track, true);
        combined.onProgress(12, 207);
        combined.onAlbumEnded();
        combined.onError("lookup failed");

        for (const sink of [a, b]) {
            expect(sink.onTrackChanged).toHaveBeenCalledWith(track, true);
            expect(sink.onProgress).toHaveBeenCalledWith(12, 207);
            expect(sink.onAlbumEnded).toHaveBeenCalledTimes(1);
            expect(sink.onError).toHaveBeenCalledWith("lookup failed");
        }
    });

    it("keeps notifying the other sinks when one throws", () => {
        const logger = createLoggerMock();
        const broken = createSink();
        broken.onProgress.mockImplementation(() => {
            throw new Error("closed");
        });
        const healthy = createSink();

        combineSinks([broken, healthy, noopSink], logger).onProgress(1, 207);

        expect(healthy.onProgress).toHaveBeenCalledWith(1, 207);
        expect(logger.error).toHaveBeenCalledWith("Sink failed while handling onProgress", {
            error: expect.any(Error),
        });
    });
});

describe("createLoggingSink", () => {
    it("announces started tracks when enabled", () => {
        const logger = createLoggerMock();
        const sink = createLoggingSink(logger, { announceTracks: true });

        sink.onTrackChanged(track, true);
        sink.onTrackChanged(track, false);

        expect(logger.info).toHaveBeenCalledWith(
            "Now playing: Stereolab - Cybele's Reverie (3:27)"
        );
        expect(logger.debug).toHaveBeenCalledWith(
            "Cued: B2. Stereolab - Cybele's Reverie (3:27)"
        );
    });

    it("only logs cues when announcements are disabled", () => {
        const logger = createLoggerMock();
        const sink = createLoggingSink(logger, { announceTracks: false });

        sink.onTrackChanged(track, true);

        expect(logger.info).not.toHaveBeenCalled();
        expect(logger.debug).toHaveBeenCalledTimes(1);
    });

    it("logs progress once a minute", () => {
        const logger = createLoggerMock();
        const sink = createLoggingSink(logger, { announceTracks: true });

        for (let elapsed = 0; elapsed <= 130; elapsed++) {
            sink.onProgress(elapsed, 207);
        }

        expect(logger.debug.mock.calls).toEqual([
            ["Progress 1:00 / 3:27"],
            ["Progress 2:00 / 3:27"],
        ]);
    });

    it("logs album end and errors", () => {
        const logger = createLoggerMock();
        const sink = createLoggingSink(logger, { announceTracks: true });

        sink.onAlbumEnded();
        sink.onError("Scrobble failed");

        expect(logger.info).toHaveBeenCalledWith("Playback finished: end of album reached");
        expect(logger.warn).toHaveBeenCalledWith("Scrobble failed");
    });
});
