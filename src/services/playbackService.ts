import { config } from "../config";
import { logger } from "../utils/logger";
import { AlbumLoader } from "./albumLoader";
import { discogsService } from "./discogs";
import { lastFmService } from "./lastfm";
import { PlaybackEngine } from "./playback/playbackEngine";
import { combineSinks, createLoggingSink } from "./playback/sinks";
import { playbackSocketSink } from "./playbackSocket";

const playbackLogger = logger.child("playback");

const sink = combineSinks([
    createLoggingSink(playbackLogger, {
        announceTracks: config.playback.announceTracks,
    }),
    playbackSocketSink,
]);

if (!lastFmService.canScrobble) {
    logger.info("Last.fm scrobbling disabled (no session key or credentials)");
}

export const playbackEngine = new PlaybackEngine({
    sink,
    scrobbler: lastFmService.canScrobble ? lastFmService : null,
    logger: playbackLogger,
});

export const albumLoader = new AlbumLoader({
    engine: playbackEngine,
    catalog: discogsService,
    lookup: lastFmService.canLookup ? lastFmService : null,
    artwork: lastFmService.canLookup ? lastFmService : null,
    sink,
});
