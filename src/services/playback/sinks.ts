import { logger as rootLogger, type Logger } from "../../utils/logger";
import { formatMinutesSeconds } from "../../utils/duration";
import type { PresentationSink, Track } from "./types";

export const noopSink: PresentationSink = {
    onTrackChanged: () => undefined,
    onProgress: () => undefined,
    onAlbumEnded: () => undefined,
    onError: () => undefined,
};

/**
 * Fans every notification out to all sinks. A sink that throws is logged and
 * skipped; the remaining sinks still receive the notification.
 */
export function combineSinks(
    sinks: PresentationSink[],
    logger: Logger = rootLogger.child("sinks")
): PresentationSink {
    const each = (event: string, notify: (sink: PresentationSink) => void) => {
        for (const sink of sinks) {
            try {
                notify(sink);
            } catch (error) {
                logger.error(`Sink failed while handling ${event}`, { error });
            }
        }
    };

    return {
        onTrackChanged: (track, isPlaying) =>
            each("onTrackChanged", (sink) => sink.onTrackChanged(track, isPlaying)),
        onProgress: (elapsed, total) =>
            each("onProgress", (sink) => sink.onProgress(elapsed, total)),
        onAlbumEnded: () => each("onAlbumEnded", (sink) => sink.onAlbumEnded()),
        onError: (message) => each("onError", (sink) => sink.onError(message)),
    };
}

export interface LoggingSinkOptions {
    /** "Now playing" line on every track start. */
    announceTracks: boolean;
}

function describe(track: Track): string {
    return `${track.artist} - ${track.title} (${track.durationDisplay})`;
}

/** Presentation through the log: track announcements, album end, errors. */
export function createLoggingSink(
    logger: Logger,
    options: LoggingSinkOptions
): PresentationSink {
    return {
        onTrackChanged: (track, isPlaying) => {
            if (isPlaying && options.announceTracks) {
                logger.info(`Now playing: ${describe(track)}`);
            } else {
                logger.debug(`Cued: ${track.position}. ${describe(track)}`);
            }
        },
        onProgress: (elapsed, total) => {
            if (elapsed > 0 && elapsed % 60 === 0) {
                logger.debug(
                    `Progress ${formatMinutesSeconds(elapsed)} / ${formatMinutesSeconds(total)}`
                );
            }
        },
        onAlbumEnded: () => {
            logger.info("Playback finished: end of album reached");
        },
        onError: (message) => {
            logger.warn(message);
        },
    };
}
