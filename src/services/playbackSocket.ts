/**
 * Socket.IO channel for playback.
 *
 * Broadcast only: every connected client receives track changes, progress
 * ticks, album end and error messages. Commands go through the HTTP API.
 */

import type { Server as HttpServer } from "http";
import { Server, type Socket } from "socket.io";
import { logger } from "../utils/logger";
import type { PlaybackEngine } from "./playback/playbackEngine";
import type { PresentationSink, Track } from "./playback/types";

export const PLAYBACK_SOCKET_PATH = "/socket.io/playback";

export const PLAYBACK_EVENTS = {
    track: "playback:track",
    progress: "playback:progress",
    albumEnded: "playback:album-ended",
    error: "playback:error",
    snapshot: "playback:snapshot",
} as const;

export interface TrackChangedPayload {
    track: Track;
    isPlaying: boolean;
}

export interface ProgressPayload {
    elapsedSeconds: number;
    totalSeconds: number;
}

/** The slice of a Socket.IO server (or namespace) the sink needs. */
export interface Broadcaster {
    emit(event: string, ...args: unknown[]): boolean;
}

export function createSocketSink(broadcaster: Broadcaster): PresentationSink {
    return {
        onTrackChanged: (track, isPlaying) => {
            const payload: TrackChangedPayload = { track, isPlaying };
            broadcaster.emit(PLAYBACK_EVENTS.track, payload);
        },
        onProgress: (elapsedSeconds, totalSeconds) => {
            const payload: ProgressPayload = { elapsedSeconds, totalSeconds };
            broadcaster.emit(PLAYBACK_EVENTS.progress, payload);
        },
        onAlbumEnded: () => {
            broadcaster.emit(PLAYBACK_EVENTS.albumEnded);
        },
        onError: (message) => {
            broadcaster.emit(PLAYBACK_EVENTS.error, { message });
        },
    };
}

let io: Server | null = null;

/**
 * Sink bound to whichever server setupPlaybackSocket attached. Notifications
 * before setup, or after shutdown, go nowhere.
 */
export const playbackSocketSink: PresentationSink = createSocketSink({
    emit: (event, ...args) => (io ? io.emit(event, ...args) : false),
});

/**
 * Attaches the playback namespace to the HTTP server. Each new client gets
 * the current snapshot so it can render without waiting for the next tick.
 */
export function setupPlaybackSocket(
    httpServer: HttpServer,
    engine: Pick<PlaybackEngine, "getSnapshot">,
    allowedOrigins: string[] | true
): Server {
    io = new Server(httpServer, {
        path: PLAYBACK_SOCKET_PATH,
        cors: {
            origin: allowedOrigins,
            credentials: true,
        },
        maxHttpBufferSize: 1e5,
    });

    io.on("connection", (socket: Socket) => {
        logger.debug(`[Playback/WS] Client connected: ${socket.id}`);
        socket.emit(PLAYBACK_EVENTS.snapshot, engine.getSnapshot());
        socket.on("disconnect", (reason) => {
            logger.debug(`[Playback/WS] Client ${socket.id} disconnected: ${reason}`);
        });
    });

    return io;
}

export function shutdownPlaybackSocket(): void {
    if (io) {
        io.close();
        io = null;
    }
}
