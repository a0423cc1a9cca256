/**
 * Playback state machine.
 *
 * Owns the current track pointer and the countdown for a record playing
 * outside the computer. States:
 *
 *   idle     no album loaded
 *   stopped  album loaded, not counting down
 *   playing  counting down tracks[currentIndex]
 *
 * Only a track that reaches its end (completion timer, or an explicit skip to
 * next) is scrobbled. Stop, previous and select abandon the track.
 *
 * Commands are synchronous and run to completion on the event loop, so they
 * never interleave. Timer callbacks check that their handle is still the
 * armed one, and handleTrackEnd re-checks `isPlaying`, so a timer that was
 * already queued when a command cancelled it does nothing.
 */

import { logger as rootLogger, type Logger } from "../../utils/logger";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    emptyAlbumError,
    noAlbumLoadedError,
} from "../../utils/errors";
import { TrackList } from "./trackList";
import { timerScheduler, type ScheduledTask, type Scheduler } from "./scheduler";
import type {
    PlaybackCommand,
    PlaybackSnapshot,
    PlaybackStatus,
    PresentationSink,
    ScrobbleClient,
    Track,
} from "./types";

const PROGRESS_INTERVAL_MS = 1000;

export interface PlaybackEngineOptions {
    sink: PresentationSink;
    /** Null disables now-playing updates and scrobbles. */
    scrobbler: ScrobbleClient | null;
    scheduler?: Scheduler;
    now?: () => Date;
    logger?: Logger;
}

export interface ShutdownResult {
    /** False when the wait timed out with external calls still in flight. */
    drained: boolean;
    abandoned: number;
}

type ExternalOperation = "now playing" | "scrobble";

export class PlaybackEngine {
    private tracks: TrackList = TrackList.empty();
    private currentIndex = 0;
    private isPlaying = false;
    private elapsedSeconds = 0;

    private completionTask: ScheduledTask | null = null;
    private progressTask: ScheduledTask | null = null;
    private readonly inFlight = new Set<Promise<void>>();
    private closed = false;

    private readonly sink: PresentationSink;
    private readonly scrobbler: ScrobbleClient | null;
    private readonly scheduler: Scheduler;
    private readonly now: () => Date;
    private readonly logger: Logger;

    constructor(options: PlaybackEngineOptions) {
        this.sink = options.sink;
        this.scrobbler = options.scrobbler;
        this.scheduler = options.scheduler ?? timerScheduler;
        this.now = options.now ?? (() => new Date());
        this.logger = options.logger ?? rootLogger.child("playback");
    }

    // -----------------------------------------------------------------------
    // Observation
    // -----------------------------------------------------------------------

    get status(): PlaybackStatus {
        if (this.tracks.isEmpty()) return "idle";
        return this.isPlaying ? "playing" : "stopped";
    }

    getSnapshot(): PlaybackSnapshot {
        const empty = this.tracks.isEmpty();
        return {
            status: this.status,
            tracks: this.tracks.toArray(),
            currentIndex: this.currentIndex,
            currentTrack: empty ? null : this.tracks.at(this.currentIndex),
            isPlaying: this.isPlaying,
            elapsedSeconds: this.elapsedSeconds,
        };
    }

    /** External calls that have not settled yet. */
    get pendingExternalCalls(): number {
        return this.inFlight.size;
    }

    // -----------------------------------------------------------------------
    // Commands
    // -----------------------------------------------------------------------

    dispatch(command: PlaybackCommand): PlaybackSnapshot {
        switch (command.type) {
            case "loadAlbum":
                this.loadAlbum(command.tracks);
                break;
            case "togglePlayback":
                this.togglePlayback();
                break;
            case "next":
                this.skipToNext();
                break;
            case "previous":
                this.skipToPrevious();
                break;
            case "select":
                this.selectTrack(command.index);
                break;
            case "selectPosition":
                this.selectTrackByPosition(command.position);
                break;
        }
        return this.getSnapshot();
    }

    /** Replaces the album. An interrupted track is not scrobbled. */
    loadAlbum(tracks: TrackList): void {
        if (tracks.isEmpty()) {
            throw emptyAlbumError();
        }

        if (this.isPlaying) {
            this.logger.info("Interrupting playback to load a new album");
        }
        this.halt();

        this.tracks = tracks;
        this.currentIndex = 0;

        const first = tracks.at(0);
        this.logger.info(
            `Loaded album: ${first.artist} - ${first.album} with ${tracks.length} tracks`
        );
        this.announceStopped();
    }

    togglePlayback(): void {
        this.requireAlbum();

        if (this.isPlaying) {
            this.stopPlayback();
        } else {
            this.startPlayback();
        }
    }

    /** Abandons the current track: no scrobble, index unchanged. */
    stopPlayback(): void {
        if (this.tracks.isEmpty()) return;

        const wasPlaying = this.isPlaying;
        this.halt();
        if (wasPlaying) {
            this.logger.info(`Stopped playback of "${this.currentTrack().title}"`);
        }
        this.announceStopped();
    }

    /**
     * The current track reached its end: scrobble it and move on, stopping at
     * the end of the album. Fired by the completion timer and by skipToNext.
     */
    handleTrackEnd(): void {
        if (!this.isPlaying) return;

        const finished = this.currentTrack();
        this.cancelTimers();
        this.submitScrobble(finished);

        const nextIndex = (this.currentIndex + 1) % this.tracks.length;
        this.currentIndex = nextIndex;

        if (nextIndex === 0) {
            this.stopPlayback();
            this.logger.info("End of album reached");
            this.emit((sink) => sink.onAlbumEnded());
            return;
        }

        this.startPlayback();
    }

    /** Counts as a completed play of the skipped track. No-op unless playing. */
    skipToNext(): void {
        if (!this.isPlaying) return;
        this.logger.debug(`Skipping "${this.currentTrack().title}"`);
        this.handleTrackEnd();
    }

    skipToPrevious(): void {
        this.requireAlbum();

        this.halt();
        this.currentIndex =
            this.currentIndex === 0 ? this.tracks.length - 1 : this.currentIndex - 1;
        this.announceStopped();
    }

    selectTrack(index: number): void {
        const track = this.tracks.at(index);

        this.halt();
        this.currentIndex = index;
        this.logger.info(`Selected track: ${track.position} - ${track.title}`);
        this.announceStopped();
    }

    selectTrackByPosition(position: string): void {
        const index = this.tracks.indexOfPosition(position);
        if (index < 0) {
            this.logger.warn(`Could not find track with position: ${position}`);
            throw new AppError(
                ErrorCode.INDEX_OUT_OF_RANGE,
                ErrorCategory.RECOVERABLE,
                `No track at position "${position}"`,
                { position }
            );
        }
        this.selectTrack(index);
    }

    /**
     * Cancels both timers and waits, at most `timeoutMs`, for now-playing and
     * scrobble calls that are still in flight. Timers are never re-armed
     * afterwards.
     */
    async shutdown(timeoutMs: number): Promise<ShutdownResult> {
        this.closed = true;
        this.halt();

        const pending = Array.from(this.inFlight);
        if (pending.length === 0) {
            return { drained: true, abandoned: 0 };
        }

        this.logger.debug(`Waiting for ${pending.length} external call(s)`);
        let expire: (drained: false) => void = () => undefined;
        const timedOut = new Promise<false>((resolve) => {
            expire = resolve;
        });
        const deadline = this.scheduler.once(timeoutMs, () => expire(false));
        const settled = Promise.allSettled(pending).then(() => true as const);

        const drained = await Promise.race([settled, timedOut]);
        deadline.cancel();

        if (!drained) {
            this.logger.warn(
                `Shutdown timed out after ${timeoutMs}ms with ${this.inFlight.size} external call(s) pending`
            );
        }
        return { drained, abandoned: drained ? 0 : this.inFlight.size };
    }

    // -----------------------------------------------------------------------
    // Internals
    // -----------------------------------------------------------------------

    private startPlayback(): void {
        if (this.closed) {
            this.logger.warn("Ignoring playback start after shutdown");
            return;
        }

        this.cancelTimers();
        const track = this.currentTrack();
        this.isPlaying = true;
        this.elapsedSeconds = 0;

        this.logger.info(`Starting playback of track: ${track.title}`);
        this.emit((sink) => sink.onTrackChanged(track, true));
        this.emit((sink) => sink.onProgress(0, track.durationSeconds));

        this.submitNowPlaying(track);

        const progress = this.scheduler.every(PROGRESS_INTERVAL_MS, () => {
            if (progress !== this.progressTask || !this.isPlaying) return;
            this.elapsedSeconds = Math.min(
                this.elapsedSeconds + 1,
                track.durationSeconds
            );
            const elapsed = this.elapsedSeconds;
            this.emit((sink) => sink.onProgress(elapsed, track.durationSeconds));
        });
        this.progressTask = progress;

        const completion = this.scheduler.once(track.durationSeconds * 1000, () => {
            if (completion !== this.completionTask) return;
            this.completionTask = null;
            // Interval drift can leave the last tick behind the completion timer.
            if (this.elapsedSeconds < track.durationSeconds) {
                this.elapsedSeconds = track.durationSeconds;
                this.emit((sink) => sink.onProgress(track.durationSeconds, track.durationSeconds));
            }
            this.handleTrackEnd();
        });
        this.completionTask = completion;
    }

    /** Stop sequence without notifications: timers off, flags reset. */
    private halt(): void {
        this.cancelTimers();
        this.isPlaying = false;
        this.elapsedSeconds = 0;
    }

    private cancelTimers(): void {
        this.completionTask?.cancel();
        this.completionTask = null;
        this.progressTask?.cancel();
        this.progressTask = null;
    }

    private announceStopped(): void {
        const track = this.currentTrack();
        this.emit((sink) => sink.onTrackChanged(track, false));
        this.emit((sink) => sink.onProgress(0, track.durationSeconds));
    }

    private currentTrack(): Track {
        return this.tracks.at(this.currentIndex);
    }

    private requireAlbum(): void {
        if (this.tracks.isEmpty()) {
            throw noAlbumLoadedError();
        }
    }

    private submitNowPlaying(track: Track): void {
        const scrobbler = this.scrobbler;
        if (!scrobbler) return;
        this.fireAndForget("now playing", track, () =>
            scrobbler.updateNowPlaying(track)
        );
    }

    private submitScrobble(track: Track): void {
        const scrobbler = this.scrobbler;
        if (!scrobbler) {
            this.logger.debug(`Scrobbling disabled, skipping "${track.title}"`);
            return;
        }
        const timestamp = this.now();
        this.fireAndForget("scrobble", track, () =>
            scrobbler.scrobble(track, timestamp)
        );
    }

    /**
     * Runs an external call off the transition path. Failures are logged and
     * reported through the sink's error channel; they never reach the caller.
     */
    private fireAndForget(
        operation: ExternalOperation,
        track: Track,
        run: () => Promise<void>
    ): void {
        const label = `${track.artist} - ${track.title}`;
        const isScrobble = operation === "scrobble";

        const call = (async () => {
            try {
                await run();
                this.logger.info(
                    isScrobble ? `Scrobbled: ${label}` : `Updated now playing: ${label}`
                );
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                this.logger.error(`Failed to ${operation}: ${label}`, { error });
                this.emit((sink) =>
                    sink.onError(
                        `${isScrobble ? "Scrobble" : "Now playing update"} failed for ${label}: ${reason}`
                    )
                );
            }
        })();

        this.inFlight.add(call);
        void call.finally(() => this.inFlight.delete(call));
    }

    private emit(notify: (sink: PresentationSink) => void): void {
        try {
            notify(this.sink);
        } catch (error) {
            this.logger.error("Presentation sink threw", { error });
        }
    }
}
