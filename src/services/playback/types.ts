import type { TrackList } from "./trackList";

// ---------------------------------------------------------------------------
// Catalog input
// ---------------------------------------------------------------------------

/** One tracklist entry as the catalog returns it. */
export interface RawCatalogTrack {
    position: string;
    title: string;
    /** "M:SS" or "H:MM:SS"; often empty on vinyl releases. */
    duration?: string;
    /** Discogs entry type (`track`, `index` or `heading`); absent means "track". */
    type?: string;
}

/** Release-level identity every track inherits. */
export interface ReleaseIdentity {
    artist: string;
    album: string;
}

// ---------------------------------------------------------------------------
// Tracks and state
// ---------------------------------------------------------------------------

export interface Track {
    readonly position: string;
    readonly title: string;
    readonly artist: string;
    readonly album: string;
    /** Integer, always >= 1. */
    readonly durationSeconds: number;
    readonly durationDisplay: string;
}

export type DurationSource = "catalog" | "lookup" | "default";

export interface ResolvedDuration {
    durationSeconds: number;
    durationDisplay: string;
    source: DurationSource;
}

/** Anything that can produce a track's duration; see DurationResolver. */
export interface TrackDurationResolver {
    resolve(
        catalogDuration: string | null | undefined,
        artist: string,
        title: string
    ): Promise<ResolvedDuration>;
}

export type PlaybackStatus = "idle" | "stopped" | "playing";

/** Copy of the engine's state handed to observers. */
export interface PlaybackSnapshot {
    status: PlaybackStatus;
    tracks: readonly Track[];
    currentIndex: number;
    currentTrack: Track | null;
    isPlaying: boolean;
    elapsedSeconds: number;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Duration lookup by artist and title. Resolves to milliseconds, or null when
 * the service does not know the track; rejects on transport/API failure.
 */
export interface MetadataLookup {
    lookupDuration(artist: string, title: string): Promise<number | null>;
}

/** Listening-history service. Both calls are best effort. */
export interface ScrobbleClient {
    updateNowPlaying(track: Track): Promise<void>;
    /** `timestamp` is the moment the play completed. */
    scrobble(track: Track, timestamp: Date): Promise<void>;
}

/**
 * Outbound notifications for whatever displays playback. Sinks observe only;
 * they change playback solely by issuing commands.
 */
export interface PresentationSink {
    onTrackChanged(track: Track, isPlaying: boolean): void;
    onProgress(elapsedSeconds: number, totalSeconds: number): void;
    onAlbumEnded(): void;
    onError(message: string): void;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export type PlaybackCommand =
    | { type: "loadAlbum"; tracks: TrackList }
    | { type: "togglePlayback" }
    | { type: "next" }
    | { type: "previous" }
    | { type: "select"; index: number }
    | { type: "selectPosition"; position: string };
