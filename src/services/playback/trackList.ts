import { emptyAlbumError, indexOutOfRangeError } from "../../utils/errors";
import type {
    RawCatalogTrack,
    ReleaseIdentity,
    Track,
    TrackDurationResolver,
} from "./types";

/** Side headings are the only catalog entries that are not played. */
export function isPlayableEntry(entry: RawCatalogTrack): boolean {
    return entry.type !== "heading";
}

/**
 * Ordered, immutable tracks of one loaded album. An empty list stands for
 * "nothing loaded".
 */
export class TrackList {
    private readonly tracks: readonly Track[];

    private constructor(tracks: readonly Track[]) {
        this.tracks = Object.freeze(tracks.map((track) => Object.freeze({ ...track })));
    }

    static empty(): TrackList {
        return new TrackList([]);
    }

    static fromTracks(tracks: readonly Track[]): TrackList {
        return new TrackList(tracks);
    }

    /**
     * Builds the list from a catalog tracklist, resolving durations in catalog
     * order. Throws EMPTY_ALBUM when no playable entry remains.
     */
    static async load(
        rawTracks: readonly RawCatalogTrack[],
        release: ReleaseIdentity,
        resolver: TrackDurationResolver
    ): Promise<TrackList> {
        const playable = rawTracks.filter(isPlayableEntry);
        if (playable.length === 0) {
            throw emptyAlbumError({
                album: release.album,
                catalogEntries: rawTracks.length,
            });
        }

        const tracks: Track[] = [];
        for (const entry of playable) {
            const title = entry.title.trim() || "Unknown Track";
            const duration = await resolver.resolve(
                entry.duration,
                release.artist,
                title
            );
            tracks.push({
                position: entry.position,
                title,
                artist: release.artist,
                album: release.album,
                durationSeconds: duration.durationSeconds,
                durationDisplay: duration.durationDisplay,
            });
        }

        return new TrackList(tracks);
    }

    get length(): number {
        return this.tracks.length;
    }

    isEmpty(): boolean {
        return this.tracks.length === 0;
    }

    at(index: number): Track {
        const track = Number.isInteger(index) ? this.tracks[index] : undefined;
        if (track === undefined) {
            throw indexOutOfRangeError(index, this.tracks.length);
        }
        return track;
    }

    indexOfPosition(position: string): number {
        const wanted = position.trim();
        return this.tracks.findIndex((track) => track.position === wanted);
    }

    toArray(): readonly Track[] {
        return this.tracks;
    }
}
