import PQueue from "p-queue";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { extractReleaseId, type CatalogRelease } from "./discogs";
import { DurationResolver } from "./playback/durationResolver";
import { TrackList } from "./playback/trackList";
import type { PlaybackEngine } from "./playback/playbackEngine";
import type {
    MetadataLookup,
    PresentationSink,
    RawCatalogTrack,
    TrackDurationResolver,
} from "./playback/types";

export interface AlbumSummary {
    releaseId: number | null;
    artist: string;
    title: string;
    trackCount: number;
    artworkUrl: string | null;
    durations: {
        catalog: number;
        lookup: number;
        default: number;
    };
}

export interface AlbumLoaderDeps {
    engine: Pick<PlaybackEngine, "loadAlbum">;
    catalog: { getRelease(id: number): Promise<CatalogRelease> };
    lookup: MetadataLookup | null;
    artwork: { getAlbumArtworkUrl(artist: string, album: string): Promise<string | null> } | null;
    sink: Pick<PresentationSink, "onError">;
    logger?: Logger;
}

/**
 * Turns a catalog release into a TrackList and loads it into the engine.
 * Loads run one at a time, in the order they were requested.
 */
export class AlbumLoader {
    private readonly queue = new PQueue({ concurrency: 1 });
    private readonly logger: Logger;

    constructor(private readonly deps: AlbumLoaderDeps) {
        this.logger = deps.logger ?? rootLogger.child("album-loader");
    }

    /** Accepts a Discogs release id or release URL. */
    loadRelease(reference: string): Promise<AlbumSummary> {
        const releaseId = extractReleaseId(reference);
        return this.enqueue(async () => {
            const release = await this.deps.catalog.getRelease(releaseId);
            return this.build(
                { id: release.id, artist: release.artist, title: release.title },
                release.tracklist,
                release.coverImageUrl
            );
        });
    }

    /** Loads an already-fetched tracklist. */
    loadTracks(
        release: { artist: string; title: string },
        rawTracks: RawCatalogTrack[]
    ): Promise<AlbumSummary> {
        return this.enqueue(() =>
            this.build({ id: null, ...release }, rawTracks, null)
        );
    }

    private async enqueue(task: () => Promise<AlbumSummary>): Promise<AlbumSummary> {
        return this.queue.add(task);
    }

    private async build(
        release: { id: number | null; artist: string; title: string },
        rawTracks: RawCatalogTrack[],
        catalogCover: string | null
    ): Promise<AlbumSummary> {
        const durations = { catalog: 0, lookup: 0, default: 0 };
        const resolver = new DurationResolver({
            lookup: this.deps.lookup,
            logger: this.logger.child("duration"),
            onLookupFailure: (error, artist, title) => {
                const reason = error instanceof Error ? error.message : String(error);
                this.deps.sink.onError(
                    `Duration lookup failed for ${artist} - ${title}: ${reason}`
                );
            },
        });
        const counting: TrackDurationResolver = {
            resolve: async (duration, artist, title) => {
                const resolved = await resolver.resolve(duration, artist, title);
                durations[resolved.source] += 1;
                return resolved;
            },
        };

        const tracks = await TrackList.load(
            rawTracks,
            { artist: release.artist, album: release.title },
            counting
        );

        const artworkUrl = (await this.findArtwork(release.artist, release.title)) ?? catalogCover;

        this.deps.engine.loadAlbum(tracks);

        this.logger.info(
            `Loaded album: ${release.title} with ${tracks.length} tracks`,
            durations
        );

        return {
            releaseId: release.id,
            artist: release.artist,
            title: release.title,
            trackCount: tracks.length,
            artworkUrl,
            durations,
        };
    }

    private async findArtwork(artist: string, album: string): Promise<string | null> {
        if (!this.deps.artwork || !artist) {
            return null;
        }
        try {
            return await this.deps.artwork.getAlbumArtworkUrl(artist, album);
        } catch (error) {
            this.logger.warn(`Error loading artwork for ${artist} - ${album}`, { error });
            return null;
        }
    }
}
