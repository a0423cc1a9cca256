import { logger as rootLogger, type Logger } from "../../utils/logger";
import {
    clampDurationSeconds,
    formatMinutesSeconds,
    parseDurationString,
} from "../../utils/duration";
import type {
    MetadataLookup,
    ResolvedDuration,
    TrackDurationResolver,
} from "./types";

export const DEFAULT_DURATION_SECONDS = 210;
export const DEFAULT_DURATION_DISPLAY = "3:30";

export interface DurationResolverOptions {
    lookup?: MetadataLookup | null;
    logger?: Logger;
    /** Called when the lookup throws; the resolver still falls through. */
    onLookupFailure?: (error: unknown, artist: string, title: string) => void;
}

/**
 * Resolves a track duration: the catalog string first, then the metadata
 * lookup, then a fixed 3:30.
 */
export class DurationResolver implements TrackDurationResolver {
    private readonly lookup: MetadataLookup | null;
    private readonly logger: Logger;
    private readonly onLookupFailure?: DurationResolverOptions["onLookupFailure"];

    constructor(options: DurationResolverOptions = {}) {
        this.lookup = options.lookup ?? null;
        this.logger = options.logger ?? rootLogger.child("duration");
        this.onLookupFailure = options.onLookupFailure;
    }

    async resolve(
        catalogDuration: string | null | undefined,
        artist: string,
        title: string
    ): Promise<ResolvedDuration> {
        const fromCatalog = this.fromCatalog(catalogDuration);
        if (fromCatalog) {
            return fromCatalog;
        }

        if (catalogDuration && catalogDuration.trim() !== "") {
            this.logger.warn(
                `Unparseable catalog duration "${catalogDuration}" for ${artist} - ${title}`
            );
        }

        const fromLookup = await this.fromLookup(artist, title);
        if (fromLookup) {
            return fromLookup;
        }

        this.logger.warn(`Using default duration for ${artist} - ${title}`);
        return {
            durationSeconds: DEFAULT_DURATION_SECONDS,
            durationDisplay: DEFAULT_DURATION_DISPLAY,
            source: "default",
        };
    }

    private fromCatalog(
        catalogDuration: string | null | undefined
    ): ResolvedDuration | null {
        if (!catalogDuration || catalogDuration.trim() === "") {
            return null;
        }

        const seconds = parseDurationString(catalogDuration);
        if (seconds === null) {
            return null;
        }

        return {
            durationSeconds: clampDurationSeconds(seconds),
            durationDisplay: catalogDuration.trim(),
            source: "catalog",
        };
    }

    private async fromLookup(
        artist: string,
        title: string
    ): Promise<ResolvedDuration | null> {
        if (!this.lookup) {
            return null;
        }

        let durationMs: number | null;
        try {
            this.logger.debug(`Looking up duration for ${artist} - ${title}`);
            durationMs = await this.lookup.lookupDuration(artist, title);
        } catch (error) {
            this.logger.warn(
                `Duration lookup failed for ${artist} - ${title}`,
                { error }
            );
            this.onLookupFailure?.(error, artist, title);
            return null;
        }

        if (
            durationMs === null ||
            !Number.isFinite(durationMs) ||
            durationMs <= 0
        ) {
            this.logger.debug(`No usable lookup duration for ${artist} - ${title}`);
            return null;
        }

        const seconds = clampDurationSeconds(Math.floor(durationMs / 1000));
        return {
            durationSeconds: seconds,
            durationDisplay: formatMinutesSeconds(seconds),
            source: "lookup",
        };
    }
}
