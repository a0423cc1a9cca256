import axios, { AxiosInstance } from "axios";
import { createHash } from "crypto";
import { z } from "zod";
import { logger } from "../utils/logger";
import { config, type LastFmConfig } from "../config";
import { BRAND_USER_AGENT } from "../config/brand";
import { rateLimiter } from "./rateLimiter";
import type { MetadataLookup, ScrobbleClient, Track } from "./playback/types";

type LastFmParams = Record<string, string>;

/** Last.fm error codes spindle reacts to. */
export const LASTFM_ERROR = {
    INVALID_PARAMETERS: 6,
    AUTHENTICATION_FAILED: 4,
    INVALID_SESSION_KEY: 9,
    RATE_LIMIT_EXCEEDED: 29,
} as const;

export class LastFmApiError extends Error {
    constructor(
        public readonly code: number,
        message: string,
        public readonly method: string
    ) {
        super(`Last.fm ${method} error ${code}: ${message}`);
        this.name = "LastFmApiError";
    }
}

const errorBodySchema = z.object({
    error: z.coerce.number(),
    message: z.string().optional(),
});

const trackInfoSchema = z.object({
    track: z.object({
        duration: z.coerce.number().optional(),
    }),
});

const albumInfoSchema = z.object({
    album: z.object({
        image: z
            .array(z.object({ "#text": z.string(), size: z.string() }))
            .optional(),
    }),
});

const sessionSchema = z.object({
    session: z.object({
        name: z.string(),
        key: z.string(),
    }),
});

const scrobbleResponseSchema = z.object({
    scrobbles: z.object({
        "@attr": z.object({
            accepted: z.coerce.number(),
            ignored: z.coerce.number(),
        }),
        scrobble: z
            .object({
                ignoredMessage: z
                    .object({ code: z.string(), "#text": z.string().optional() })
                    .optional(),
            })
            .optional(),
    }),
});

/** Preferred artwork sizes, largest first. */
const IMAGE_SIZES = ["mega", "extralarge", "large", "medium"];

/**
 * Request signature: every parameter except `format` and `callback`, sorted
 * by name, concatenated as name+value, followed by the shared secret, md5-hex.
 */
export function signLastFmParams(params: LastFmParams, secret: string): string {
    const payload = Object.keys(params)
        .filter((key) => key !== "format" && key !== "callback")
        .sort()
        .map((key) => `${key}${params[key]}`)
        .join("");
    return createHash("md5").update(payload + secret, "utf8").digest("hex");
}

function toApiError(method: string, error: unknown): unknown {
    if (axios.isAxiosError(error)) {
        const body = errorBodySchema.safeParse(error.response?.data);
        if (body.success) {
            return new LastFmApiError(
                body.data.error,
                body.data.message ?? "Unknown error",
                method
            );
        }
    }
    return error;
}

export class LastFmService implements ScrobbleClient, MetadataLookup {
    private client: AxiosInstance;
    private sessionKey: string | null;
    private pendingSession: Promise<string> | null = null;

    constructor(private readonly settings: LastFmConfig = config.lastfm) {
        this.sessionKey = settings.sessionKey ?? null;
        this.client = axios.create({
            baseURL: "https://ws.audioscrobbler.com/2.0/",
            timeout: 10000,
            headers: {
                "User-Agent": BRAND_USER_AGENT,
            },
        });
    }

    get canScrobble(): boolean {
        return this.settings.scrobblingEnabled && Boolean(this.settings.apiSecret);
    }

    get canLookup(): boolean {
        return Boolean(this.settings.apiKey);
    }

    // -----------------------------------------------------------------------
    // Transport
    // -----------------------------------------------------------------------

    private async read(method: string, params: LastFmParams): Promise<unknown> {
        try {
            const response = await rateLimiter.execute("lastfm", () =>
                this.client.get<unknown>("/", {
                    params: {
                        ...params,
                        method,
                        api_key: this.settings.apiKey,
                        format: "json",
                    },
                })
            );
            return this.unwrap(method, response.data);
        } catch (error) {
            throw toApiError(method, error);
        }
    }

    private async write(method: string, params: LastFmParams): Promise<unknown> {
        const signed: LastFmParams = {
            ...params,
            method,
            api_key: this.settings.apiKey,
        };
        const body = new URLSearchParams({
            ...signed,
            api_sig: signLastFmParams(signed, this.settings.apiSecret),
            format: "json",
        });

        try {
            const response = await rateLimiter.execute("lastfm", () =>
                this.client.post<unknown>("/", body.toString(), {
                    headers: {
                        "Content-Type": "application/x-www-form-urlencoded",
                    },
                })
            );
            return this.unwrap(method, response.data);
        } catch (error) {
            throw toApiError(method, error);
        }
    }

    /** Last.fm sometimes answers HTTP 200 with an error body. */
    private unwrap(method: string, data: unknown): unknown {
        const failure = errorBodySchema.safeParse(data);
        if (failure.success) {
            throw new LastFmApiError(
                failure.data.error,
                failure.data.message ?? "Unknown error",
                method
            );
        }
        return data;
    }

    // -----------------------------------------------------------------------
    // Authentication
    // -----------------------------------------------------------------------

    /**
     * Returns a session key: the configured one, or one obtained through
     * auth.getMobileSession. Concurrent callers share a single request.
     */
    async authenticate(): Promise<string> {
        if (this.sessionKey) return this.sessionKey;
        if (this.pendingSession) return this.pendingSession;

        const { username, password } = this.settings;
        if (!username || !password) {
            throw new LastFmApiError(
                LASTFM_ERROR.AUTHENTICATION_FAILED,
                "No session key or credentials configured",
                "auth.getMobileSession"
            );
        }

        this.pendingSession = (async () => {
            const data = sessionSchema.parse(
                await this.write("auth.getMobileSession", { username, password })
            );
            this.sessionKey = data.session.key;
            logger.info(`Authenticated with Last.fm as ${data.session.name}`);
            return data.session.key;
        })();

        try {
            return await this.pendingSession;
        } finally {
            this.pendingSession = null;
        }
    }

    /**
     * Signed call with the session key. An invalidated key is dropped and the
     * call is repeated once with a fresh session when credentials allow it.
     */
    private async writeWithSession(
        method: string,
        params: LastFmParams
    ): Promise<unknown> {
        const sk = await this.authenticate();
        try {
            return await this.write(method, { ...params, sk });
        } catch (error) {
            const expired =
                error instanceof LastFmApiError &&
                error.code === LASTFM_ERROR.INVALID_SESSION_KEY;
            if (!expired || !this.settings.password) {
                throw error;
            }
            logger.warn("Last.fm session key rejected, re-authenticating");
            this.sessionKey = null;
            const fresh = await this.authenticate();
            return this.write(method, { ...params, sk: fresh });
        }
    }

    // -----------------------------------------------------------------------
    // Scrobbling
    // -----------------------------------------------------------------------

    async updateNowPlaying(track: Track): Promise<void> {
        await this.writeWithSession("track.updateNowPlaying", {
            artist: track.artist,
            track: track.title,
            album: track.album,
            duration: String(track.durationSeconds),
        });
        logger.debug(`Now playing sent: ${track.artist} - ${track.title}`);
    }

    async scrobble(track: Track, timestamp: Date): Promise<void> {
        const data = scrobbleResponseSchema.parse(
            await this.writeWithSession("track.scrobble", {
                artist: track.artist,
                track: track.title,
                album: track.album,
                duration: String(track.durationSeconds),
                timestamp: String(Math.floor(timestamp.getTime() / 1000)),
            })
        );

        const { ignored } = data.scrobbles["@attr"];
        if (ignored > 0) {
            const reason =
                data.scrobbles.scrobble?.ignoredMessage?.["#text"] ||
                `ignored (code ${data.scrobbles.scrobble?.ignoredMessage?.code ?? "unknown"})`;
            throw new Error(`Scrobble rejected by Last.fm: ${reason}`);
        }
    }

    // -----------------------------------------------------------------------
    // Metadata
    // -----------------------------------------------------------------------

    /** Track duration in milliseconds, or null when Last.fm does not know it. */
    async getTrackDurationMs(artist: string, title: string): Promise<number | null> {
        if (!this.canLookup) {
            return null;
        }

        try {
            const data = trackInfoSchema.parse(
                await this.read("track.getInfo", {
                    artist,
                    track: title,
                    autocorrect: "1",
                })
            );
            const duration = data.track.duration;
            return duration !== undefined && duration > 0 ? duration : null;
        } catch (error) {
            if (
                error instanceof LastFmApiError &&
                error.code === LASTFM_ERROR.INVALID_PARAMETERS
            ) {
                logger.debug(`Track not found on Last.fm: ${artist} - ${title}`);
                return null;
            }
            throw error;
        }
    }

    lookupDuration(artist: string, title: string): Promise<number | null> {
        return this.getTrackDurationMs(artist, title);
    }

    /** Largest album cover Last.fm has, or null. Never throws. */
    async getAlbumArtworkUrl(artist: string, album: string): Promise<string | null> {
        if (!this.canLookup) {
            return null;
        }

        try {
            const data = albumInfoSchema.parse(
                await this.read("album.getInfo", {
                    artist,
                    album,
                    autocorrect: "1",
                })
            );
            const images = data.album.image ?? [];
            for (const size of IMAGE_SIZES) {
                const url = images.find((image) => image.size === size)?.["#text"];
                if (url) {
                    return url;
                }
            }
            return null;
        } catch (error) {
            logger.warn(`Failed to get Last.fm artwork for ${artist} - ${album}`, {
                error,
            });
            return null;
        }
    }
}

export const lastFmService = new LastFmService();
