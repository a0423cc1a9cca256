import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { logger } from "../utils/logger";
import { config } from "../config";
import { BRAND_USER_AGENT } from "../config/brand";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    externalServiceError,
} from "../utils/errors";
import { cleanCatalogArtistName } from "../utils/artistNormalization";
import { rateLimiter } from "./rateLimiter";
import type { RawCatalogTrack } from "./playback/types";

const releaseSchema = z.object({
    id: z.number(),
    title: z.string(),
    year: z.number().optional(),
    uri: z.string().optional(),
    artists: z.array(z.object({ name: z.string() })).default([]),
    images: z
        .array(z.object({ type: z.string(), uri: z.string() }))
        .optional(),
    tracklist: z
        .array(
            z.object({
                position: z.string().default(""),
                title: z.string().default(""),
                duration: z.string().optional(),
                type_: z.string().optional(),
            })
        )
        .default([]),
});

const searchSchema = z.object({
    results: z.array(
        z.object({
            id: z.number(),
            title: z.string(),
            year: z.string().optional(),
            thumb: z.string().optional(),
            format: z.array(z.string()).optional(),
            label: z.array(z.string()).optional(),
            country: z.string().optional(),
        })
    ),
    pagination: z.object({
        page: z.number(),
        pages: z.number(),
        items: z.number(),
    }),
});

export interface CatalogRelease {
    id: number;
    title: string;
    /** First credited artist, cleaned for Last.fm. */
    artist: string;
    year: number | null;
    uri: string | null;
    coverImageUrl: string | null;
    tracklist: RawCatalogTrack[];
}

export type ReleaseSearchResponse = z.infer<typeof searchSchema>;

function invalidReference(input: string): AppError {
    return new AppError(
        ErrorCode.INVALID_RELEASE_REFERENCE,
        ErrorCategory.RECOVERABLE,
        "Enter a Discogs release ID or a Discogs release URL (e.g. https://www.discogs.com/release/123456-Artist-Title)",
        { input }
    );
}

/**
 * Release id from a bare id ("123456") or a release URL. The id is the path
 * segment after "release"/"releases", optionally followed by "-slug".
 */
export function extractReleaseId(input: string): number {
    const trimmed = input.trim();
    if (/^\d+$/.test(trimmed)) {
        return Number.parseInt(trimmed, 10);
    }

    let url: URL;
    try {
        url = new URL(trimmed);
    } catch {
        throw invalidReference(input);
    }

    const segments = url.pathname.split("/").filter(Boolean);
    const marker = segments.findIndex(
        (segment) => segment === "release" || segment === "releases"
    );
    const candidate = marker >= 0 ? segments[marker + 1] : undefined;
    const match = candidate?.match(/^(\d+)(?:-.*)?$/);
    if (!match) {
        throw invalidReference(input);
    }
    return Number.parseInt(match[1], 10);
}

function toCatalogTrack(
    entry: z.infer<typeof releaseSchema>["tracklist"][number]
): RawCatalogTrack {
    return {
        position: entry.position,
        title: entry.title,
        duration: entry.duration,
        type: entry.type_,
    };
}

class DiscogsService {
    private client: AxiosInstance;

    constructor(token: string | undefined = config.discogs.token) {
        this.client = axios.create({
            baseURL: "https://api.discogs.com",
            timeout: 10000,
            headers: {
                "User-Agent": BRAND_USER_AGENT,
                ...(token ? { Authorization: `Discogs token=${token}` } : {}),
            },
        });
    }

    async getRelease(id: number): Promise<CatalogRelease> {
        logger.info(`Fetching Discogs release: ${id}`);

        let data: unknown;
        try {
            const response = await rateLimiter.execute("discogs", () =>
                this.client.get<unknown>(`/releases/${id}`)
            );
            data = response.data;
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status === 404) {
                throw new AppError(
                    ErrorCode.RELEASE_NOT_FOUND,
                    ErrorCategory.RECOVERABLE,
                    `Discogs release ${id} not found`,
                    { releaseId: id }
                );
            }
            logger.error(`Discogs release ${id} request failed`, { error });
            throw externalServiceError("Discogs", "release lookup", error);
        }

        const parsed = releaseSchema.safeParse(data);
        if (!parsed.success) {
            logger.error(`Unexpected Discogs release payload for ${id}`, {
                issues: parsed.error.issues.length,
            });
            throw externalServiceError("Discogs", "release lookup", parsed.error);
        }

        const release = parsed.data;
        const primary = release.images?.find((image) => image.type === "primary");
        const mapped: CatalogRelease = {
            id: release.id,
            title: release.title,
            artist: cleanCatalogArtistName(release.artists[0]?.name ?? ""),
            year: release.year && release.year > 0 ? release.year : null,
            uri: release.uri ?? null,
            coverImageUrl: primary?.uri ?? release.images?.[0]?.uri ?? null,
            tracklist: release.tracklist.map(toCatalogTrack),
        };

        logger.debug(
            `Loaded Discogs release "${mapped.title}" by ${mapped.artist || "unknown artist"} (${mapped.tracklist.length} entries)`
        );
        return mapped;
    }

    async searchReleases(query: string, page = 1): Promise<ReleaseSearchResponse> {
        try {
            const response = await rateLimiter.execute("discogs", () =>
                this.client.get<unknown>("/database/search", {
                    params: { q: query, type: "release", page },
                })
            );
            return searchSchema.parse(response.data);
        } catch (error) {
            logger.error(`Discogs search failed for "${query}"`, { error });
            throw externalServiceError("Discogs", "search", error);
        }
    }
}

export { DiscogsService };
export const discogsService = new DiscogsService();
