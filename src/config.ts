import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "./utils/logger";
import { AppError, ErrorCategory, ErrorCode, isAppError } from "./utils/errors";
import {
    isEnvFlagEnabled,
    parseEnvCsv,
    parseEnvInt,
} from "./utils/envParsers";

dotenv.config();

const numericString = z
    .string()
    .regex(/^\d+$/, "must be a whole number")
    .optional();

const optionalText = z
    .string()
    .optional()
    .transform((value) => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : undefined;
    });

const envSchema = z
    .object({
        PORT: numericString,
        NODE_ENV: z.enum(["development", "production", "test"]).optional(),
        LASTFM_API_KEY: optionalText,
        LASTFM_API_SECRET: optionalText,
        LASTFM_USERNAME: optionalText,
        LASTFM_PASSWORD: optionalText,
        LASTFM_SESSION_KEY: optionalText,
        DISCOGS_TOKEN: optionalText,
        ANNOUNCE_TRACKS: z.enum(["true", "false"]).optional(),
        SHUTDOWN_TIMEOUT_MS: numericString,
        ALLOWED_ORIGINS: z.string().optional(),
    })
    .superRefine((env, ctx) => {
        const wantsSession = Boolean(
            env.LASTFM_SESSION_KEY || env.LASTFM_USERNAME
        );
        if (wantsSession && (!env.LASTFM_API_KEY || !env.LASTFM_API_SECRET)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["LASTFM_API_SECRET"],
                message:
                    "LASTFM_API_KEY and LASTFM_API_SECRET are required to scrobble",
            });
        }
        if (
            env.LASTFM_USERNAME &&
            !env.LASTFM_PASSWORD &&
            !env.LASTFM_SESSION_KEY
        ) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["LASTFM_PASSWORD"],
                message:
                    "LASTFM_PASSWORD is required when no LASTFM_SESSION_KEY is set",
            });
        }
    });

export interface LastFmConfig {
    apiKey: string;
    apiSecret: string;
    username?: string;
    password?: string;
    sessionKey?: string;
    /** True when a session key exists or can be obtained. */
    scrobblingEnabled: boolean;
}

export interface AppConfig {
    port: number;
    nodeEnv: "development" | "production" | "test";
    allowedOrigins: string[] | true;
    lastfm: LastFmConfig;
    discogs: {
        token?: string;
    };
    playback: {
        /** Log a "Now playing" line for every track start. */
        announceTracks: boolean;
        shutdownTimeoutMs: number;
    };
}

/** Builds the runtime configuration from an environment, without side effects. */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Environment validation failed",
            {
                issues: result.error.errors.map(
                    (issue) => `${issue.path.join(".")}: ${issue.message}`
                ),
            }
        );
    }

    const parsed = result.data;
    const nodeEnv = parsed.NODE_ENV ?? "development";
    const origins = parseEnvCsv(parsed.ALLOWED_ORIGINS);

    return {
        port: parseEnvInt(parsed.PORT, 3007),
        nodeEnv,
        allowedOrigins: origins ?? (nodeEnv === "development" ? true : []),
        lastfm: {
            apiKey: parsed.LASTFM_API_KEY ?? "",
            apiSecret: parsed.LASTFM_API_SECRET ?? "",
            username: parsed.LASTFM_USERNAME,
            password: parsed.LASTFM_PASSWORD,
            sessionKey: parsed.LASTFM_SESSION_KEY,
            scrobblingEnabled: Boolean(
                parsed.LASTFM_SESSION_KEY || parsed.LASTFM_USERNAME
            ),
        },
        discogs: {
            token: parsed.DISCOGS_TOKEN,
        },
        playback: {
            announceTracks: isEnvFlagEnabled(parsed.ANNOUNCE_TRACKS, true),
            shutdownTimeoutMs: parseEnvInt(parsed.SHUTDOWN_TIMEOUT_MS, 5000),
        },
    };
}

function loadConfigOrExit(): AppConfig {
    try {
        const loaded = loadConfig(process.env);
        logger.debug("Environment variables validated");
        return loaded;
    } catch (error) {
        if (isAppError(error, ErrorCode.INVALID_CONFIG)) {
            logger.error(" Environment validation failed:");
            const issues = error.details?.issues;
            if (Array.isArray(issues)) {
                issues.forEach((issue) => logger.error(`   - ${String(issue)}`));
            }
            logger.error(
                "\n Please check your .env file and ensure the Last.fm settings are complete."
            );
            process.exit(1);
        }
        throw error;
    }
}

/** Centralized runtime configuration object. */
export const config: AppConfig = loadConfigOrExit();
