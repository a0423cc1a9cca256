import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode, isAppError } from "../utils/errors";
import { config } from "../config";

/** HTTP status for an AppError: code-specific first, then by category. */
export function statusForAppError(err: AppError): number {
    switch (err.code) {
        case ErrorCode.NO_ALBUM_LOADED:
            return 409; // Conflict - valid request, wrong state
        case ErrorCode.RELEASE_NOT_FOUND:
            return 404;
    }

    switch (err.category) {
        case ErrorCategory.RECOVERABLE:
            return 400;
        case ErrorCategory.TRANSIENT:
            return 503;
        case ErrorCategory.FATAL:
            return 500;
    }
}

function isBodyParseError(err: Error): boolean {
    return "type" in err && err.type === "entity.parse.failed";
}

export function errorHandler(
    err: Error,
    _req: Request,
    res: Response,
    _next: NextFunction
) {
    if (isAppError(err)) {
        const statusCode = statusForAppError(err);
        if (statusCode >= 500) {
            logger.error(`[AppError] ${err.code}: ${err.message}`, err.details);
        } else {
            logger.debug(`[AppError] ${err.code}: ${err.message}`, err.details);
        }

        return res.status(statusCode).json({
            error: err.message,
            code: err.code,
            category: err.category,
            ...(config.nodeEnv === "development" && { details: err.details }),
        });
    }

    if (isBodyParseError(err)) {
        return res.status(400).json({ error: "Malformed JSON body" });
    }

    logger.error("Unhandled error:", err.stack);

    if (config.nodeEnv === "production") {
        return res.status(500).json({ error: "Internal server error" });
    }

    res.status(500).json({
        error: err.message || "Internal server error",
        stack: err.stack,
    });
}
