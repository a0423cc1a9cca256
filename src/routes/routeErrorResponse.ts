import type { Response } from "express";
import type { ZodError } from "zod";

export type RouteErrorExtras = Record<string, unknown>;

export const sendRouteError = (
    res: Response,
    statusCode: number,
    message: string,
    extras?: RouteErrorExtras
): Response => {
    if (extras && Object.keys(extras).length > 0) {
        return res.status(statusCode).json({
            error: message,
            ...extras,
        });
    }

    return res.status(statusCode).json({ error: message });
};

/** 400 with one "field: message" line per zod issue. */
export const sendValidationError = (
    res: Response,
    error: ZodError,
    message = "Invalid request"
): Response =>
    sendRouteError(res, 400, message, {
        issues: error.issues.map((issue) =>
            issue.path.length > 0
                ? `${issue.path.join(".")}: ${issue.message}`
                : issue.message
        ),
    });
