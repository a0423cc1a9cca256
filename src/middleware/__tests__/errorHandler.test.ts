import express from "express";
import request from "supertest";

let mockNodeEnv = "production";

jest.mock("../../config", () => ({
    config: {
        get nodeEnv() {
            return mockNodeEnv;
        },
    },
}));

jest.mock("../../utils/logger", () => ({
    logger: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    },
}));

import { errorHandler, statusForAppError } from "../errorHandler";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    emptyAlbumError,
    externalServiceError,
    indexOutOfRangeError,
    noAlbumLoadedError,
} from "../../utils/errors";

function appThrowing(error: Error) {
    const app = express();
    app.get("/boom", () => {
        throw error;
    });
    app.use(errorHandler);
    return app;
}

describe("statusForAppError", () => {
    it.each([
        [emptyAlbumError(), 400],
        [indexOutOfRangeError(3, 2), 400],
        [
            new AppError(ErrorCode.INVALID_RELEASE_REFERENCE, ErrorCategory.RECOVERABLE, "bad"),
            400,
        ],
        [noAlbumLoadedError(), 409],
        [new AppError(ErrorCode.RELEASE_NOT_FOUND, ErrorCategory.RECOVERABLE, "missing"), 404],
        [externalServiceError("Last.fm", "scrobble", new Error("down")), 503],
        [new AppError(ErrorCode.INVALID_CONFIG, ErrorCategory.FATAL, "broken"), 500],
    ])("maps %s", (error, status) => {
        expect(statusForAppError(error)).toBe(status);
    });
});

describe("errorHandler", () => {
    afterEach(() => {
        mockNodeEnv = "production";
    });

    it("includes details only in development", async () => {
        mockNodeEnv = "development";

        const res = await request(appThrowing(indexOutOfRangeError(3, 2))).get("/boom");

        expect(res.status).toBe(400);
        expect(res.body).toEqual({
            error: "Track index 3 is outside [0, 2)",
            code: "INDEX_OUT_OF_RANGE",
            category: "RECOVERABLE",
            details: { index: 3, length: 2 },
        });
    });

    it("hides unexpected errors in production", async () => {
        const res = await request(appThrowing(new Error("database password leaked"))).get("/boom");

        expect(res.status).toBe(500);
        expect(res.body).toEqual({ error: "Internal server error" });
    });

    it("shows unexpected error messages outside production", async () => {
        mockNodeEnv = "development";

        const res = await request(appThrowing(new Error("kaboom"))).get("/boom");

        expect(res.status).toBe(500);
        expect(res.body.error).toBe("kaboom");
    });
});
