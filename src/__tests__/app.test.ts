import request from "supertest";

jest.mock("../config", () => ({
    config: {
        nodeEnv: "production",
        allowedOrigins: ["http://turntable.local"],
    },
}));

jest.mock("../utils/logger", () => ({
    logger: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    },
}));

jest.mock("../services/playbackService", () => ({
    playbackEngine: {
        getSnapshot: jest.fn(() => ({ status: "idle" })),
        dispatch: jest.fn(),
    },
    albumLoader: { loadRelease: jest.fn() },
}));

jest.mock("../services/discogs", () => ({
    discogsService: { searchReleases: jest.fn() },
}));

import { createApp } from "../app";

describe("createApp", () => {
    const app = createApp();

    it("reports health", async () => {
        const res = await request(app).get("/health");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ status: "ok", service: "spindle" });
    });

    it("mounts the playback API", async () => {
        const res = await request(app).get("/api/playback");

        expect(res.body).toEqual({ status: "idle" });
    });

    it("allows configured origins only", async () => {
        const allowed = await request(app).get("/health").set("Origin", "http://turntable.local");
        const other = await request(app).get("/health").set("Origin", "http://elsewhere.test");

        expect(allowed.headers["access-control-allow-origin"]).toBe("http://turntable.local");
        expect(other.headers["access-control-allow-origin"]).toBeUndefined();
    });

    it("answers 404 for unknown routes", async () => {
        const res = await request(app).get("/api/unknown");

        expect(res.status).toBe(404);
    });
});
