import express from "express";
import cors from "cors";
import helmet from "helmet";
import { config } from "./config";
import { BRAND_NAME } from "./config/brand";
import { logger } from "./utils/logger";
import { errorHandler } from "./middleware/errorHandler";
import { apiLimiter } from "./middleware/rateLimiter";
import playbackRoutes from "./routes/playback";
import catalogRoutes from "./routes/catalog";

export function createApp() {
    const app = express();

    app.use(
        helmet({
            crossOriginResourcePolicy: { policy: "cross-origin" },
        })
    );
    app.use(
        cors({
            origin: (origin, callback) => {
                if (!origin || config.allowedOrigins === true) {
                    callback(null, true);
                } else if (config.allowedOrigins.includes(origin)) {
                    callback(null, true);
                } else {
                    logger.debug(`[CORS] Origin ${origin} not in allowlist`);
                    callback(null, false);
                }
            },
            credentials: true,
        })
    );
    app.use(express.json({ limit: "100kb" }));

    app.use("/api", apiLimiter);
    app.use("/api/playback", playbackRoutes);
    app.use("/api/catalog", catalogRoutes);

    app.get("/health", (_req, res) => {
        res.json({ status: "ok", service: BRAND_NAME });
    });

    app.use(errorHandler);

    return app;
}
