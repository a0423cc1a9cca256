import { createServer } from "http";
import type { Socket } from "net";
import { config } from "./config";
import { BRAND_NAME } from "./config/brand";
import { logger } from "./utils/logger";
import { createApp } from "./app";
import { rateLimiter } from "./services/rateLimiter";
import { playbackEngine } from "./services/playbackService";
import {
    setupPlaybackSocket,
    shutdownPlaybackSocket,
} from "./services/playbackSocket";

const HTTP_SERVER_CLOSE_TIMEOUT_MS = 5_000;

const app = createApp();
const httpServer = createServer(app);
const activeHttpConnections = new Set<Socket>();

httpServer.on("connection", (socket) => {
    activeHttpConnections.add(socket);
    socket.on("close", () => {
        activeHttpConnections.delete(socket);
    });
});

setupPlaybackSocket(httpServer, playbackEngine, config.allowedOrigins);

httpServer.listen(config.port, "0.0.0.0", () => {
    logger.info(`${BRAND_NAME} listening on port ${config.port} (${config.nodeEnv})`);
});

// Graceful shutdown handling
let isShuttingDown = false;

async function closeHttpServerWithTimeout(timeoutMs: number): Promise<void> {
    await new Promise<void>((resolve) => {
        let settled = false;
        const finish = () => {
            if (settled) return;
            settled = true;
            clearTimeout(timeoutId);
            resolve();
        };

        const timeoutId = setTimeout(() => {
            const openConnections = activeHttpConnections.size;
            if (openConnections > 0) {
                logger.warn(
                    `[Shutdown] HTTP server close timed out after ${timeoutMs}ms; forcing ${openConnections} active connection(s) closed`
                );
            }
            for (const socket of activeHttpConnections) {
                socket.destroy();
            }
            httpServer.closeAllConnections();
            finish();
        }, timeoutMs);
        timeoutId.unref();

        httpServer.close((error) => {
            if (error) {
                logger.debug(`[Shutdown] HTTP server close: ${error.message}`);
            }
            finish();
        });
        httpServer.closeIdleConnections();
    });
}

async function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
        logger.debug("Shutdown already in progress...");
        return;
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    try {
        shutdownPlaybackSocket();

        logger.debug("Closing HTTP server...");
        await closeHttpServerWithTimeout(HTTP_SERVER_CLOSE_TIMEOUT_MS);

        const { drained, abandoned } = await playbackEngine.shutdown(
            config.playback.shutdownTimeoutMs
        );
        if (!drained) {
            logger.warn(`Abandoned ${abandoned} pending Last.fm call(s)`);
        }

        rateLimiter.clear();

        logger.info("Graceful shutdown complete");
        process.exit(0);
    } catch (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
    }
}

// Handle termination signals
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception - initiating graceful shutdown:", {
        message: error.message,
        stack: error.stack,
    });
    gracefulShutdown("uncaughtException").catch(() => {
        process.exit(1);
    });
});
