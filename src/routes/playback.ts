import { Router, type NextFunction, type Response } from "express";
import { z } from "zod";
import { logger } from "../utils/logger";
import { albumLoader, playbackEngine } from "../services/playbackService";
import type { PlaybackCommand } from "../services/playback/types";
import { sendValidationError } from "./routeErrorResponse";

const router = Router();

const loadAlbumSchema = z.object({
    release: z.string().trim().min(1, "release is required"),
});

const selectSchema = z.union([
    z.object({ index: z.number().int() }),
    z.object({ position: z.string().trim().min(1) }),
]);

function runCommand(res: Response, next: NextFunction, command: PlaybackCommand) {
    try {
        res.json(playbackEngine.dispatch(command));
    } catch (error) {
        next(error);
    }
}

// GET /api/playback - current state
router.get("/", (_req, res) => {
    res.json(playbackEngine.getSnapshot());
});

// POST /api/playback/album - load a Discogs release by id or URL
router.post("/album", async (req, res, next) => {
    const parsed = loadAlbumSchema.safeParse(req.body);
    if (!parsed.success) {
        return sendValidationError(res, parsed.error);
    }

    try {
        const album = await albumLoader.loadRelease(parsed.data.release);
        res.json({ album, playback: playbackEngine.getSnapshot() });
    } catch (error) {
        logger.debug(`Album load failed for "${parsed.data.release}"`);
        next(error);
    }
});

router.post("/toggle", (_req, res, next) => {
    runCommand(res, next, { type: "togglePlayback" });
});

router.post("/next", (_req, res, next) => {
    runCommand(res, next, { type: "next" });
});

router.post("/previous", (_req, res, next) => {
    runCommand(res, next, { type: "previous" });
});

// POST /api/playback/select - { index } or { position }
router.post("/select", (req, res, next) => {
    const parsed = selectSchema.safeParse(req.body);
    if (!parsed.success) {
        return sendValidationError(res, parsed.error, "Provide an integer index or a position");
    }

    const body = parsed.data;
    runCommand(
        res,
        next,
        "index" in body
            ? { type: "select", index: body.index }
            : { type: "selectPosition", position: body.position }
    );
});

export default router;
