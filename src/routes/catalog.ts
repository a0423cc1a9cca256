import { Router } from "express";
import { z } from "zod";
import { discogsService } from "../services/discogs";
import { catalogSearchLimiter } from "../middleware/rateLimiter";
import { sendValidationError } from "./routeErrorResponse";

const router = Router();

const searchQuerySchema = z.object({
    q: z.string().trim().min(1, "q is required"),
    page: z.coerce.number().int().min(1).default(1),
});

// GET /api/catalog/search?q=&page= - Discogs release search
router.get("/search", catalogSearchLimiter, async (req, res, next) => {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
        return sendValidationError(res, parsed.error);
    }

    try {
        const results = await discogsService.searchReleases(
            parsed.data.q,
            parsed.data.page
        );
        res.json(results);
    } catch (error) {
        next(error);
    }
});

export default router;
