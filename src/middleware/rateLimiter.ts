import rateLimit from "express-rate-limit";

// General API limiter. Commands are cheap; this only stops runaway clients.
export const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 600,
    message: "Too many requests from this IP, please try again later.",
    standardHeaders: true,
    legacyHeaders: false,
    validate: { trustProxy: false },
});

// Every search costs one Discogs request, and Discogs allows 60 per minute.
export const catalogSearchLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 30,
    message: "Too many catalog searches, please slow down.",
    standardHeaders: true,
    legacyHeaders: false,
    validate: { trustProxy: false },
});
