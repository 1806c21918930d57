import rateLimit from "express-rate-limit";

// Runs behind a reverse proxy with "trust proxy" enabled.
const trustProxyValidation = { validate: { trustProxy: false } };

// General API limit (600 req/min), health checks excluded
export const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    limit: 600,
    message: { error: "Too many requests, please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === "/health" || req.path === "/api/health",
    ...trustProxyValidation,
});

// Pipeline runs (30 req/min)
export const recommendationRunLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    limit: 30,
    message: { error: "Too many recommendation runs. Please slow down." },
    standardHeaders: true,
    legacyHeaders: false,
    ...trustProxyValidation,
});
