import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory } from "../utils/errors";
import { config } from "../config";

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
    [ErrorCategory.RECOVERABLE]: 400, // client can retry with changes
    [ErrorCategory.TRANSIENT]: 503, // client can retry later
    [ErrorCategory.FATAL]: 500,
};

export function errorHandler(
    err: Error,
    _req: Request,
    res: Response,
    _next: NextFunction
) {
    if (err instanceof AppError) {
        logger.error(`[AppError] ${err.code}: ${err.message}`, err.details);

        return res.status(STATUS_BY_CATEGORY[err.category]).json({
            error: err.message,
            code: err.code,
            category: err.category,
            ...(config.nodeEnv === "development" && { details: err.details }),
        });
    }

    logger.error("Unhandled error:", err.stack);

    if (config.nodeEnv === "production") {
        return res.status(500).json({ error: "Internal server error" });
    }

    return res.status(500).json({
        error: err.message || "Internal server error",
        stack: err.stack,
    });
}
