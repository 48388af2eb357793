import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory } from "../utils/errors";
import { config } from "../config";

export function statusForCategory(category: ErrorCategory): number {
    switch (category) {
        case ErrorCategory.RECOVERABLE:
            return 400; // client can retry with changes
        case ErrorCategory.TRANSIENT:
            return 503; // client can retry later
        case ErrorCategory.FATAL:
            return 500;
    }
}

export function errorHandler(
    err: Error,
    _req: Request,
    res: Response,
    _next: NextFunction
) {
    if (err instanceof AppError) {
        logger.error(`[AppError] ${err.code}: ${err.message}`, err.details ?? {});

        return res.status(statusForCategory(err.category)).json({
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

    res.status(500).json({
        error: err.message || "Internal server error",
        stack: err.stack,
    });
}
