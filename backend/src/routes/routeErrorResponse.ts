import type { Response } from "express";
import { AppError, ErrorCode, errorMessage } from "../utils/errors";

export type RouteErrorExtras = Record<string, unknown>;

export const sendRouteError = (
    res: Response,
    statusCode: number,
    message: string,
    extras?: RouteErrorExtras
): Response => {
    if (extras && Object.keys(extras).length > 0) {
        return res.status(statusCode).json({
            error: message,
            ...extras,
        });
    }

    return res.status(statusCode).json({ error: message });
};

const UPSTREAM_STATUS: Partial<Record<ErrorCode, number>> = {
    [ErrorCode.SPOTIFY_AUTH_FAILED]: 401,
    [ErrorCode.SPOTIFY_RATE_LIMITED]: 503,
};

/**
 * Reports a failed Spotify call as `<prefix>: <reason>`. Token rejections
 * map to 401 so clients know to refresh, rate limits to 503, the rest to 502.
 */
export const sendUpstreamRouteError = (
    res: Response,
    prefix: string,
    error: unknown
): Response => {
    if (error instanceof AppError) {
        return sendRouteError(
            res,
            UPSTREAM_STATUS[error.code] ?? 502,
            `${prefix}: ${error.message}`,
            { code: error.code }
        );
    }

    return sendRouteError(res, 502, `${prefix}: ${errorMessage(error)}`);
};
