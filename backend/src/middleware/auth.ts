import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { config } from "../config";
import { logger } from "../utils/logger";

export interface SpotifySession {
    userId: string;
    accessToken: string;
    refreshToken: string | null;
}

declare global {
    namespace Express {
        interface Request {
            spotifySession?: SpotifySession;
        }
    }
}

export interface SessionTokenPayload {
    sub: string;
    spotifyAccessToken: string;
    spotifyRefreshToken?: string;
    userName?: string;
}

export function createSessionToken(
    payload: SessionTokenPayload,
    expiresInSeconds: number = config.jwt.expiresInSeconds
): string {
    return jwt.sign(payload, config.jwt.secret, {
        algorithm: "HS256",
        expiresIn: expiresInSeconds,
    });
}

type SessionLookup =
    | { ok: true; session: SpotifySession }
    | { ok: false; status: 401 | 403; error: string };

/**
 * Verifies a bearer session token and pulls out the Spotify credentials it
 * carries.
 */
export function resolveSession(authorization: string | undefined): SessionLookup {
    const match = authorization?.match(/^Bearer\s+(.+)$/i);
    if (!match) {
        return { ok: false, status: 403, error: "Not authenticated" };
    }

    let decoded: string | jwt.JwtPayload;
    try {
        decoded = jwt.verify(match[1].trim(), config.jwt.secret, {
            algorithms: ["HS256"],
        });
    } catch (error) {
        logger.debug("Session token rejected", { error });
        return { ok: false, status: 401, error: "Invalid token" };
    }

    if (typeof decoded === "string" || typeof decoded.sub !== "string") {
        return { ok: false, status: 401, error: "Invalid token" };
    }

    const accessToken = decoded.spotifyAccessToken;
    if (typeof accessToken !== "string" || accessToken.length === 0) {
        return { ok: false, status: 401, error: "Spotify access token not found" };
    }

    const refreshToken = decoded.spotifyRefreshToken;
    return {
        ok: true,
        session: {
            userId: decoded.sub,
            accessToken,
            refreshToken: typeof refreshToken === "string" ? refreshToken : null,
        },
    };
}

/**
 * Middleware to require a valid session token
 */
export function requireSpotifySession(req: Request, res: Response, next: NextFunction) {
    const lookup = resolveSession(req.headers.authorization);
    if (!lookup.ok) {
        if (lookup.status === 401) {
            res.setHeader("WWW-Authenticate", "Bearer");
        }
        return res.status(lookup.status).json({ error: lookup.error });
    }

    req.spotifySession = lookup.session;
    next();
}

export function getSession(req: Request): SpotifySession {
    if (!req.spotifySession) {
        throw new Error("requireSpotifySession must run before session-scoped handlers");
    }
    return req.spotifySession;
}
