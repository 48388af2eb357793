import { Router } from "express";
import { z } from "zod";
import { config } from "../config";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { createSessionToken, getSession, requireSpotifySession } from "../middleware/auth";
import { spotifyService } from "../services/spotify";
import { sendRouteError } from "./routeErrorResponse";

const router = Router();
const log = logger.child("auth");

const callbackQuerySchema = z.object({
    code: z.string().min(1).optional(),
    error: z.string().min(1).optional(),
});

/**
 * GET /auth/login
 * Redirect to Spotify's consent screen
 */
router.get("/login", (_req, res) => {
    res.redirect(spotifyService.getAuthUrl());
});

/**
 * GET /auth/callback
 * Spotify redirects here with either `code` or `error`. On success the
 * Spotify tokens are wrapped in a session token and handed to the frontend.
 */
router.get("/callback", async (req, res) => {
    const query = callbackQuerySchema.safeParse(req.query);
    const { code, error } = query.success ? query.data : { code: undefined, error: undefined };

    if (error) {
        log.warn(`Spotify authorization denied: ${error}`);
        return res.redirect(`${config.frontendUrl}?error=${encodeURIComponent(error)}`);
    }

    if (!code) {
        return sendRouteError(res, 400, "Authorization code not provided");
    }

    try {
        const tokens = await spotifyService.exchangeCodeForTokens(code);
        const profile = await spotifyService.getUserProfile(tokens.accessToken);

        const sessionToken = createSessionToken({
            sub: profile.id,
            spotifyAccessToken: tokens.accessToken,
            spotifyRefreshToken: tokens.refreshToken,
            userName: profile.displayName,
        });

        log.info(`Signed in ${profile.id}`);
        return res.redirect(
            `${config.frontendUrl}/callback?token=${encodeURIComponent(sessionToken)}`
        );
    } catch (err) {
        log.error("Authorization callback failed", { error: err });
        return sendRouteError(res, 400, `Authentication failed: ${errorMessage(err)}`);
    }
});

/**
 * POST /auth/refresh
 * Trade the stored Spotify refresh token for a fresh access token and
 * re-issue the session token around it
 */
router.post("/refresh", requireSpotifySession, async (req, res) => {
    const session = getSession(req);
    if (!session.refreshToken) {
        return sendRouteError(res, 400, "Refresh token not found");
    }

    try {
        const tokens = await spotifyService.refreshAccessToken(session.refreshToken);
        // Spotify only sometimes rotates the refresh token
        const refreshToken = tokens.refreshToken ?? session.refreshToken;

        const sessionToken = createSessionToken({
            sub: session.userId,
            spotifyAccessToken: tokens.accessToken,
            spotifyRefreshToken: refreshToken,
        });

        return res.json({
            accessToken: sessionToken,
            refreshToken,
            expiresIn: tokens.expiresIn,
            tokenType: "Bearer",
        });
    } catch (err) {
        log.error("Token refresh failed", { error: err });
        return sendRouteError(res, 400, `Token refresh failed: ${errorMessage(err)}`);
    }
});

export default router;
