import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "./utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";

dotenv.config();

// Validate critical environment variables on startup
const envSchema = z.object({
    SPOTIFY_CLIENT_ID: z.string().min(1, "SPOTIFY_CLIENT_ID is required"),
    SPOTIFY_CLIENT_SECRET: z.string().min(1, "SPOTIFY_CLIENT_SECRET is required"),
    SPOTIFY_REDIRECT_URI: z.string().url("SPOTIFY_REDIRECT_URI must be a URL"),
    JWT_SECRET: z.string().min(1, "JWT_SECRET is required"),
    FRONTEND_URL: z.string().url().default("http://localhost:3000"),
    PORT: z.coerce.number().int().positive().default(8000),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    // Empty means "no cache", same as unset
    REDIS_URL: z
        .string()
        .optional()
        .transform((value) => value?.trim() || undefined),
    SESSION_TTL_HOURS: z.coerce.number().positive().default(24),
});

export interface AppConfig {
    port: number;
    nodeEnv: "development" | "production" | "test";
    frontendUrl: string;
    redisUrl: string | undefined;
    jwt: {
        secret: string;
        expiresInSeconds: number;
    };
    spotify: {
        clientId: string;
        clientSecret: string;
        redirectUri: string;
        apiBaseUrl: string;
        tokenUrl: string;
        authorizeUrl: string;
    };
}

/** Validates an environment map and shapes it into the runtime configuration. */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Environment validation failed",
            {
                issues: result.error.errors.map(
                    (err) => `${err.path.join(".")}: ${err.message}`
                ),
            }
        );
    }

    const parsed = result.data;
    return {
        port: parsed.PORT,
        nodeEnv: parsed.NODE_ENV,
        frontendUrl: parsed.FRONTEND_URL.replace(/\/+$/, ""),
        redisUrl: parsed.REDIS_URL,
        jwt: {
            secret: parsed.JWT_SECRET,
            expiresInSeconds: Math.round(parsed.SESSION_TTL_HOURS * 3600),
        },
        spotify: {
            clientId: parsed.SPOTIFY_CLIENT_ID,
            clientSecret: parsed.SPOTIFY_CLIENT_SECRET,
            redirectUri: parsed.SPOTIFY_REDIRECT_URI,
            apiBaseUrl: "https://api.spotify.com/v1",
            tokenUrl: "https://accounts.spotify.com/api/token",
            authorizeUrl: "https://accounts.spotify.com/authorize",
        },
    };
}

function loadConfig(): AppConfig {
    try {
        const loaded = parseConfig(process.env);
        logger.debug("Environment variables validated");
        return loaded;
    } catch (error) {
        if (error instanceof AppError && error.code === ErrorCode.INVALID_CONFIG) {
            logger.error("Environment validation failed:");
            const issues = error.details?.issues;
            if (Array.isArray(issues)) {
                issues.forEach((issue) => logger.error(`   - ${String(issue)}`));
            }
            logger.error(
                "Please check your .env file and ensure all required variables are set."
            );
            process.exit(1);
        }
        throw error;
    }
}

/** Centralized runtime configuration object for the API and its integrations. */
export const config: AppConfig = loadConfig();
