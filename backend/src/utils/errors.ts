import { ZodError } from "zod";

/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can retry with different input
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Spotify errors
    SPOTIFY_AUTH_FAILED = "SPOTIFY_AUTH_FAILED",
    SPOTIFY_RATE_LIMITED = "SPOTIFY_RATE_LIMITED",
    SPOTIFY_REQUEST_FAILED = "SPOTIFY_REQUEST_FAILED",
    SPOTIFY_RESPONSE_INVALID = "SPOTIFY_RESPONSE_INVALID",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

interface HttpErrorLike {
    isAxiosError: true;
    message: string;
    response?: {
        status?: number;
        data?: unknown;
    };
}

function isHttpError(error: unknown): error is HttpErrorLike {
    return (
        typeof error === "object" &&
        error !== null &&
        "isAxiosError" in error &&
        error.isAxiosError === true
    );
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a failed Spotify call (HTTP or response-shape failure) in an AppError
 */
export function wrapSpotifyError(error: unknown, context: string): AppError {
    if (error instanceof AppError) {
        return error;
    }

    if (error instanceof ZodError) {
        return new AppError(
            ErrorCode.SPOTIFY_RESPONSE_INVALID,
            ErrorCategory.FATAL,
            `Unexpected Spotify response: ${context}`,
            { issues: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) }
        );
    }

    if (isHttpError(error)) {
        const status = error.response?.status;

        if (status === 401 || status === 403) {
            return new AppError(
                ErrorCode.SPOTIFY_AUTH_FAILED,
                ErrorCategory.RECOVERABLE,
                `Spotify rejected credentials: ${context}`,
                { status, originalError: error.message }
            );
        }

        if (status === 429) {
            return new AppError(
                ErrorCode.SPOTIFY_RATE_LIMITED,
                ErrorCategory.TRANSIENT,
                `Spotify rate limit reached: ${context}`,
                { status, originalError: error.message }
            );
        }

        return new AppError(
            ErrorCode.SPOTIFY_REQUEST_FAILED,
            ErrorCategory.TRANSIENT,
            `Spotify request failed: ${context}`,
            { status, originalError: error.message }
        );
    }

    return new AppError(
        ErrorCode.SPOTIFY_REQUEST_FAILED,
        ErrorCategory.TRANSIENT,
        `Spotify request failed: ${context}`,
        { originalError: errorMessage(error) }
    );
}
