import { parseConfig } from "../config";
import { AppError, ErrorCode } from "../utils/errors";

describe("parseConfig", () => {
    function requiredEnv(): NodeJS.ProcessEnv {
        return {
            SPOTIFY_CLIENT_ID: "test-client-id",
            SPOTIFY_CLIENT_SECRET: "test-client-secret",
            SPOTIFY_REDIRECT_URI: "http://localhost:8000/auth/callback",
            JWT_SECRET: "test-secret",
        };
    }

    it("applies defaults for optional settings", () => {
        const config = parseConfig(requiredEnv());

        expect(config.port).toBe(8000);
        expect(config.nodeEnv).toBe("development");
        expect(config.frontendUrl).toBe("http://localhost:3000");
        expect(config.redisUrl).toBeUndefined();
        expect(config.jwt).toEqual({ secret: "test-secret", expiresInSeconds: 86400 });
        expect(config.spotify).toEqual({
            clientId: "test-client-id",
            clientSecret: "test-client-secret",
            redirectUri: "http://localhost:8000/auth/callback",
            apiBaseUrl: "https://api.spotify.com/v1",
            tokenUrl: "https://accounts.spotify.com/api/token",
            authorizeUrl: "https://accounts.spotify.com/authorize",
        });
    });

    it("reads explicit values", () => {
        const config = parseConfig({
            ...requiredEnv(),
            PORT: "4010",
            NODE_ENV: "production",
            FRONTEND_URL: "https://persona.example.test/",
            REDIS_URL: "redis://cache:6379",
            SESSION_TTL_HOURS: "1.5",
        });

        expect(config.port).toBe(4010);
        expect(config.nodeEnv).toBe("production");
        expect(config.frontendUrl).toBe("https://persona.example.test");
        expect(config.redisUrl).toBe("redis://cache:6379");
        expect(config.jwt.expiresInSeconds).toBe(5400);
    });

    it("treats a blank REDIS_URL as unset", () => {
        expect(parseConfig({ ...requiredEnv(), REDIS_URL: "  " }).redisUrl).toBeUndefined();
    });

    it("lists every missing or invalid variable", () => {
        const env = requiredEnv();
        delete env.JWT_SECRET;

        let thrown: unknown;
        try {
            parseConfig({ ...env, SPOTIFY_REDIRECT_URI: "not a url", PORT: "-1" });
        } catch (error) {
            thrown = error;
        }

        expect(thrown).toBeInstanceOf(AppError);
        expect(thrown).toMatchObject({
            code: ErrorCode.INVALID_CONFIG,
            details: {
                issues: expect.arrayContaining([
                    "SPOTIFY_REDIRECT_URI: SPOTIFY_REDIRECT_URI must be a URL",
                    expect.stringMatching(/^JWT_SECRET: /),
                    expect.stringMatching(/^PORT: /),
                ]),
            },
        });
    });
});
