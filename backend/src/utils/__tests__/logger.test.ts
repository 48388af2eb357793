import type { Logger } from "../logger";

describe("logger", () => {
    const originalEnv = process.env;

    afterEach(() => {
        process.env = originalEnv;
        jest.restoreAllMocks();
        jest.resetModules();
    });

    async function loadLogger(env: Record<string, string>) {
        jest.resetModules();
        process.env = { ...originalEnv, ...env };
        return import("../logger");
    }

    describe("resolveLogLevel", () => {
        it("prefers LOG_LEVEL and falls back per environment", async () => {
            const { resolveLogLevel } = await loadLogger({});

            expect(resolveLogLevel({ LOG_LEVEL: " WARN ", NODE_ENV: "production" })).toBe("warn");
            expect(resolveLogLevel({ LOG_LEVEL: "loud" })).toBe("silent");
            expect(resolveLogLevel({ NODE_ENV: "production" })).toBe("info");
            expect(resolveLogLevel({ NODE_ENV: "test" })).toBe("silent");
            expect(resolveLogLevel({})).toBe("debug");
        });
    });

    it("prefixes level and nested scope and drops messages below the level", async () => {
        const info = jest.spyOn(console, "info").mockImplementation(() => undefined);
        const debug = jest.spyOn(console, "debug").mockImplementation(() => undefined);
        const { createLogger } = await loadLogger({ LOG_LEVEL: "info" });

        const log = createLogger("api").child("auth");
        log.info("Signed in", { userId: "user-1" });
        log.debug("hidden");

        expect(info).toHaveBeenCalledWith("[INFO] [api.auth] Signed in", { userId: "user-1" });
        expect(debug).not.toHaveBeenCalled();
    });

    it("flattens errors inside the context object", async () => {
        const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
        const { logger } = await loadLogger({ LOG_LEVEL: "error" });

        logger.error("Fetch failed", { error: new Error("boom") });

        expect(error).toHaveBeenCalledWith("[ERROR] Fetch failed", {
            error: expect.objectContaining({ name: "Error", message: "boom" }),
        });
    });

    it("passes strings through and flattens a bare Error argument", async () => {
        const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
        const { createLogger } = await loadLogger({ LOG_LEVEL: "warn" });

        createLogger(" cache ").warn("Read failed", "spotify:me", new Error("timeout"));

        expect(warn).toHaveBeenCalledWith(
            "[WARN] [cache] Read failed",
            "spotify:me",
            expect.objectContaining({ name: "Error", message: "timeout" })
        );
    });

    describe("withLogTiming", () => {
        function createMockLogger() {
            const mock: Logger & { debug: jest.Mock; error: jest.Mock } = {
                debug: jest.fn(),
                info: jest.fn(),
                warn: jest.fn(),
                error: jest.fn(),
                child: () => mock,
            };
            return mock;
        }

        it("logs start and completion around a successful run", async () => {
            const { withLogTiming } = await loadLogger({});
            const log = createMockLogger();

            await expect(withLogTiming(log, "stats fetch", async () => 7, { userId: "u" }))
                .resolves.toBe(7);

            expect(log.debug).toHaveBeenNthCalledWith(1, "stats fetch started", { userId: "u" });
            expect(log.debug).toHaveBeenNthCalledWith(2, "stats fetch completed", {
                userId: "u",
                durationMs: expect.any(Number),
            });
        });

        it("logs and rethrows failures", async () => {
            const { withLogTiming } = await loadLogger({});
            const log = createMockLogger();
            const failure = new Error("upstream down");

            await expect(
                withLogTiming(log, "personality analysis", async () => {
                    throw failure;
                })
            ).rejects.toBe(failure);

            expect(log.error).toHaveBeenCalledWith("personality analysis failed", {
                durationMs: expect.any(Number),
                error: failure,
            });
        });
    });
});
