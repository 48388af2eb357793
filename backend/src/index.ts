import { createServer } from "http";
import { config } from "./config";
import { createApp } from "./app";
import { logger } from "./utils/logger";

const HTTP_SERVER_CLOSE_TIMEOUT_MS = 10_000;

const httpServer = createServer(createApp());

httpServer.listen(config.port, "0.0.0.0", () => {
    logger.info(`[Startup] API listening on port ${config.port} (${config.nodeEnv})`);
});

let isShuttingDown = false;

function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
        return;
    }
    isShuttingDown = true;
    logger.info(`[Shutdown] ${signal} received, closing HTTP server`);

    const forceExit = setTimeout(() => {
        logger.warn("[Shutdown] Timed out waiting for connections to close");
        process.exit(1);
    }, HTTP_SERVER_CLOSE_TIMEOUT_MS);
    forceExit.unref();

    httpServer.close((error) => {
        if (error) {
            logger.error("[Shutdown] HTTP server close failed", { error });
            process.exit(1);
        }
        logger.info("[Shutdown] Complete");
        process.exit(0);
    });
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});
