import express from "express";
import cors from "cors";
import helmet from "helmet";
import { config } from "./config";
import { errorHandler } from "./middleware/errorHandler";
import authRoutes from "./routes/auth";
import listeningRoutes from "./routes/listening";

export const API_NAME = "Listening Persona API";

export function createApp() {
    const app = express();

    app.use(helmet());
    app.use(
        cors({
            origin: config.frontendUrl,
            credentials: true,
        })
    );
    app.use(express.json({ limit: "100kb" }));

    app.get("/", (_req, res) => {
        res.json({ message: API_NAME });
    });

    app.get("/health", (_req, res) => {
        res.json({ status: "ok" });
    });

    app.use("/auth", authRoutes);
    app.use("/api", listeningRoutes);

    app.use(errorHandler);

    return app;
}
