import type { Server } from "node:http";
import express from "express";
import { createServices, type AppServices, type ServiceOverrides } from "../app";
import { loadAppConfig } from "../config/loadConfig";
import { configureLogger, getLogger } from "../utils/logger";
import { createApiKeyMiddleware } from "./middleware/apiKey";
import { createApiRouter } from "./routers/api";

export interface ServerOptions {
    configPath?: string;
    port?: number;
    overrides?: ServiceOverrides;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    port: number;
    services: AppServices;
    close(): Promise<void>;
}

/** Express app over already-built services; performs no I/O. */
export function createApp(services: AppServices): ExpressApp {
    const app = express();
    // base64 inflates uploads by a third.
    const bodyLimit = Math.ceil(services.config.server.maxUploadBytes * 1.4) + 64 * 1024;

    app.use(express.json({ limit: bodyLimit }));

    // Everything except /health requires the API key.
    const apiKeyMiddleware = createApiKeyMiddleware(services.config.server.apiKey);
    app.use((req, res, next) => {
        if (req.path === "/health") {
            next();
        } else {
            apiKeyMiddleware(req, res, next);
        }
    });

    app.use(createApiRouter(services, services.logger.child({ module: "http" })));

    return app;
}

export async function createServer(options: ServerOptions = {}): Promise<{ app: ExpressApp; services: AppServices }> {
    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();
    logger.info("Loaded server configuration.");

    const services = createServices(config, logger, options.overrides);
    await services.repositories.verifyConnection();

    return { app: createApp(services), services };
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app, services } = await createServer(options);
    const logger = getLogger();
    const port = options.port ?? services.config.server.port;

    const server: Server = await new Promise((resolve, reject) => {
        const listener = app
            .listen(port, () => {
                listener.off("error", reject);
                resolve(listener);
            })
            .on("error", reject);
    });

    const sweepIntervalMs = services.config.ingest.sweepIntervalMinutes * 60_000;
    if (sweepIntervalMs > 0) {
        services.sweeper.start(sweepIntervalMs);
    }

    logger.info({ port }, "Server listening.");

    return {
        app,
        port,
        services,
        close: async () => {
            await new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                    } else {
                        resolve();
                    }
                });
            });
            await services.close();
        },
    };
}
