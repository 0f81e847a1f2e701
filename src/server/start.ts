import { startServer, type RunningServer } from "./server";
import { getLogger } from "../utils/logger";

function registerShutdown(server: RunningServer): void {
    const shutdown = (signal: NodeJS.Signals): void => {
        const logger = getLogger();
        logger.info({ signal }, "Shutting down.");
        server
            .close()
            .then(() => {
                logger.info("Server stopped.");
            })
            .catch((error: unknown) => {
                logger.error({ err: error }, "Failed to shut down cleanly.");
                process.exitCode = 1;
            });
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

startServer()
    .then(registerShutdown)
    .catch((error) => {
        const logger = getLogger();
        logger.error({ err: error }, "Failed to start server.");
        process.exitCode = 1;
    });
