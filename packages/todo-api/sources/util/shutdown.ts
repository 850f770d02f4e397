import { getLogger } from "../log.js";

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

const logger = getLogger("shutdown");

/**
 * Resolves with the first termination signal the process receives.
 * Listeners are removed once it resolves.
 */
export function awaitShutdown(): Promise<NodeJS.Signals> {
    return new Promise((resolve) => {
        const handler = (signal: NodeJS.Signals) => {
            for (const name of SHUTDOWN_SIGNALS) {
                process.off(name, handler);
            }
            logger.info({ signal }, "Shutdown requested");
            resolve(signal);
        };
        for (const name of SHUTDOWN_SIGNALS) {
            process.on(name, handler);
        }
    });
}
