import { apiServerStart } from "../api/apiServer.js";
import { configLoad } from "../config/configLoad.js";
import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { storageOpen } from "../storage/storageOpen.js";
import { awaitShutdown } from "../util/shutdown.js";

const logger = getLogger("command.start");

export type StartOptions = {
    settings?: string;
    host?: string;
    port?: number;
};

export async function startCommand(options: StartOptions): Promise<void> {
    const config = await configLoad(options.settings ?? DEFAULT_SETTINGS_PATH, {
        host: options.host,
        port: options.port
    });
    logger.info({ settings: config.settingsPath, database: config.database.kind }, "Starting todo API");

    const storage = await storageOpen(config.database);
    let server: Awaited<ReturnType<typeof apiServerStart>> | null = null;
    try {
        server = await apiServerStart({ config, storage });
        await awaitShutdown();
    } finally {
        if (server) {
            await server.close();
        }
        await storage.close();
        logger.info("Todo API stopped");
    }
}
