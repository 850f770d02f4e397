import { configLoad } from "../config/configLoad.js";
import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { databaseOpen } from "../storage/databaseOpen.js";
import { migrationRun } from "../storage/migrations/migrationRun.js";

const logger = getLogger("command.migrate");

export type MigrateOptions = {
    settings?: string;
};

export async function migrateCommand(options: MigrateOptions): Promise<void> {
    const config = await configLoad(options.settings ?? DEFAULT_SETTINGS_PATH);
    const db = databaseOpen(config.database);
    try {
        const applied = await migrationRun(db);
        logger.info({ count: applied.length }, applied.length > 0 ? "Migrations applied" : "Database is up to date");
    } finally {
        await db.close();
    }
}
