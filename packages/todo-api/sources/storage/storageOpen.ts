import type { DatabaseTarget } from "../config/configTypes.js";
import { databaseOpen } from "./databaseOpen.js";
import { migrationRun } from "./migrations/migrationRun.js";
import { Storage } from "./storage.js";

export type StorageOpenOptions = {
    autoMigrate?: boolean;
};

/**
 * Opens storage for pglite or postgres and optionally applies migrations.
 * Expects: target is a pglite path, ":memory:", or a resolved DatabaseTarget.
 */
export async function storageOpen(target: string | DatabaseTarget, options: StorageOpenOptions = {}): Promise<Storage> {
    const db = databaseOpen(target);
    if (options.autoMigrate ?? true) {
        try {
            await migrationRun(db);
        } catch (error) {
            await db.close();
            throw error;
        }
    }
    return Storage.fromDatabase(db);
}
