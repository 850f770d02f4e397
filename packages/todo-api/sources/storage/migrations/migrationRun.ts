import { asc, sql } from "drizzle-orm";

import { getLogger } from "../../log.js";
import { migrationsTable } from "../../schema.js";
import type { StorageDatabase } from "../databaseOpen.js";
import { migrations as defaultMigrations } from "./_migrations.js";
import type { Migration } from "./migrationTypes.js";

const logger = getLogger("storage.migrate");

/**
 * Applies pending migrations, each in its own transaction, and records them in _migrations.
 * Returns the names applied by this call.
 */
export async function migrationRun(
    storage: StorageDatabase,
    migrations: Migration[] = defaultMigrations
): Promise<string[]> {
    await migrationTableEnsure(storage);
    const applied = await appliedMigrationNamesRead(storage);
    const newlyApplied: string[] = [];

    for (const migration of migrations) {
        if (applied.has(migration.name)) {
            continue;
        }
        await storage.db.transaction(async (tx) => {
            await migration.up(tx);
            await tx
                .insert(migrationsTable)
                .values({ name: migration.name, appliedAt: Date.now() })
                .onConflictDoNothing();
        });
        logger.info({ migration: migration.name }, "Migration applied");
        newlyApplied.push(migration.name);
    }

    return newlyApplied;
}

async function migrationTableEnsure(storage: StorageDatabase): Promise<void> {
    await storage.db.execute(sql`
        CREATE TABLE IF NOT EXISTS _migrations (
            name text PRIMARY KEY NOT NULL,
            applied_at bigint NOT NULL
        )
    `);
}

async function appliedMigrationNamesRead(storage: StorageDatabase): Promise<Set<string>> {
    const rows = await storage.db
        .select({ name: migrationsTable.name })
        .from(migrationsTable)
        .orderBy(asc(migrationsTable.appliedAt), asc(migrationsTable.name));
    return new Set(rows.map((row) => row.name));
}
