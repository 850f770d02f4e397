import { mkdirSync } from "node:fs";
import path from "node:path";

import { PGlite } from "@electric-sql/pglite";
import { Pool } from "pg";

import type { DatabaseTarget } from "../config/configTypes.js";
import { schemaDrizzle, type TodoDb } from "../schema.js";

/**
 * Open database handle: the drizzle instance plus the underlying client's close.
 * Close is idempotent.
 */
export class StorageDatabase {
    readonly db: TodoDb;
    readonly path: string | null;

    private readonly clientClose: () => Promise<void>;
    private closePromise: Promise<void> | null = null;

    constructor(db: TodoDb, databasePath: string | null, clientClose: () => Promise<void>) {
        this.db = db;
        this.path = databasePath;
        this.clientClose = clientClose;
    }

    close(): Promise<void> {
        if (!this.closePromise) {
            this.closePromise = this.clientClose();
        }
        return this.closePromise;
    }
}

/**
 * Opens a storage database client for either pglite or server postgres targets.
 * Expects: pglite path is ":memory:" or writable; postgres URL uses postgres:// or postgresql://.
 */
export function databaseOpen(target: string | DatabaseTarget): StorageDatabase {
    if (typeof target !== "string" && target.kind === "postgres") {
        const pool = new Pool({ connectionString: target.url });
        return new StorageDatabase(schemaDrizzle(pool), null, () => pool.end());
    }

    const dbPath = typeof target === "string" ? target : target.path;
    if (dbPath === ":memory:") {
        const client = new PGlite();
        return new StorageDatabase(schemaDrizzle(client), null, () => client.close());
    }

    const resolvedPath = databaseDataPathResolve(dbPath);
    mkdirSync(path.dirname(resolvedPath), { recursive: true });
    const client = new PGlite(resolvedPath);
    return new StorageDatabase(schemaDrizzle(client), resolvedPath, () => client.close());
}

function databaseDataPathResolve(dbPath: string): string {
    if (dbPath.endsWith(".pglite")) {
        return dbPath;
    }

    const base = path.basename(dbPath, path.extname(dbPath));
    return path.join(path.dirname(dbPath), `${base}.pglite`);
}
