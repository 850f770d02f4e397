import type { PGlite } from "@electric-sql/pglite";
import { sql } from "drizzle-orm";
import { drizzle as drizzleNodePg } from "drizzle-orm/node-postgres";
import { bigint, boolean, check, index, pgTable, serial, text, timestamp } from "drizzle-orm/pg-core";
import { drizzle as drizzlePglite, type PgliteDatabase } from "drizzle-orm/pglite";
import type { Pool } from "pg";

export const TODO_DESCRIPTION_MAX_LENGTH = 100;
// Upper bound of the int4 serial primary key.
export const TODO_ITEM_ID_MAX = 2_147_483_647;

export const migrationsTable = pgTable("_migrations", {
    name: text("name").primaryKey(),
    appliedAt: bigint("applied_at", { mode: "number" }).notNull()
});

export const todoItemsTable = pgTable(
    "todo_items",
    {
        id: serial("id").primaryKey(),
        title: text("title"),
        description: text("description"),
        dueDate: timestamp("due_date", { withTimezone: true, mode: "date" }).notNull(),
        completedDate: timestamp("completed_date", { withTimezone: true, mode: "date" }),
        isCompleted: boolean("is_completed").notNull().default(false)
    },
    (table) => [
        check(
            "todo_items_description_length",
            sql`${table.description} IS NULL OR char_length(${table.description}) <= ${sql.raw(String(TODO_DESCRIPTION_MAX_LENGTH))}`
        ),
        index("idx_todo_items_is_completed").on(table.isCompleted)
    ]
);

export const schema = {
    migrationsTable,
    todoItemsTable
};

/**
 * Unified Drizzle database type used by all repositories.
 * PGlite and node-postgres adapters are structurally compatible at runtime;
 * PgliteDatabase is the canonical type.
 */
export type TodoDb = PgliteDatabase<typeof schema>;

export type TodoDbTransaction = Parameters<Parameters<TodoDb["transaction"]>[0]>[0];

export function schemaDrizzle(client: PGlite | Pool): TodoDb {
    // PGlite instances have a `waitReady` property; pg Pool does not.
    if ("waitReady" in client) {
        return drizzlePglite(client, { schema });
    }
    return drizzleNodePg(client, { schema }) as unknown as TodoDb;
}
