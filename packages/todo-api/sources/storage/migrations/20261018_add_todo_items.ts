import { sql } from "drizzle-orm";

import type { Migration } from "./migrationTypes.js";

export const migration20261018AddTodoItems: Migration = {
    name: "20261018_add_todo_items",
    async up(tx): Promise<void> {
        await tx.execute(sql`
            CREATE TABLE IF NOT EXISTS todo_items (
                id serial PRIMARY KEY,
                title text,
                description text,
                due_date timestamp with time zone NOT NULL,
                completed_date timestamp with time zone,
                is_completed boolean NOT NULL DEFAULT false,
                CONSTRAINT todo_items_description_length
                    CHECK (description IS NULL OR char_length(description) <= 100)
            )
        `);
        await tx.execute(
            sql`CREATE INDEX IF NOT EXISTS idx_todo_items_is_completed ON todo_items (is_completed)`
        );
    }
};
