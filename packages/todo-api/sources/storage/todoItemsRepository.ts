import { asc, eq } from "drizzle-orm";

import type { TodoDb, TodoDbTransaction } from "../schema.js";
import { todoItemsTable } from "../schema.js";
import type { TodoItemChange, TodoItemDbRecord, TodoItemsFilter } from "./databaseTypes.js";
import { StorageError } from "./storageError.js";

export type TodoItemsCommitResult = {
    inserted: TodoItemDbRecord[];
    replaced: TodoItemDbRecord[];
    removed: number[];
};

/**
 * Todo items repository backed by Drizzle.
 * Reads go straight to the table; writes are applied only through commit().
 * Expects: schema migrations already applied for todo_items.
 */
export class TodoItemsRepository {
    private readonly db: TodoDb;

    constructor(db: TodoDb) {
        this.db = db;
    }

    async findMany(filter: TodoItemsFilter = {}): Promise<TodoItemDbRecord[]> {
        const rows = await this.db
            .select()
            .from(todoItemsTable)
            .where(filter.isCompleted === undefined ? undefined : eq(todoItemsTable.isCompleted, filter.isCompleted))
            .orderBy(asc(todoItemsTable.id));
        return rows.map((row) => todoItemParse(row));
    }

    async findById(id: number): Promise<TodoItemDbRecord | null> {
        const rows = await this.db.select().from(todoItemsTable).where(eq(todoItemsTable.id, id)).limit(1);
        const row = rows[0];
        return row ? todoItemParse(row) : null;
    }

    async exists(id: number): Promise<boolean> {
        const rows = await this.db
            .select({ id: todoItemsTable.id })
            .from(todoItemsTable)
            .where(eq(todoItemsTable.id, id))
            .limit(1);
        return rows.length > 0;
    }

    /**
     * Applies staged changes in one transaction, in order.
     * Throws StorageError "conflict" when a replace or remove finds no row,
     * and StorageError "persistence" for any other store failure.
     */
    async commit(changes: TodoItemChange[]): Promise<TodoItemsCommitResult> {
        try {
            return await this.db.transaction(async (tx) => {
                const result: TodoItemsCommitResult = { inserted: [], replaced: [], removed: [] };
                for (const change of changes) {
                    await changeApply(tx, change, result);
                }
                return result;
            });
        } catch (error) {
            if (error instanceof StorageError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : "Failed to commit todo items.";
            throw new StorageError("persistence", message, { cause: error });
        }
    }
}

async function changeApply(
    tx: TodoDbTransaction,
    change: TodoItemChange,
    result: TodoItemsCommitResult
): Promise<void> {
    switch (change.kind) {
        case "insert": {
            const rows = await tx
                .insert(todoItemsTable)
                .values({
                    title: change.item.title,
                    description: change.item.description,
                    dueDate: change.item.dueDate,
                    completedDate: change.item.completedDate,
                    isCompleted: change.item.isCompleted
                })
                .returning();
            result.inserted.push(...rows.map((row) => todoItemParse(row)));
            return;
        }
        case "replace": {
            const rows = await tx
                .update(todoItemsTable)
                .set({
                    title: change.item.title,
                    description: change.item.description,
                    dueDate: change.item.dueDate,
                    completedDate: change.item.completedDate,
                    isCompleted: change.item.isCompleted
                })
                .where(eq(todoItemsTable.id, change.item.id))
                .returning();
            const row = rows[0];
            if (!row) {
                throw new StorageError("conflict", `Todo item ${change.item.id} was changed or removed.`);
            }
            result.replaced.push(todoItemParse(row));
            return;
        }
        case "remove": {
            const rows = await tx
                .delete(todoItemsTable)
                .where(eq(todoItemsTable.id, change.id))
                .returning({ id: todoItemsTable.id });
            if (rows.length === 0) {
                throw new StorageError("conflict", `Todo item ${change.id} was changed or removed.`);
            }
            result.removed.push(change.id);
            return;
        }
    }
}

function todoItemParse(row: typeof todoItemsTable.$inferSelect): TodoItemDbRecord {
    return {
        id: row.id,
        title: row.title,
        description: row.description,
        dueDate: row.dueDate,
        completedDate: row.completedDate,
        isCompleted: row.isCompleted
    };
}
